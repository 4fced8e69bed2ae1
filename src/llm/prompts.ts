// ============================================
// LLM Prompts — conversation system prompt and search tool prompts
// ============================================

import { formatIsoWithOffset, UTC_OFFSET } from "../lib/time.js";

export interface SystemPromptInput {
  botId: string;
  channelId: string;
  /** Workspace or channel context; empty means not set */
  context: string;
  timezoneOffset: string;
  now?: Date;
}

/** Current time line, local when an offset is configured */
export function buildTimeMessage(timezoneOffset: string, now: Date = new Date()): string {
  if (timezoneOffset === UTC_OFFSET) {
    return `Current time is '${formatIsoWithOffset(now, UTC_OFFSET)}'. `;
  }
  return `Current local time is '${formatIsoWithOffset(now, timezoneOffset)}'. Respect local timezone by default. `;
}

/**
 * System prompt for the conversation loop.
 * Thread history follows it as separate messages.
 */
export function buildSystemPrompt(input: SystemPromptInput): string {
  const timeMessage = buildTimeMessage(input.timezoneOffset, input.now);
  const context = input.context || "Not set";

  return `Assistant is a Slack bot with ID ${input.botId}, operating in channel ${input.channelId}, responding within a specific thread.

Mention users as <@USER_ID> and link channels as <#CHANNEL_ID> in Slack mrkdwn format. ${timeMessage}

Always include permalinks in the final answer when available and adhere to user-defined context.

Use the tools when the answer may be in earlier conversations, shared files or links. Reply to the last user message in plain Slack mrkdwn; each message in the thread is given as JSON with the author's user_id.

USER-DEFINED CONTEXT
====================
${context}

CONVERSATIONS IN THE CURRENT THREADS
====================================`;
}

// ============================================
// Tools
// ============================================

export const CONVERSATION_SEARCH_TOOL_NAME = "slack_conversation_search";

export const CONVERSATION_SEARCH_DESCRIPTION = `A tool for referencing information from past conversations outside the current thread. \
Useful for when an answer may be in previous discussions, attached files, or unfurling links. \
Avoid mentioning that you used this tool in the final answer. \
Present the information as if it were organically sourced instead. \
Input should be a question in natural language that this tool can answer.`;

export const URL_SEARCH_TOOL_NAME = "slack_url_search";

export const URL_SEARCH_DESCRIPTION = `A tool for extracting precise information from URLs that have been shared within Slack conversations. \
This includes unfurling links, attached files, or even other messages that have been referenced in Slack messages. \
Useful for when you need to retrieve detailed data from a specific URL previously mentioned in a conversation. \
Input should be a URL (i.e. https://www.example.com).`;

// ============================================
// Map-reduce answering over retrieved documents
// ============================================

/** Map step: pull what is relevant out of one document */
export function buildQuestionPrompt(documentContent: string): string {
  return `Use the following portion of a long document to see if any of the text is relevant to answer the question.
Return any relevant text verbatim.
When providing your answer, consider the timestamp, channel, user, and page which may not align with the original document.
Always include the permalink in your response.
----------------
${documentContent}`;
}

/** Reduce step: answer from the extracted parts */
export function buildCombinePrompt(summaries: string[]): string {
  return `Given the following extracted parts of a long document and a question, create a final answer.
Consider the timestamp, channel and user when providing your answer.
Always include the permalink in your response.
If you don't know the answer, just say that you don't know. Don't try to make up an answer.
______________________
${summaries.join("\n\n")}`;
}

export const NO_DOCUMENTS_FOUND = "No related conversations were found.";
export const DOCUMENT_NOT_FOUND = "Document is not found.";

/** Appended when the tool loop runs out of iterations */
export const FINAL_ANSWER_INSTRUCTION =
  "Answer the last user message now using what you have gathered so far. Do not call any more tools.";
