// ============================================
// Conversation Chain — tool loop over thread memory
// ============================================

import crypto from "crypto";
import { formatThreadMessage } from "./format.js";
import { TokenBufferMemory } from "./memory.js";
import { CONVERSATION_TOOLS, executeTool } from "./tools.js";
import type { TextBudgeter } from "../documents/textBudget.js";
import type { ChatMessage, ChatModel } from "../llm/client.js";
import { buildSystemPrompt, FINAL_ANSWER_INSTRUCTION } from "../llm/prompts.js";
import type { ConversationSearch } from "../retrieval/retriever.js";
import { logger } from "../lib/logger.js";
import type { SlackMessage } from "../slack/types.js";

const MAX_ITERATIONS = 5;

export interface ConversationChainOptions {
  model: ChatModel;
  search: ConversationSearch;
  budgeter: TextBudgeter;
  botId: string;
  channelId: string;
  context: string;
  timezoneOffset: string;
  requestId?: string;
  now?: () => Date;
}

export class ConversationChain {
  readonly memory: TokenBufferMemory;
  readonly requestId: string;
  private readonly options: ConversationChainOptions;

  constructor(options: ConversationChainOptions) {
    this.options = options;
    this.memory = new TokenBufferMemory(options.budgeter);
    this.requestId = options.requestId ?? crypto.randomUUID().slice(0, 8);
  }

  /** Replay a thread, all but the message being answered */
  replay(history: SlackMessage[]): void {
    for (const message of history) {
      if (message.user === this.options.botId) {
        this.addAssistantMessage(message);
      } else {
        this.addUserMessage(message);
      }
    }
  }

  addUserMessage(message: SlackMessage): void {
    this.memory.addUserMessage(this.format(message, true));
  }

  addAssistantMessage(message: SlackMessage): void {
    this.memory.addAssistantMessage(this.format(message, true));
  }

  /**
   * Answer the last message. The model may call the search tools
   * up to MAX_ITERATIONS times; after that it must answer without them.
   */
  async run(message: SlackMessage): Promise<string> {
    const { model, search, botId, channelId, context, timezoneOffset } = this.options;
    const requestId = this.requestId;
    const now = this.options.now?.() ?? new Date();

    const messages: ChatMessage[] = [
      { role: "system", content: buildSystemPrompt({ botId, channelId, context, timezoneOffset, now }) },
      ...this.memory.messages,
      { role: "user", content: this.format(message, false) },
    ];

    logger.info("Conversation started", {
      stage: "conversation",
      requestId,
      channelId,
      model: model.model,
      historyMessages: messages.length - 2,
    });

    for (let iteration = 0; iteration < MAX_ITERATIONS; iteration++) {
      const result = await model.complete({ messages, tools: CONVERSATION_TOOLS });

      if (result.toolCalls.length === 0) {
        logger.info("Conversation answered", { stage: "conversation", requestId, iterations: iteration + 1 });
        return result.content;
      }

      logger.info("LLM requested tool calls", {
        stage: "conversation",
        requestId,
        iteration: iteration + 1,
        tools: result.toolCalls.map((tc) => tc.name),
      });

      messages.push({ role: "assistant", content: result.content, toolCalls: result.toolCalls });

      for (const toolCall of result.toolCalls) {
        const content = await executeTool(toolCall, { search, model, requestId });
        messages.push({ role: "tool", toolCallId: toolCall.id, content });
      }
    }

    logger.warn("Tool loop exhausted, forcing final answer", { stage: "conversation", requestId });

    const final = await model.complete({
      messages: [...messages, { role: "system", content: FINAL_ANSWER_INSTRUCTION }],
    });
    return final.content;
  }

  private format(message: SlackMessage, withTimestamp: boolean): string {
    return formatThreadMessage(
      message,
      this.options.budgeter,
      withTimestamp ? { timezoneOffset: this.options.timezoneOffset } : {}
    );
  }
}
