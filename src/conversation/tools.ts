// ============================================
// Conversation Tools — definitions and executors
// ============================================

import { z } from "zod";
import type { ChatModel, ToolCall, ToolDefinition } from "../llm/client.js";
import {
  CONVERSATION_SEARCH_DESCRIPTION,
  CONVERSATION_SEARCH_TOOL_NAME,
  URL_SEARCH_DESCRIPTION,
  URL_SEARCH_TOOL_NAME,
} from "../llm/prompts.js";
import { answerFromDocuments } from "../retrieval/qa.js";
import type { ConversationSearch } from "../retrieval/retriever.js";
import { logger } from "../lib/logger.js";

export const CONVERSATION_TOOLS: ToolDefinition[] = [
  {
    name: CONVERSATION_SEARCH_TOOL_NAME,
    description: CONVERSATION_SEARCH_DESCRIPTION,
    parameters: {
      type: "object",
      properties: {
        query: {
          type: "string",
          description: "A question in natural language",
        },
      },
      required: ["query"],
    },
  },
  {
    name: URL_SEARCH_TOOL_NAME,
    description: URL_SEARCH_DESCRIPTION,
    parameters: {
      type: "object",
      properties: {
        url: {
          type: "string",
          description: "A URL shared in Slack, e.g. https://www.example.com",
        },
      },
      required: ["url"],
    },
  },
];

const conversationSearchArgs = z.object({ query: z.string().min(1) });
const urlSearchArgs = z.object({ url: z.string().min(1) });

export interface ToolContext {
  search: ConversationSearch;
  model: ChatModel;
  requestId: string;
}

function parseArguments(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

/**
 * Run one tool call. Bad arguments and unknown tools come back as text
 * for the model; index and model failures propagate.
 */
export async function executeTool(call: ToolCall, context: ToolContext): Promise<string> {
  const args = parseArguments(call.arguments);

  logger.info("Executing tool", {
    stage: "conversation",
    requestId: context.requestId,
    toolName: call.name,
  });

  switch (call.name) {
    case CONVERSATION_SEARCH_TOOL_NAME: {
      const parsed = conversationSearchArgs.safeParse(args);
      if (!parsed.success) {
        return `Invalid arguments for ${call.name}: expected {"query": string}`;
      }
      const documents = await context.search.search(parsed.data.query);
      return answerFromDocuments(context.model, parsed.data.query, documents);
    }
    case URL_SEARCH_TOOL_NAME: {
      const parsed = urlSearchArgs.safeParse(args);
      if (!parsed.success) {
        return `Invalid arguments for ${call.name}: expected {"url": string}`;
      }
      return context.search.searchUrl(parsed.data.url);
    }
    default:
      logger.warn("Unknown tool called", {
        stage: "conversation",
        requestId: context.requestId,
        toolName: call.name,
      });
      return `Unknown tool: ${call.name}`;
  }
}
