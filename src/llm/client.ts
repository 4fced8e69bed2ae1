// ============================================
// LLM Client — OpenAI API wrapper
// ============================================

import OpenAI from "openai";
import type {
  ChatCompletionMessageParam,
  ChatCompletionTool,
} from "openai/resources/chat/completions.js";
import { RecallError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";

export interface ToolCall {
  id: string;
  name: string;
  /** JSON-encoded arguments as produced by the model */
  arguments: string;
}

export type ChatMessage =
  | { role: "system" | "user"; content: string }
  | { role: "assistant"; content: string; toolCalls?: ToolCall[] }
  | { role: "tool"; toolCallId: string; content: string };

export interface ToolDefinition {
  name: string;
  description: string;
  parameters: Record<string, unknown>;
}

export interface ChatRequest {
  messages: ChatMessage[];
  tools?: ToolDefinition[];
  maxTokens?: number;
}

export interface ChatResult {
  content: string;
  toolCalls: ToolCall[];
}

/** One chat model at one temperature; the orchestrator only sees this */
export interface ChatModel {
  readonly model: string;
  readonly temperature: number;
  complete(request: ChatRequest): Promise<ChatResult>;
}

export interface ChatModelOptions {
  model: string;
  temperature: number;
}

export type ChatModelFactory = (options: ChatModelOptions) => ChatModel;

/** Map OpenAI failures onto the categories users see apologies for */
export function classifyLlmError(err: unknown): RecallError {
  if (err instanceof RecallError) return err;

  const message = err instanceof Error ? err.message : String(err);

  if (err instanceof OpenAI.BadRequestError) {
    return new RecallError({ code: "LLM_INVALID_REQUEST", message, cause: err });
  }
  if (
    err instanceof OpenAI.RateLimitError ||
    err instanceof OpenAI.AuthenticationError ||
    err instanceof OpenAI.PermissionDeniedError
  ) {
    return new RecallError({ code: "LLM_QUOTA_ERROR", message, cause: err });
  }
  return new RecallError({ code: "LLM_ERROR", message, cause: err });
}

function toOpenAIMessage(message: ChatMessage): ChatCompletionMessageParam {
  switch (message.role) {
    case "system":
      return { role: "system", content: message.content };
    case "user":
      return { role: "user", content: message.content };
    case "assistant":
      return message.toolCalls && message.toolCalls.length > 0
        ? {
            role: "assistant",
            content: message.content || null,
            tool_calls: message.toolCalls.map((tc) => ({
              id: tc.id,
              type: "function",
              function: { name: tc.name, arguments: tc.arguments },
            })),
          }
        : { role: "assistant", content: message.content };
    case "tool":
      return { role: "tool", tool_call_id: message.toolCallId, content: message.content };
  }
}

function toOpenAITool(tool: ToolDefinition): ChatCompletionTool {
  return {
    type: "function",
    function: {
      name: tool.name,
      description: tool.description,
      parameters: tool.parameters,
    },
  };
}

export class OpenAIChatModel implements ChatModel {
  readonly model: string;
  readonly temperature: number;

  constructor(
    private readonly openai: OpenAI,
    options: ChatModelOptions
  ) {
    this.model = options.model;
    this.temperature = options.temperature;
  }

  async complete(request: ChatRequest): Promise<ChatResult> {
    const { messages, tools, maxTokens = 1000 } = request;

    try {
      const response = await this.openai.chat.completions.create({
        model: this.model,
        messages: messages.map(toOpenAIMessage),
        temperature: this.temperature,
        max_tokens: maxTokens,
        ...(tools && tools.length > 0 && { tools: tools.map(toOpenAITool) }),
      });

      const message = response.choices[0]?.message;
      const toolCalls = (message?.tool_calls ?? [])
        .filter((tc) => tc.type === "function")
        .map((tc) => ({ id: tc.id, name: tc.function.name, arguments: tc.function.arguments }));

      return { content: message?.content ?? "", toolCalls };
    } catch (err) {
      logger.error("LLM completion failed", {
        stage: "llm",
        model: this.model,
        error: err,
      });
      throw classifyLlmError(err);
    }
  }
}

export function createChatModelFactory(openai: OpenAI): ChatModelFactory {
  return (options) => new OpenAIChatModel(openai, options);
}
