// ============================================
// Standard error types for consistent handling
// ============================================

import { TIMEZONE_OFFSETS } from "./dataFiles.js";

export type ErrorCode =
  // Validation: a user-supplied setting was rejected
  | "MODEL_SELECT_ERROR"
  | "TEMPERATURE_RANGE_ERROR"
  | "TIMEZONE_OFFSET_ERROR"
  | "CONTEXT_LENGTH_ERROR"
  // Upstream: a collaborator failed
  | "INDEX_ERROR"
  | "STORAGE_ERROR"
  | "SLACK_API_ERROR"
  | "FILE_DOWNLOAD_ERROR"
  | "LLM_QUOTA_ERROR"
  | "LLM_INVALID_REQUEST"
  | "LLM_ERROR"
  // Lookup
  | "NOT_FOUND"
  // Fatal
  | "CONVERSION_ERROR"
  | "UNSUPPORTED_MODEL"
  | "CONFIG_ERROR"
  | "UNKNOWN_ERROR";

export type ValidationErrorCode =
  | "MODEL_SELECT_ERROR"
  | "TEMPERATURE_RANGE_ERROR"
  | "TIMEZONE_OFFSET_ERROR"
  | "CONTEXT_LENGTH_ERROR";

export interface AppError {
  code: ErrorCode;
  message: string;
  requestId?: string;
  cause?: unknown;
  context?: Record<string, unknown>;
}

export class RecallError extends Error implements AppError {
  code: ErrorCode;
  requestId?: string;
  override cause?: unknown;
  context?: Record<string, unknown>;

  constructor(options: AppError) {
    super(options.message);
    this.name = "RecallError";
    this.code = options.code;
    this.requestId = options.requestId;
    this.cause = options.cause;
    this.context = options.context;
  }

  toJSON(): AppError {
    return {
      code: this.code,
      message: this.message,
      requestId: this.requestId,
      context: this.context,
    };
  }
}

export function isRecallError(err: unknown, code?: ErrorCode): err is RecallError {
  return err instanceof RecallError && (code === undefined || err.code === code);
}

export function isValidationError(err: unknown): err is RecallError & { code: ValidationErrorCode } {
  return (
    err instanceof RecallError &&
    (err.code === "MODEL_SELECT_ERROR" ||
      err.code === "TEMPERATURE_RANGE_ERROR" ||
      err.code === "TIMEZONE_OFFSET_ERROR" ||
      err.code === "CONTEXT_LENGTH_ERROR")
  );
}

/** Create a settings validation error */
export function validationError(
  code: ValidationErrorCode,
  message: string,
  context?: Record<string, unknown>
): RecallError {
  return new RecallError({ code, message, context });
}

/** Create a vector index error */
export function indexError(message: string, cause?: unknown, context?: Record<string, unknown>): RecallError {
  return new RecallError({
    code: "INDEX_ERROR",
    message,
    cause,
    context,
  });
}

/** Create a workspace storage error */
export function storageError(message: string, cause?: unknown, context?: Record<string, unknown>): RecallError {
  return new RecallError({
    code: "STORAGE_ERROR",
    message,
    cause,
    context,
  });
}

/** Create a Slack API error */
export function slackError(message: string, cause?: unknown): RecallError {
  return new RecallError({
    code: "SLACK_API_ERROR",
    message,
    cause,
  });
}

/** Create a not-found error */
export function notFoundError(message: string, context?: Record<string, unknown>): RecallError {
  return new RecallError({
    code: "NOT_FOUND",
    message,
    context,
  });
}

/** Wrap unknown errors */
export function wrapError(err: unknown, requestId?: string): RecallError {
  if (err instanceof RecallError) {
    return err;
  }

  const message = err instanceof Error ? err.message : String(err);
  return new RecallError({
    code: "UNKNOWN_ERROR",
    message,
    requestId,
    cause: err,
  });
}

const APOLOGY = "I'm sorry, something went wrong.";

/** User-facing reply for a failed mention */
export function getUserMessage(error: AppError): string {
  switch (error.code) {
    case "TEMPERATURE_RANGE_ERROR":
      return `${APOLOGY} Please ensure the AI temperature  :thermometer:  of this channel is in range 0.0 - 2.0.`;
    case "TIMEZONE_OFFSET_ERROR":
      return `${APOLOGY} Please ensure the timezone offset  :round_pushpin:  of this channel is one of ${TIMEZONE_OFFSETS.join(", ")}.`;
    case "LLM_INVALID_REQUEST":
      return `${APOLOGY} Your message might be too large. Please try reducing the size and send it again.`;
    case "LLM_QUOTA_ERROR":
      return `${APOLOGY} Please ensure that your OpenAI API key is valid and you have enough quota.`;
    case "SLACK_API_ERROR":
      return `${APOLOGY} Please ensure the bot has the correct permissions.`;
    default:
      return APOLOGY;
  }
}
