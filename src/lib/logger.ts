// ============================================
// Structured JSON logging
// Always includes: timestamp, level, stage, requestId (when available)
// ============================================

export type LogLevel = "debug" | "info" | "warn" | "error";

export type Stage =
  | "startup"
  | "shutdown"
  | "slack"
  | "events"
  | "tasks"
  | "normalize"
  | "index"
  | "retrieval"
  | "conversation"
  | "llm"
  | "settings"
  | "home"
  | "db";

interface LogContext {
  requestId?: string;
  stage?: Stage;
  teamId?: string;
  channelId?: string;
  threadTs?: string;
  [key: string]: unknown;
}

/** LogContext without requestId; key remapping keeps the declared keys that Omit drops next to an index signature */
type RequestLogContext = {
  [K in keyof LogContext as K extends "requestId" ? never : K]: LogContext[K];
};

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  stage?: Stage;
  requestId?: string;
  [key: string]: unknown;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value === "debug" || value === "info" || value === "warn" || value === "error";
}

/** LOG_LEVEL wins; otherwise debug is on outside production */
function thresholdLevel(): LogLevel {
  const configured = process.env["LOG_LEVEL"];
  if (isLogLevel(configured)) return configured;
  return process.env["NODE_ENV"] === "production" ? "info" : "debug";
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[thresholdLevel()];
}

function formatLog(level: LogLevel, message: string, context: LogContext = {}): string {
  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    message,
    ...context,
  };
  return JSON.stringify(entry);
}

function describeError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    const code = "code" in error && typeof error.code === "string" ? { errorCode: error.code } : {};
    return { errorMessage: error.message, errorStack: error.stack, ...code };
  }
  return error ? { errorMessage: String(error) } : {};
}

/** Main logger with context support */
export const logger = {
  debug(message: string, context?: LogContext): void {
    if (enabled("debug")) {
      console.log(formatLog("debug", message, context));
    }
  },

  info(message: string, context?: LogContext): void {
    if (enabled("info")) {
      console.log(formatLog("info", message, context));
    }
  },

  warn(message: string, context?: LogContext): void {
    if (enabled("warn")) {
      console.warn(formatLog("warn", message, context));
    }
  },

  error(message: string, context?: LogContext & { error?: unknown }): void {
    const { error, ...rest } = context || {};
    console.error(formatLog("error", message, { ...rest, ...describeError(error) }));
  },
};

/** Create a logger bound to a specific request */
export function createRequestLogger(requestId: string, stage?: Stage) {
  return {
    debug(message: string, context?: RequestLogContext): void {
      logger.debug(message, { ...context, requestId, stage: context?.stage ?? stage });
    },

    info(message: string, context?: RequestLogContext): void {
      logger.info(message, { ...context, requestId, stage: context?.stage ?? stage });
    },

    warn(message: string, context?: RequestLogContext): void {
      logger.warn(message, { ...context, requestId, stage: context?.stage ?? stage });
    },

    error(message: string, context?: RequestLogContext & { error?: unknown }): void {
      logger.error(message, { ...context, requestId, stage: context?.stage ?? stage });
    },

    /** Create a child logger for a different stage */
    withStage(newStage: Stage) {
      return createRequestLogger(requestId, newStage);
    },
  };
}

export type RequestLogger = ReturnType<typeof createRequestLogger>;
