import { z } from "zod";
import { RecallError } from "../lib/errors.js";

// ============================================
// Environment configuration with validation
// Built once at startup and passed to every component
// ============================================

const envSchema = z.object({
  // Server
  PORT: z.string().default("3000").transform(Number),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).optional(),

  // Slack
  SLACK_BOT_TOKEN: z.string().min(1, "SLACK_BOT_TOKEN is required"),
  SLACK_SIGNING_SECRET: z.string().min(1, "SLACK_SIGNING_SECRET is required"),

  // Supabase
  SUPABASE_URL: z.string().url("SUPABASE_URL must be a valid URL"),
  SUPABASE_SERVICE_ROLE_KEY: z.string().min(1, "SUPABASE_SERVICE_ROLE_KEY is required"),

  // OpenAI
  OPENAI_API_KEY: z.string().min(1, "OPENAI_API_KEY is required"),

  // Background work
  MAX_BACKGROUND_TASKS: z.string().default("32").transform(Number).pipe(z.number().int().positive()),
  SHUTDOWN_DRAIN_TIMEOUT_MS: z.string().default("30000").transform(Number).pipe(z.number().int().nonnegative()),
});

export type Env = z.infer<typeof envSchema>;

export interface AppConfig {
  readonly port: number;
  readonly isDev: boolean;
  readonly isProd: boolean;

  readonly slack: {
    readonly botToken: string;
    readonly signingSecret: string;
  };

  readonly supabase: {
    readonly url: string;
    readonly serviceRoleKey: string;
  };

  readonly openai: {
    readonly apiKey: string;
  };

  readonly tasks: {
    readonly maxConcurrency: number;
    readonly drainTimeoutMs: number;
  };
}

/**
 * Validate the environment and build the config struct.
 * Throws CONFIG_ERROR listing every invalid variable.
 */
export function loadConfig(source: Record<string, string | undefined> = process.env): AppConfig {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new RecallError({
      code: "CONFIG_ERROR",
      message: `Invalid environment configuration: ${issues.join("; ")}`,
      context: { issues },
    });
  }

  const env = result.data;

  return Object.freeze({
    port: env.PORT,
    isDev: env.NODE_ENV === "development",
    isProd: env.NODE_ENV === "production",

    slack: {
      botToken: env.SLACK_BOT_TOKEN,
      signingSecret: env.SLACK_SIGNING_SECRET,
    },

    supabase: {
      url: env.SUPABASE_URL,
      serviceRoleKey: env.SUPABASE_SERVICE_ROLE_KEY,
    },

    openai: {
      apiKey: env.OPENAI_API_KEY,
    },

    tasks: {
      maxConcurrency: env.MAX_BACKGROUND_TASKS,
      drainTimeoutMs: env.SHUTDOWN_DRAIN_TIMEOUT_MS,
    },
  });
}
