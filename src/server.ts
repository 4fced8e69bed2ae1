// ============================================
// Recall Server — Slack events in, background tasks out
// ============================================

import "dotenv/config";
import bolt from "@slack/bolt";
import type { App as BoltApp } from "@slack/bolt";
import type { WebClient } from "@slack/web-api";
import OpenAI from "openai";
import type { z } from "zod";

import { loadConfig, type AppConfig } from "./config/env.js";
import { createSupabaseClient } from "./db/supabase.js";
import { SupabaseWorkspaceStore } from "./db/workspaces.js";
import {
  handleAppHomeOpened,
  handleAppMention,
  handleAppUninstalled,
  handleChannelDeleted,
  handleFileDeleted,
  handleFileShared,
  handleMessageEvent,
  handleSettingsAction,
  SETTINGS_ACTION_IDS,
  type Services,
} from "./handlers/index.js";
import { createEmbedder } from "./index/embeddings.js";
import { SupabaseVectorEngine } from "./index/supabaseEngine.js";
import { createChatModelFactory } from "./llm/client.js";
import { logger } from "./lib/logger.js";
import { TaskGroup } from "./lib/taskGroup.js";
import { createSlackApi, type SlackApi } from "./slack/api.js";
import {
  appHomeOpenedEnvelopeSchema,
  appMentionEnvelopeSchema,
  appUninstalledEnvelopeSchema,
  blockActionBodySchema,
  channelDeletedEnvelopeSchema,
  fileDeletedEnvelopeSchema,
  fileSharedEnvelopeSchema,
  isHandledMessageSubtype,
  messageEnvelopeSchema,
} from "./slack/types.js";

const { App, ExpressReceiver } = bolt;

function createServices(config: AppConfig): Services {
  const supabase = createSupabaseClient(config);
  const openai = new OpenAI({ apiKey: config.openai.apiKey });

  return {
    config,
    workspaces: new SupabaseWorkspaceStore(supabase),
    vectorEngine: new SupabaseVectorEngine(supabase, createEmbedder(openai)),
    createChatModel: createChatModelFactory(openai),
  };
}

/** Parse a payload at the boundary; unreadable payloads are logged and dropped */
function parsePayload<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  payload: unknown,
  event: string
): T | undefined {
  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    logger.warn("Dropping unreadable Slack payload", {
      stage: "events",
      event,
      issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    });
    return undefined;
  }
  return parsed.data;
}

export function registerListeners(app: BoltApp, services: Services, tasks: TaskGroup): void {
  const { config } = services;

  const slackFor = (client: WebClient, botToken: string | undefined): SlackApi =>
    createSlackApi(client, botToken ?? config.slack.botToken);

  app.event("message", async ({ body, client, context }) => {
    const envelope = parsePayload(messageEnvelopeSchema, body, "message");
    if (!envelope || !isHandledMessageSubtype(envelope.event.subtype)) return;

    const slack = slackFor(client, context.botToken);
    tasks.spawn("message", () => handleMessageEvent(services, slack, envelope));
  });

  app.event("app_mention", async ({ body, client, context }) => {
    const envelope = parsePayload(appMentionEnvelopeSchema, body, "app_mention");
    if (!envelope) return;

    const slack = slackFor(client, context.botToken);
    tasks.spawn("app_mention", () => handleAppMention(services, slack, envelope));
  });

  app.event("file_shared", async ({ body, client, context }) => {
    const envelope = parsePayload(fileSharedEnvelopeSchema, body, "file_shared");
    if (!envelope) return;

    const slack = slackFor(client, context.botToken);
    tasks.spawn("file_shared", () => handleFileShared(services, slack, envelope));
  });

  app.event("file_deleted", async ({ body }) => {
    const envelope = parsePayload(fileDeletedEnvelopeSchema, body, "file_deleted");
    if (!envelope) return;

    tasks.spawn("file_deleted", () => handleFileDeleted(services, envelope));
  });

  for (const event of ["channel_deleted", "group_deleted"]) {
    app.event(event, async ({ body }) => {
      const envelope = parsePayload(channelDeletedEnvelopeSchema, body, event);
      if (!envelope) return;

      tasks.spawn(event, () => handleChannelDeleted(services, envelope));
    });
  }

  app.event("app_uninstalled", async ({ body }) => {
    const envelope = parsePayload(appUninstalledEnvelopeSchema, body, "app_uninstalled");
    if (!envelope) return;

    tasks.spawn("app_uninstalled", () => handleAppUninstalled(services, envelope));
  });

  app.event("app_home_opened", async ({ body, client, context }) => {
    const envelope = parsePayload(appHomeOpenedEnvelopeSchema, body, "app_home_opened");
    if (!envelope) return;

    const slack = slackFor(client, context.botToken);
    tasks.spawn("app_home_opened", () => handleAppHomeOpened(services, slack, envelope));
  });

  const actionPattern = new RegExp(`^(${SETTINGS_ACTION_IDS.join("|")})$`);

  app.action(actionPattern, async ({ ack, body, client, context }) => {
    await ack();

    const action = parsePayload(blockActionBodySchema, body, "block_actions");
    if (!action) return;

    const slack = slackFor(client, context.botToken);
    tasks.spawn("settings_action", () => handleSettingsAction(services, slack, action));
  });
}

async function main(): Promise<void> {
  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (err) {
    logger.error("Invalid configuration", { stage: "startup", error: err });
    process.exit(1);
  }

  const services = createServices(config);
  const tasks = new TaskGroup({ maxConcurrency: config.tasks.maxConcurrency });

  const receiver = new ExpressReceiver({
    signingSecret: config.slack.signingSecret,
    endpoints: "/slack/events",
  });

  const app = new App({
    token: config.slack.botToken,
    receiver,
  });

  receiver.router.get("/healthz", (_req, res) => {
    res.status(200).send("ok");
  });

  registerListeners(app, services, tasks);

  const shutdown = async (signal: string): Promise<void> => {
    logger.info("Shutting down", { stage: "shutdown", signal, activeTasks: tasks.size });

    const drained = await tasks.drain(config.tasks.drainTimeoutMs);
    await app.stop();

    logger.info("Shutdown complete", { stage: "shutdown", drained });
    process.exit(0);
  };

  for (const signal of ["SIGTERM", "SIGINT"] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((err: unknown) => {
        logger.error("Shutdown failed", { stage: "shutdown", error: err });
        process.exit(1);
      });
    });
  }

  logger.info("Starting Recall", {
    stage: "startup",
    port: config.port,
    maxBackgroundTasks: config.tasks.maxConcurrency,
  });

  await app.start(config.port);

  logger.info("Server listening", { stage: "startup", port: config.port });
}

main().catch((err: unknown) => {
  logger.error("Server failed to start", { stage: "startup", error: err });
  process.exit(1);
});
