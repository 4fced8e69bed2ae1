// ============================================
// app_mention — answer in the thread from workspace history
// ============================================

import crypto from "crypto";
import { botUserId, workspaceIndex, type Services } from "./context.js";
import { ConversationChain } from "../conversation/chain.js";
import { resolveEffectiveSettings } from "../conversation/settings.js";
import { TextBudgeter } from "../documents/textBudget.js";
import { getUserMessage, wrapError } from "../lib/errors.js";
import { createRequestLogger } from "../lib/logger.js";
import { ScopedRetriever } from "../retrieval/retriever.js";
import type { SlackApi } from "../slack/api.js";
import { parseChannelSettings } from "../slack/channelSettings.js";
import type { AppMentionEnvelope } from "../slack/types.js";

export async function handleAppMention(services: Services, slack: SlackApi, envelope: AppMentionEnvelope): Promise<void> {
  const { event } = envelope;

  // Editing a mention re-sends the event; answer only once
  if (event.edited) {
    return;
  }

  const requestId = crypto.randomUUID().slice(0, 8);
  const log = createRequestLogger(requestId, "conversation");
  const teamId = envelope.team_id;
  const channelId = event.channel;
  const threadTs = event.thread_ts ?? event.ts;

  log.info("Mention received", { teamId, channelId, threadTs });

  try {
    const botId = botUserId(envelope);
    const channel = await slack.getChannelInfo(channelId);
    const overrides = parseChannelSettings(channel.topic, channel.purpose);
    const workspace = await services.workspaces.getOrCreate(teamId, botId);
    const settings = resolveEffectiveSettings(workspace, overrides);

    const budgeter = new TextBudgeter(settings.model);
    const index = workspaceIndex(services, teamId);
    await index.ensureIndex();

    const chain = new ConversationChain({
      model: services.createChatModel({ model: settings.model, temperature: settings.temperature }),
      search: new ScopedRetriever(index, { channelId, isPrivate: channel.isPrivate, threadTs }),
      budgeter,
      botId,
      channelId,
      context: settings.context,
      timezoneOffset: settings.timezoneOffset,
      requestId,
    });

    const thread = await slack.getThreadMessages(channelId, threadTs);
    const last = thread.at(-1) ?? event;
    chain.replay(thread.slice(0, -1));

    const answer = await chain.run(last);
    await slack.postMessage({ channel: channelId, text: answer, threadTs });

    log.info("Mention answered", { teamId, channelId, threadTs });
  } catch (err) {
    const error = wrapError(err, requestId);
    log.error("Failed to answer mention", { teamId, channelId, threadTs, code: error.code, error: err });
    await slack.postMessage({ channel: channelId, text: getUserMessage(error), threadTs });
  }
}
