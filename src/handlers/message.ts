// ============================================
// message — keep the index in step with channel messages
// ============================================

import { v5 as uuidv5 } from "uuid";
import { botUserId, workspaceIndex, type Services } from "./context.js";
import { diffDocuments } from "../documents/diff.js";
import {
  loadMessageDocuments,
  loadMessageSlackLinkDocuments,
  loadMessageUnfurlingLinkDocuments,
} from "../documents/loaders/index.js";
import { TextBudgeter } from "../documents/textBudget.js";
import type { Document } from "../documents/types.js";
import { getUserMessage, isValidationError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import type { SlackApi } from "../slack/api.js";
import { buildChannelConfigurationBlocks, CHANNEL_CONFIGURATION_TEXT } from "../slack/blocks/channelConfiguration.js";
import { parseChannelSettings } from "../slack/channelSettings.js";
import type { MessageEnvelope, SlackMessage } from "../slack/types.js";

export async function handleMessageEvent(services: Services, slack: SlackApi, envelope: MessageEnvelope): Promise<void> {
  const teamId = envelope.team_id;
  const { event } = envelope;

  try {
    switch (event.subtype) {
      case "message_deleted":
        await deleteMessage(services, envelope);
        break;
      case "channel_topic":
      case "channel_purpose":
        await announceChannelConfiguration(slack, envelope);
        break;
      case undefined:
      case "message_changed":
      case "file_share":
        await upsertMessage(services, slack, envelope);
        break;
      default:
        logger.debug("Ignoring message subtype", { stage: "events", teamId, subtype: event.subtype });
    }
  } catch (err) {
    logger.error("Failed to handle message event", {
      stage: "events",
      teamId,
      channelId: event.channel,
      subtype: event.subtype,
      error: err,
    });
  }
}

async function upsertMessage(services: Services, slack: SlackApi, envelope: MessageEnvelope): Promise<void> {
  const teamId = envelope.team_id;
  const { event } = envelope;

  const edited = event.subtype === "message_changed";
  const message: SlackMessage | undefined = edited ? event.message : event;
  const previous = edited ? event.previous_message : undefined;

  if (!message) {
    logger.warn("message_changed without message", { stage: "events", teamId, channelId: event.channel });
    return;
  }

  const workspace = await services.workspaces.getOrCreate(teamId, botUserId(envelope));
  const budgeter = new TextBudgeter(workspace.model);
  const index = workspaceIndex(services, teamId);
  await index.ensureIndex();

  const base = { channelId: event.channel, channelType: event.channel_type, eventTime: envelope.event_time };
  const permalink = await slack.getPermalink(event.channel, message.ts);

  const messageDocuments = loadMessageDocuments({ ...base, message, permalink }, budgeter);
  await index.addDocuments(
    messageDocuments,
    messageDocuments.map((document) => uuidv5(document.metadata.ts, workspace.namespaceUuid))
  );

  const linkDocuments = (m: SlackMessage): Document[] => [
    ...loadMessageUnfurlingLinkDocuments({ ...base, message: m }, budgeter),
    ...loadMessageSlackLinkDocuments({ ...base, message: m }, budgeter),
  ];
  const { added, removed } = diffDocuments(linkDocuments(message), previous ? linkDocuments(previous) : undefined);

  // Removals first: an edited link keeps its id and the delete must not hit the new version
  for (const document of removed) {
    await index.deleteFileOrAttachment(document.metadata.file_or_attachment_id);
  }
  for (const document of added) {
    await index.addDocuments([document]);
  }

  logger.info("Indexed message", {
    stage: "index",
    teamId,
    channelId: event.channel,
    ts: message.ts,
    addedLinks: added.length,
    removedLinks: removed.length,
  });
}

async function deleteMessage(services: Services, envelope: MessageEnvelope): Promise<void> {
  const teamId = envelope.team_id;
  const ts = envelope.event.previous_message?.ts;

  if (!ts) {
    logger.warn("message_deleted without previous message", { stage: "events", teamId });
    return;
  }

  const index = workspaceIndex(services, teamId);
  await index.ensureIndex();
  await index.deleteMessage(ts);

  logger.info("Deleted message documents", { stage: "index", teamId, ts });
}

async function announceChannelConfiguration(slack: SlackApi, envelope: MessageEnvelope): Promise<void> {
  const channelId = envelope.event.channel;
  const channel = await slack.getChannelInfo(channelId);

  try {
    const settings = parseChannelSettings(channel.topic, channel.purpose);
    const blocks = buildChannelConfigurationBlocks(settings);
    if (blocks.length > 0) {
      await slack.postMessage({ channel: channelId, text: CHANNEL_CONFIGURATION_TEXT, blocks });
    }
    logger.info("Channel configuration changed", { stage: "settings", teamId: envelope.team_id, channelId });
  } catch (err) {
    if (!isValidationError(err)) throw err;
    logger.warn("Invalid channel configuration", {
      stage: "settings",
      teamId: envelope.team_id,
      channelId,
      code: err.code,
      reason: err.message,
    });
    await slack.postMessage({ channel: channelId, text: getUserMessage(err) });
  }
}
