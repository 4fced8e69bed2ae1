// ============================================
// file_shared — index shared file pages
// ============================================

import { botUserId, workspaceIndex, type Services } from "./context.js";
import { loadPdfDocuments, loadPlainTextDocuments, type FileSource } from "../documents/loaders/index.js";
import { TextBudgeter } from "../documents/textBudget.js";
import { logger } from "../lib/logger.js";
import type { SlackApi } from "../slack/api.js";
import type { FileSharedEnvelope } from "../slack/types.js";

export async function handleFileShared(services: Services, slack: SlackApi, envelope: FileSharedEnvelope): Promise<void> {
  const teamId = envelope.team_id;
  const { file_id: fileId, user_id: userId, channel_id: channelId, event_ts: eventTs } = envelope.event;

  try {
    const [{ file, text }, channel] = await Promise.all([
      slack.getFileInfo(fileId),
      slack.getChannelInfo(channelId),
    ]);

    const workspace = await services.workspaces.getOrCreate(teamId, botUserId(envelope));
    const budgeter = new TextBudgeter(workspace.model);

    const source: FileSource = {
      file,
      userId,
      channelId,
      channelType: channel.channelType,
      eventTs,
      eventTime: envelope.event_time,
    };

    const documents = [
      ...(await loadPdfDocuments(source, budgeter, slack.downloadFile)),
      ...loadPlainTextDocuments({ ...source, text }, budgeter),
    ];

    if (documents.length === 0) {
      logger.debug("Shared file is not indexable", { stage: "index", teamId, fileId, filetype: file.filetype });
      return;
    }

    const index = workspaceIndex(services, teamId);
    await index.ensureIndex();
    for (const document of documents) {
      await index.addDocuments([document]);
    }

    logger.info("Indexed shared file", { stage: "index", teamId, fileId, channelId, pages: documents.length });
  } catch (err) {
    logger.error("Failed to index shared file", { stage: "index", teamId, fileId, channelId, error: err });
  }
}
