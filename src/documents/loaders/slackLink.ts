// ============================================
// Slack link documents — messages quoted from elsewhere in the workspace
// ============================================

import { isSlackLink } from "../classifiers.js";
import { summarizeFiles } from "../references.js";
import { toDocumentContent } from "../serialize.js";
import type { TextBudgeter } from "../textBudget.js";
import { FILE_DOCUMENT_THREAD_TS, type Document } from "../types.js";
import { epochToIsoTimestamp } from "../../lib/time.js";
import type { SlackAttachment, SlackMessage } from "../../slack/types.js";

export interface AttachmentSource {
  message: SlackMessage;
  attachment: SlackAttachment;
  channelId: string;
  channelType: string;
  /** Event time in epoch seconds */
  eventTime: number;
}

/** "{message ts}-{attachment id}" */
export function attachmentDocumentId(message: SlackMessage, attachment: SlackAttachment): string {
  return `${message.ts}-${attachment.id ?? ""}`;
}

export function loadSlackLinkDocuments(source: AttachmentSource, budgeter: TextBudgeter): Document[] {
  const { message, attachment, channelId, channelType, eventTime } = source;

  if (!isSlackLink(attachment)) {
    return [];
  }

  const permalink = attachment.original_url ?? "";
  const timestamp = epochToIsoTimestamp(eventTime);
  const files = summarizeFiles(attachment.files, budgeter);

  const content = toDocumentContent({
    content_type: "slack_link",
    user: message.user ?? message.bot_id ?? "",
    author: attachment.author_id ?? "",
    channel: channelId,
    content: budgeter.truncate(attachment.text ?? ""),
    permalink,
    timestamp,
    ...(files.length > 0 ? { files } : {}),
  });

  return [
    {
      content,
      metadata: {
        file_or_attachment_id: attachmentDocumentId(message, attachment),
        content_type: "slack_link",
        channel_type: channelType,
        channel_id: channelId,
        thread_ts: FILE_DOCUMENT_THREAD_TS,
        ts: message.ts,
        permalink,
        timestamp,
      },
    },
  ];
}

/** Every slack link attachment on a message */
export function loadMessageSlackLinkDocuments(
  source: Omit<AttachmentSource, "attachment">,
  budgeter: TextBudgeter
): Document[] {
  return (source.message.attachments ?? []).flatMap((attachment) =>
    loadSlackLinkDocuments({ ...source, attachment }, budgeter)
  );
}
