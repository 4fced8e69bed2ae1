// ============================================
// Unfurling link documents — web page previews
// ============================================

import { isUnfurlingLink } from "../classifiers.js";
import { toDocumentContent } from "../serialize.js";
import type { TextBudgeter } from "../textBudget.js";
import { FILE_DOCUMENT_THREAD_TS, type Document } from "../types.js";
import { attachmentDocumentId, type AttachmentSource } from "./slackLink.js";
import { epochToIsoTimestamp } from "../../lib/time.js";

export function loadUnfurlingLinkDocuments(source: AttachmentSource, budgeter: TextBudgeter): Document[] {
  const { message, attachment, channelId, channelType, eventTime } = source;

  if (!isUnfurlingLink(attachment)) {
    return [];
  }

  const permalink = attachment.original_url ?? "";
  const timestamp = epochToIsoTimestamp(eventTime);

  const content = toDocumentContent({
    content_type: "unfurling_link",
    user: message.user ?? message.bot_id ?? "",
    title: attachment.title ?? "",
    channel: channelId,
    content: budgeter.truncate(attachment.text ?? ""),
    permalink,
    timestamp,
    ...(attachment.service_name ? { service_name: attachment.service_name } : {}),
  });

  return [
    {
      content,
      metadata: {
        file_or_attachment_id: attachmentDocumentId(message, attachment),
        content_type: "unfurling_link",
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

/** Every web preview attachment on a message */
export function loadMessageUnfurlingLinkDocuments(
  source: Omit<AttachmentSource, "attachment">,
  budgeter: TextBudgeter
): Document[] {
  return (source.message.attachments ?? []).flatMap((attachment) =>
    loadUnfurlingLinkDocuments({ ...source, attachment }, budgeter)
  );
}
