// ============================================
// Message documents — one per Slack message
// ============================================

import { summarizeReferences } from "../references.js";
import { toDocumentContent } from "../serialize.js";
import type { TextBudgeter } from "../textBudget.js";
import type { Document } from "../types.js";
import { epochToIsoTimestamp } from "../../lib/time.js";
import type { SlackMessage } from "../../slack/types.js";

export interface MessageSource {
  message: SlackMessage;
  channelId: string;
  channelType: string;
  /** Event time in epoch seconds */
  eventTime: number;
  permalink: string;
}

/** Always exactly one document, addressed by the message ts */
export function loadMessageDocuments(source: MessageSource, budgeter: TextBudgeter): Document[] {
  const { message, channelId, channelType, eventTime, permalink } = source;
  const timestamp = epochToIsoTimestamp(eventTime);

  const content = toDocumentContent({
    content_type: "message",
    user: message.user ?? message.bot_id ?? "",
    channel: channelId,
    message: budgeter.truncate(message.text),
    permalink,
    timestamp,
    ...summarizeReferences(message, budgeter),
  });

  return [
    {
      content,
      metadata: {
        file_or_attachment_id: "",
        content_type: "message",
        channel_type: channelType,
        channel_id: channelId,
        thread_ts: message.thread_ts ?? message.ts,
        ts: message.ts,
        permalink,
        timestamp,
      },
    },
  ];
}
