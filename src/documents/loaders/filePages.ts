// ============================================
// Paged file documents — shared by plain-text and PDF files
// ============================================

import { toDocumentContent } from "../serialize.js";
import type { TextBudgeter } from "../textBudget.js";
import { FILE_DOCUMENT_THREAD_TS, type Document } from "../types.js";
import { epochToIsoTimestamp } from "../../lib/time.js";
import type { SlackFile } from "../../slack/types.js";

export interface FileSource {
  file: SlackFile;
  /** User who shared the file */
  userId: string;
  channelId: string;
  channelType: string;
  /** ts of the file_shared event */
  eventTs: string;
  /** Event time in epoch seconds */
  eventTime: number;
}

export function pagedFileDocuments(source: FileSource, text: string, budgeter: TextBudgeter): Document[] {
  const { file, userId, channelId, channelType, eventTs, eventTime } = source;
  const filetype = file.filetype ?? "";
  const permalink = file.permalink ?? "";
  const timestamp = epochToIsoTimestamp(eventTime);
  const pages = budgeter.split(text, budgeter.pageSize);

  return pages.map((page, i) => ({
    content: toDocumentContent({
      content_type: filetype,
      user: userId,
      name: file.name ?? "",
      title: file.title ?? "",
      channel: channelId,
      content: page,
      page: `${i + 1} / ${pages.length}`,
      permalink,
      timestamp,
    }),
    metadata: {
      file_or_attachment_id: file.id,
      content_type: filetype,
      channel_type: channelType,
      channel_id: channelId,
      thread_ts: FILE_DOCUMENT_THREAD_TS,
      ts: eventTs,
      permalink,
      timestamp,
    },
  }));
}
