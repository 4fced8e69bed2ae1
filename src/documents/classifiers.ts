// ============================================
// Content classifiers — which Slack objects become documents
// ============================================

import { PLAIN_TEXT_FILETYPES } from "../lib/dataFiles.js";
import type { SlackAttachment, SlackFile } from "../slack/types.js";

export const PDF_FILETYPES: readonly string[] = ["pdf"];

const plainTextFiletypes = new Set(PLAIN_TEXT_FILETYPES);
const pdfFiletypes = new Set(PDF_FILETYPES);

export function isPlainTextFile(file: Pick<SlackFile, "filetype">): boolean {
  return file.filetype !== undefined && plainTextFiletypes.has(file.filetype);
}

export function isPdfFile(file: Pick<SlackFile, "filetype">): boolean {
  return file.filetype !== undefined && pdfFiletypes.has(file.filetype);
}

/** Files whose text we can index */
export function isDocumentFile(file: Pick<SlackFile, "filetype">): boolean {
  return isPlainTextFile(file) || isPdfFile(file);
}

/** A link to another Slack message, rendered inline by Slack */
export function isSlackLink(attachment: SlackAttachment): boolean {
  return Boolean(attachment.id && attachment.original_url && attachment.author_id && attachment.text);
}

/**
 * A web page preview. Evaluated independently of isSlackLink:
 * an attachment carrying a title and an author satisfies both.
 */
export function isUnfurlingLink(attachment: SlackAttachment): boolean {
  return Boolean(attachment.id && attachment.original_url && attachment.title && attachment.text);
}
