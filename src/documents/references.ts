// ============================================
// Message references — links and files a message points at
// Shared by message documents and conversation memory
// ============================================

import { isDocumentFile, isSlackLink, isUnfurlingLink } from "./classifiers.js";
import { NESTED_VALUE_TOKEN_BUDGET, type TextBudgeter } from "./textBudget.js";
import type { SlackFile, SlackMessage } from "../slack/types.js";

export interface UnfurlingLinkReference {
  title: string;
  permalink: string;
}

export interface SlackLinkReference {
  author: string;
  content: string;
  permalink: string;
}

export interface FileReference {
  title: string;
  permalink: string;
}

/** Keys are present only when the list is non-empty */
export interface MessageReferences {
  unfurling_links?: UnfurlingLinkReference[];
  slack_links?: SlackLinkReference[];
  files?: FileReference[];
}

export function summarizeFiles(files: SlackFile[] | undefined, budgeter: TextBudgeter): FileReference[] {
  return (files ?? []).filter(isDocumentFile).map((file) => ({
    title: budgeter.truncate(file.title ?? file.name ?? "", NESTED_VALUE_TOKEN_BUDGET),
    permalink: budgeter.truncate(file.permalink ?? "", NESTED_VALUE_TOKEN_BUDGET),
  }));
}

export function summarizeReferences(message: SlackMessage, budgeter: TextBudgeter): MessageReferences {
  const attachments = message.attachments ?? [];
  const references: MessageReferences = {};

  const unfurlingLinks = attachments.filter(isUnfurlingLink).map((attachment) => ({
    title: budgeter.truncate(attachment.title ?? "", NESTED_VALUE_TOKEN_BUDGET),
    permalink: budgeter.truncate(attachment.original_url ?? "", NESTED_VALUE_TOKEN_BUDGET),
  }));
  if (unfurlingLinks.length > 0) {
    references.unfurling_links = unfurlingLinks;
  }

  const slackLinks = attachments.filter(isSlackLink).map((attachment) => ({
    author: attachment.author_id ?? "",
    content: budgeter.truncate(attachment.text ?? "", NESTED_VALUE_TOKEN_BUDGET),
    permalink: budgeter.truncate(attachment.original_url ?? "", NESTED_VALUE_TOKEN_BUDGET),
  }));
  if (slackLinks.length > 0) {
    references.slack_links = slackLinks;
  }

  const files = summarizeFiles(message.files, budgeter);
  if (files.length > 0) {
    references.files = files;
  }

  return references;
}
