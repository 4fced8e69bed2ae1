// ============================================
// Thread message formatting for the model
// ============================================

import { summarizeReferences } from "../documents/references.js";
import { toDocumentContent } from "../documents/serialize.js";
import type { TextBudgeter } from "../documents/textBudget.js";
import { formatIsoWithOffset, slackTsToDate } from "../lib/time.js";
import type { SlackMessage } from "../slack/types.js";

export interface FormatOptions {
  /** Replayed history carries a local timestamp; the message being answered does not */
  timezoneOffset?: string;
}

export function formatThreadMessage(message: SlackMessage, budgeter: TextBudgeter, options: FormatOptions = {}): string {
  const content: Record<string, unknown> = {
    user_id: message.user ?? message.bot_id ?? "",
    action: "Message",
    action_input: budgeter.truncate(message.text),
  };

  if (options.timezoneOffset !== undefined) {
    content["timestamp"] = formatIsoWithOffset(slackTsToDate(message.ts), options.timezoneOffset);
  }

  return toDocumentContent({ ...content, ...summarizeReferences(message, budgeter) });
}
