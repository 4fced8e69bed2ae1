// ============================================
// Placeholder document — keeps a fresh index non-empty
// ============================================

import { toDocumentContent } from "../serialize.js";
import type { Document } from "../types.js";
import { formatIsoWithOffset } from "../../lib/time.js";

export const PLACEHOLDER_ID = "PLACEHOLDER";

/**
 * channel_type and channel_id match no real channel,
 * so no retrieval or permalink filter ever selects it.
 */
export function loadPlaceholderDocuments(now: Date = new Date()): Document[] {
  const ts = (now.getTime() / 1000).toFixed(6);
  const timestamp = formatIsoWithOffset(now);
  const permalink = `https://slack.com/archives/${PLACEHOLDER_ID}/p${ts.replace(".", "")}`;

  return [
    {
      content: toDocumentContent({
        content_type: "message",
        user: PLACEHOLDER_ID,
        channel: PLACEHOLDER_ID,
        message: "Do not use this document to answer questions.",
        permalink,
        timestamp,
      }),
      metadata: {
        file_or_attachment_id: PLACEHOLDER_ID,
        content_type: "message",
        channel_type: "placeholder",
        channel_id: PLACEHOLDER_ID,
        thread_ts: ts,
        ts,
        permalink,
        timestamp,
      },
    },
  ];
}
