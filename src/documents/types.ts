// ============================================
// Document types — the unit stored in a workspace index
// ============================================

export type DocumentContentType = "message" | "slack_link" | "unfurling_link" | (string & {});

/** Every document carries exactly these keys */
export interface DocumentMetadata {
  file_or_attachment_id: string;
  content_type: DocumentContentType;
  channel_type: string;
  channel_id: string;
  thread_ts: string;
  ts: string;
  permalink: string;
  timestamp: string;
}

export const METADATA_FIELDS = [
  "file_or_attachment_id",
  "content_type",
  "channel_type",
  "channel_id",
  "thread_ts",
  "ts",
  "permalink",
  "timestamp",
] as const satisfies ReadonlyArray<keyof DocumentMetadata>;

export type MetadataField = (typeof METADATA_FIELDS)[number];

export interface Document {
  /** Pretty-printed JSON of the normalized record */
  content: string;
  metadata: DocumentMetadata;
}

/**
 * thread_ts given to file and link documents, which never belong to a thread.
 * Keeps thread-exclusion filters from hiding them.
 */
export const FILE_DOCUMENT_THREAD_TS = "0000000000.000000";
