// ============================================
// Document content serialization
// ============================================

/** 4-space pretty JSON; non-ASCII text is kept as-is */
export function toDocumentContent(record: Record<string, unknown>): string {
  return JSON.stringify(record, null, 4);
}
