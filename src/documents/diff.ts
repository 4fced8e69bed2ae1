// ============================================
// Document diff — what an edit added and removed
// ============================================

import { METADATA_FIELDS, type Document } from "./types.js";

export interface DocumentDiff {
  added: Document[];
  removed: Document[];
}

export function documentsEqual(a: Document, b: Document): boolean {
  return a.content === b.content && METADATA_FIELDS.every((field) => a.metadata[field] === b.metadata[field]);
}

/** Documents of `from` with no equal in `without`, in order */
export function subtractDocuments(from: Document[], without: Document[]): Document[] {
  return from.filter((doc) => !without.some((other) => documentsEqual(doc, other)));
}

/** With no previous version everything is new */
export function diffDocuments(current: Document[], previous?: Document[]): DocumentDiff {
  if (!previous) {
    return { added: [...current], removed: [] };
  }
  return {
    added: subtractDocuments(current, previous),
    removed: subtractDocuments(previous, current),
  };
}
