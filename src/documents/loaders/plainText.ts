// ============================================
// Plain-text file documents
// ============================================

import { isPlainTextFile } from "../classifiers.js";
import type { TextBudgeter } from "../textBudget.js";
import type { Document } from "../types.js";
import { pagedFileDocuments, type FileSource } from "./filePages.js";

export interface PlainTextFileSource extends FileSource {
  /** File body as returned by files.info */
  text: string;
}

/** One document per page; files of other types yield none */
export function loadPlainTextDocuments(source: PlainTextFileSource, budgeter: TextBudgeter): Document[] {
  if (!isPlainTextFile(source.file)) {
    return [];
  }
  return pagedFileDocuments(source, source.text, budgeter);
}
