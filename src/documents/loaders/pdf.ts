// ============================================
// PDF file documents
// ============================================

import { isPdfFile } from "../classifiers.js";
import { extractPdfText } from "../pdfText.js";
import type { TextBudgeter } from "../textBudget.js";
import type { Document } from "../types.js";
import { pagedFileDocuments, type FileSource } from "./filePages.js";
import { RecallError } from "../../lib/errors.js";
import { logger } from "../../lib/logger.js";
import type { FileDownloader } from "../../slack/files.js";

/**
 * Download and page a shared PDF. Download failures propagate;
 * files of other types yield no documents and trigger no download.
 */
export async function loadPdfDocuments(
  source: FileSource,
  budgeter: TextBudgeter,
  download: FileDownloader
): Promise<Document[]> {
  const { file } = source;

  if (!isPdfFile(file)) {
    return [];
  }

  if (!file.url_private) {
    throw new RecallError({
      code: "FILE_DOWNLOAD_ERROR",
      message: `Failed to download file. file ${file.id} has no private url`,
      context: { fileId: file.id },
    });
  }

  const bytes = await download(file.url_private);
  const text = await extractPdfText(bytes);

  logger.debug("Extracted PDF text", {
    stage: "normalize",
    fileId: file.id,
    characters: text.length,
  });

  return pagedFileDocuments(source, text, budgeter);
}
