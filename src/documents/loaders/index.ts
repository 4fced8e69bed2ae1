// ============================================
// Document loaders
// ============================================

export { loadMessageDocuments, type MessageSource } from "./message.js";
export { loadPlainTextDocuments, type PlainTextFileSource } from "./plainText.js";
export { loadPdfDocuments } from "./pdf.js";
export type { FileSource } from "./filePages.js";
export {
  loadSlackLinkDocuments,
  loadMessageSlackLinkDocuments,
  attachmentDocumentId,
  type AttachmentSource,
} from "./slackLink.js";
export { loadUnfurlingLinkDocuments, loadMessageUnfurlingLinkDocuments } from "./unfurlingLink.js";
export { loadPlaceholderDocuments, PLACEHOLDER_ID } from "./placeholder.js";
