// ============================================
// file_deleted — drop every page of the file
// ============================================

import { workspaceIndex, type Services } from "./context.js";
import { logger } from "../lib/logger.js";
import type { FileDeletedEnvelope } from "../slack/types.js";

export async function handleFileDeleted(services: Services, envelope: FileDeletedEnvelope): Promise<void> {
  const teamId = envelope.team_id;
  const fileId = envelope.event.file_id;

  try {
    const index = workspaceIndex(services, teamId);
    await index.ensureIndex();
    await index.deleteFileOrAttachment(fileId);
    logger.info("Deleted file documents", { stage: "index", teamId, fileId });
  } catch (err) {
    logger.error("Failed to delete file documents", { stage: "index", teamId, fileId, error: err });
  }
}
