// ============================================
// app_uninstalled — forget the workspace
// ============================================

import { workspaceIndex, type Services } from "./context.js";
import { logger } from "../lib/logger.js";
import type { AppUninstalledEnvelope } from "../slack/types.js";

/** Configuration first, then the index */
export async function handleAppUninstalled(services: Services, envelope: AppUninstalledEnvelope): Promise<void> {
  const teamId = envelope.team_id;

  try {
    await services.workspaces.delete(teamId);
    await workspaceIndex(services, teamId).deleteIndex();
    logger.info("Removed workspace", { stage: "events", teamId });
  } catch (err) {
    logger.error("Failed to remove workspace", { stage: "events", teamId, error: err });
  }
}
