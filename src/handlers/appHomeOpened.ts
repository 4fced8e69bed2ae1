// ============================================
// app_home_opened — publish the settings screen
// ============================================

import { botUserId, type Services } from "./context.js";
import { logger } from "../lib/logger.js";
import type { SlackApi } from "../slack/api.js";
import { buildHomeScreenBlocks } from "../slack/blocks/homeScreen.js";
import type { AppHomeOpenedEnvelope } from "../slack/types.js";

export async function handleAppHomeOpened(
  services: Services,
  slack: SlackApi,
  envelope: AppHomeOpenedEnvelope
): Promise<void> {
  const teamId = envelope.team_id;
  const userId = envelope.event.user;

  try {
    const workspace = await services.workspaces.getOrCreate(teamId, botUserId(envelope));
    await slack.publishHomeView(userId, buildHomeScreenBlocks(workspace));
    logger.debug("Published home view", { stage: "home", teamId, userId });
  } catch (err) {
    logger.error("Failed to publish home view", { stage: "home", teamId, userId, error: err });
  }
}
