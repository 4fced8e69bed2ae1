// ============================================
// channel_deleted / group_deleted — drop the channel's documents
// ============================================

import { workspaceIndex, type Services } from "./context.js";
import { logger } from "../lib/logger.js";
import type { ChannelDeletedEnvelope } from "../slack/types.js";

export async function handleChannelDeleted(services: Services, envelope: ChannelDeletedEnvelope): Promise<void> {
  const teamId = envelope.team_id;
  const channelId = envelope.event.channel;

  try {
    const index = workspaceIndex(services, teamId);
    await index.ensureIndex();
    await index.deleteChannel(channelId);
    logger.info("Deleted channel documents", { stage: "index", teamId, channelId });
  } catch (err) {
    logger.error("Failed to delete channel documents", { stage: "index", teamId, channelId, error: err });
  }
}
