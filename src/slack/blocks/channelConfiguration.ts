// ============================================
// Channel configuration summary blocks
// ============================================

import type { KnownBlock, MrkdwnElement } from "@slack/web-api";
import type { ChannelSettings } from "../channelSettings.js";

export const CHANNEL_CONFIGURATION_TEXT = "Configuration is set for this channel.";

/** Empty when the channel sets nothing */
export function buildChannelConfigurationBlocks(settings: ChannelSettings): KnownBlock[] {
  const { temperature, timezoneOffset, context } = settings;
  const blocks: KnownBlock[] = [];

  if (temperature === undefined && timezoneOffset === undefined && context === undefined) {
    return blocks;
  }

  blocks.push({ type: "section", text: { type: "plain_text", text: "Configuration is set for this channel" } });

  const fields: MrkdwnElement[] = [];
  if (temperature !== undefined) {
    fields.push({ type: "mrkdwn", text: `*AI temperature:*\n${temperature}` });
  }
  if (timezoneOffset !== undefined) {
    fields.push({ type: "mrkdwn", text: `*Timezone:*\n${timezoneOffset}` });
  }
  if (fields.length > 0) {
    blocks.push({ type: "section", fields });
  }

  if (context !== undefined) {
    blocks.push({ type: "section", text: { type: "mrkdwn", text: `*System Message*\n${context}` } });
  }

  return blocks;
}
