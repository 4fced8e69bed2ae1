// ============================================
// Effective settings — channel overrides over workspace configuration
// ============================================

import type { ChannelSettings } from "../slack/channelSettings.js";
import type { WorkspaceSettings } from "../workspace/settings.js";

/** The model is workspace-wide; the rest may be overridden per channel */
export function resolveEffectiveSettings(workspace: WorkspaceSettings, channel: ChannelSettings): WorkspaceSettings {
  return {
    model: workspace.model,
    temperature: channel.temperature ?? workspace.temperature,
    context: channel.context ?? workspace.context,
    timezoneOffset: channel.timezoneOffset ?? workspace.timezoneOffset,
  };
}
