// ============================================
// Settings actions — App Home controls write workspace settings
// ============================================

import type { Services } from "./context.js";
import { isValidationError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import type { SlackApi } from "../slack/api.js";
import { ACTION_IDS, buildHomeScreenBlocks, CONTEXT_BLOCK_ID } from "../slack/blocks/homeScreen.js";
import type { BlockActionBody } from "../slack/types.js";
import { parseTemperature, type WorkspaceSettingsPatch } from "../workspace/settings.js";

export const SETTINGS_ACTION_IDS: readonly string[] = [
  ACTION_IDS.modelSelect,
  ACTION_IDS.temperatureSelect,
  ACTION_IDS.timezoneOffsetSelect,
  ACTION_IDS.contextSave,
];

/** Turn one App Home action into a settings patch; undefined when it carries nothing usable */
export function settingsPatchFromAction(body: BlockActionBody): WorkspaceSettingsPatch | undefined {
  const [action] = body.actions;
  if (!action) return undefined;

  const selected = action.selected_option?.value;

  switch (action.action_id) {
    case ACTION_IDS.modelSelect:
      return selected === undefined ? undefined : { model: selected };
    case ACTION_IDS.temperatureSelect:
      return selected === undefined ? undefined : { temperature: parseTemperature(selected) };
    case ACTION_IDS.timezoneOffsetSelect:
      return selected === undefined ? undefined : { timezoneOffset: selected };
    case ACTION_IDS.contextSave: {
      const context = body.view?.state.values[CONTEXT_BLOCK_ID]?.[ACTION_IDS.contextInput]?.value;
      return context === undefined || context === null ? undefined : { context };
    }
    default:
      return undefined;
  }
}

export async function handleSettingsAction(services: Services, slack: SlackApi, body: BlockActionBody): Promise<void> {
  const teamId = body.team?.id ?? body.user.team_id;
  const userId = body.user.id;
  const actionId = body.actions[0]?.action_id;

  if (!teamId) {
    logger.warn("Settings action without team", { stage: "settings", userId, actionId });
    return;
  }

  try {
    const patch = settingsPatchFromAction(body);
    if (!patch) {
      logger.warn("Settings action carried no value", { stage: "settings", teamId, userId, actionId });
      return;
    }

    const workspace = await services.workspaces.update(teamId, patch);
    await slack.publishHomeView(userId, buildHomeScreenBlocks(workspace));

    logger.info("Workspace settings updated", { stage: "settings", teamId, userId, actionId });
  } catch (err) {
    if (isValidationError(err)) {
      logger.warn("Rejected settings value", {
        stage: "settings",
        teamId,
        userId,
        actionId,
        code: err.code,
        reason: err.message,
      });
      return;
    }
    logger.error("Failed to update workspace settings", { stage: "settings", teamId, userId, actionId, error: err });
  }
}
