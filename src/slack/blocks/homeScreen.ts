// ============================================
// App Home — workspace settings controls
// ============================================

import type { KnownBlock, PlainTextOption } from "@slack/web-api";
import { TIMEZONE_OFFSETS } from "../../lib/dataFiles.js";
import { clockEmojiForOffset } from "../../lib/time.js";
import { CONTEXT_MAX_LENGTH, type Workspace } from "../../workspace/settings.js";

export const ACTION_IDS = {
  modelSelect: "model_select",
  temperatureSelect: "temperature_select",
  timezoneOffsetSelect: "timezone_offset_select",
  contextSave: "context_save",
  contextInput: "context_input",
} as const;

export const CONTEXT_BLOCK_ID = "context_block";

function option(text: string, value: string): PlainTextOption {
  return { text: { type: "plain_text", text, emoji: true }, value };
}

export const MODEL_OPTIONS: PlainTextOption[] = [
  option(":rocket:  GPT 3.5", "gpt-3.5-turbo"),
  option(":zap:  GPT 4o", "gpt-4o"),
];

export const TEMPERATURE_OPTIONS: PlainTextOption[] = [
  option(":snowflake:  Focused (0)", "0.0"),
  option(":cloud:  Moderate (0.2)", "0.2"),
  option(":partly_sunny:  Balanced (0.4)", "0.4"),
  option(":sunny:  Creative (1.0)", "1.0"),
  option(":fire:  Random (2.0)", "2.0"),
];

export const TIMEZONE_OFFSET_OPTIONS: PlainTextOption[] = TIMEZONE_OFFSETS.map((offset) =>
  option(`${clockEmojiForOffset(offset)}  ${offset}`, offset)
);

const SPACER: KnownBlock = { type: "section", text: { type: "mrkdwn", text: " " } };
const DIVIDER: KnownBlock = { type: "divider" };
const SEPARATOR: KnownBlock[] = [SPACER, DIVIDER, SPACER];

/** Temperatures are stored as numbers; options use one decimal place */
export function temperatureOptionValue(temperature: number): string {
  return temperature.toFixed(1);
}

function selectSection(
  blockId: string,
  text: string,
  actionId: string,
  placeholder: string,
  options: PlainTextOption[],
  selected: string
): KnownBlock {
  const initialOption = options.find((o) => o.value === selected);
  return {
    type: "section",
    block_id: blockId,
    text: { type: "mrkdwn", text },
    accessory: {
      type: "static_select",
      action_id: actionId,
      placeholder: { type: "plain_text", text: placeholder },
      options,
      ...(initialOption && { initial_option: initialOption }),
    },
  };
}

export function buildHomeScreenBlocks(workspace: Workspace): KnownBlock[] {
  return [
    { type: "header", text: { type: "plain_text", text: ":wave:  Welcome", emoji: true } },
    {
      type: "section",
      text: {
        type: "mrkdwn",
        text: `To start a conversation, simply mention <@${workspace.botId}> in your message.`,
      },
    },
    ...SEPARATOR,
    selectSection(
      "model_block",
      ":zap:  *Choose your AI model*\n\nThis decides the intelligence level of your AI assistant.",
      ACTION_IDS.modelSelect,
      "Select an AI model",
      MODEL_OPTIONS,
      workspace.model
    ),
    ...SEPARATOR,
    selectSection(
      "temperature_block",
      ":thermometer:  *Set your preferred AI temperature*.\n\nThis adjusts the creativity of the AI assistant.",
      ACTION_IDS.temperatureSelect,
      "Select a temperature",
      TEMPERATURE_OPTIONS,
      temperatureOptionValue(workspace.temperature)
    ),
    ...SEPARATOR,
    selectSection(
      "timezone_offset_block",
      ":round_pushpin:  *Set your preferred timezone*.\n\nThis helps the AI assistant understand your local time.",
      ACTION_IDS.timezoneOffsetSelect,
      "Select a timezone offset",
      TIMEZONE_OFFSET_OPTIONS,
      workspace.timezoneOffset
    ),
    ...SEPARATOR,
    {
      type: "input",
      block_id: CONTEXT_BLOCK_ID,
      label: { type: "plain_text", text: ":speech_balloon:  Enter System Message", emoji: true },
      element: {
        type: "plain_text_input",
        action_id: ACTION_IDS.contextInput,
        multiline: true,
        max_length: CONTEXT_MAX_LENGTH,
        placeholder: { type: "plain_text", text: "Assistant is designed to be..." },
        initial_value: workspace.context,
      },
    },
    {
      type: "section",
      text: { type: "mrkdwn", text: "This message shapes how the AI interacts in your conversations." },
    },
    {
      type: "actions",
      elements: [
        {
          type: "button",
          text: { type: "plain_text", text: "Save" },
          value: "save",
          style: "primary",
          action_id: ACTION_IDS.contextSave,
        },
      ],
    },
    ...SEPARATOR,
    {
      type: "section",
      text: {
        type: "mrkdwn",
        text:
          ":bulb: *Tips*\n\n" +
          "- You can customize settings for each channel in its description or topic.\n" +
          "- Use :thermometer: for temperature, :round_pushpin: for timezone and :speech_balloon: for system message.\n" +
          "- Remember, channel topic > channel description > home screen in priority.",
      },
    },
  ];
}
