// ============================================
// Channel settings — per-channel overrides in topic and description
//
//   :thermometer: 0.3
//   :round_pushpin: +09:00
//   :speech_balloon: You answer questions about the billing service.
// ============================================

import { parseTemperature, validateTimezoneOffset } from "../workspace/settings.js";

export const TEMPERATURE_EMOJI = ":thermometer:";
export const TIMEZONE_OFFSET_EMOJI = ":round_pushpin:";
export const CONTEXT_EMOJI = ":speech_balloon:";

export interface ChannelSettings {
  temperature?: number;
  timezoneOffset?: string;
  context?: string;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Text after `emoji` at the start of a line, up to the next line that
 * opens with another emoji code or the end of the text.
 */
export function extractEmojiText(text: string, emoji: string): string | undefined {
  const pattern = new RegExp(`(?:^|\\n)${escapeRegExp(emoji)}([\\s\\S]*?)(?=\\n:[^\\s:]+:|$)`);
  const match = pattern.exec(text);
  const value = match?.[1]?.trim();
  return value ? value : undefined;
}

/** Topic wins over description; invalid temperature or offset throws */
export function parseChannelSettings(topic: string, description: string): ChannelSettings {
  const read = (emoji: string) => extractEmojiText(topic, emoji) ?? extractEmojiText(description, emoji);

  const settings: ChannelSettings = {};

  const temperature = read(TEMPERATURE_EMOJI);
  if (temperature !== undefined) {
    settings.temperature = parseTemperature(temperature);
  }

  const timezoneOffset = read(TIMEZONE_OFFSET_EMOJI);
  if (timezoneOffset !== undefined) {
    settings.timezoneOffset = validateTimezoneOffset(timezoneOffset);
  }

  const context = read(CONTEXT_EMOJI);
  if (context !== undefined) {
    settings.context = context;
  }

  return settings;
}
