// ============================================
// Workspace settings — allowed values, defaults and validation
// ============================================

import { validationError } from "../lib/errors.js";
import { TIMEZONE_OFFSETS } from "../lib/dataFiles.js";
import { UTC_OFFSET } from "../lib/time.js";

export const MODELS: readonly string[] = ["gpt-3.5-turbo", "gpt-4o"];
export const DEFAULT_MODEL = "gpt-3.5-turbo";

export const TEMPERATURE_MIN = 0.0;
export const TEMPERATURE_MAX = 2.0;
export const DEFAULT_TEMPERATURE = 1.0;

export const CONTEXT_MAX_LENGTH = 256;
export const DEFAULT_CONTEXT =
  "Assistant is designed to be able to assist with a wide range of tasks, from answering simple questions to providing in-depth explanations and discussions on a wide range of topics.";

export const DEFAULT_TIMEZONE_OFFSET = UTC_OFFSET;

export interface WorkspaceSettings {
  model: string;
  temperature: number;
  context: string;
  timezoneOffset: string;
}

export interface Workspace extends WorkspaceSettings {
  teamId: string;
  botId: string;
  /** Namespace for deterministic message document ids */
  namespaceUuid: string;
}

export type WorkspaceSettingsPatch = Partial<WorkspaceSettings>;

export function validateModel(model: string): string {
  if (!MODELS.includes(model)) {
    throw validationError("MODEL_SELECT_ERROR", `Invalid model: ${model}`, { model });
  }
  return model;
}

export function validateTemperature(temperature: number): number {
  if (!(temperature >= TEMPERATURE_MIN && temperature <= TEMPERATURE_MAX)) {
    throw validationError("TEMPERATURE_RANGE_ERROR", `Temperature value out of range: ${temperature}`, {
      temperature,
    });
  }
  return temperature;
}

/** Parse a user-typed temperature such as "0.7" */
// Plain decimals with an optional exponent; no hex, binary or separators
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export function parseTemperature(raw: string): number {
  const trimmed = raw.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) {
    throw validationError("TEMPERATURE_RANGE_ERROR", `Invalid temperature value: ${raw}`, { raw });
  }
  return validateTemperature(Number(trimmed));
}

export function validateTimezoneOffset(offset: string): string {
  if (!TIMEZONE_OFFSETS.includes(offset)) {
    throw validationError("TIMEZONE_OFFSET_ERROR", `Invalid timezone offset: ${offset}`, { offset });
  }
  return offset;
}

export function validateContext(context: string): string {
  if (context.length > CONTEXT_MAX_LENGTH) {
    throw validationError(
      "CONTEXT_LENGTH_ERROR",
      `Context must be at most ${CONTEXT_MAX_LENGTH} characters, got ${context.length}`,
      { length: context.length }
    );
  }
  return context;
}

/** Validates every present field; the first invalid one throws */
export function validateSettingsPatch(patch: WorkspaceSettingsPatch): WorkspaceSettingsPatch {
  const validated: WorkspaceSettingsPatch = {};
  if (patch.model !== undefined) validated.model = validateModel(patch.model);
  if (patch.temperature !== undefined) validated.temperature = validateTemperature(patch.temperature);
  if (patch.context !== undefined) validated.context = validateContext(patch.context);
  if (patch.timezoneOffset !== undefined) validated.timezoneOffset = validateTimezoneOffset(patch.timezoneOffset);
  return validated;
}

export function defaultSettings(): WorkspaceSettings {
  return {
    model: DEFAULT_MODEL,
    temperature: DEFAULT_TEMPERATURE,
    context: DEFAULT_CONTEXT,
    timezoneOffset: DEFAULT_TIMEZONE_OFFSET,
  };
}
