// ============================================
// Time helpers — Slack epochs to ISO-8601 with explicit offsets
// ============================================

import { RecallError, validationError } from "./errors.js";

export const UTC_OFFSET = "+00:00";

// 0001-01-01T00:00:00Z .. 9999-12-31T23:59:59.999Z
const MIN_DATE_MS = -62135596800000;
const MAX_DATE_MS = 253402300799999;

const OFFSET_PATTERN = /^([+-])(\d{2}):(\d{2})$/;

/** "+05:30" → 330, "-03:30" → -210 */
export function offsetToMinutes(offset: string): number {
  const match = OFFSET_PATTERN.exec(offset);
  if (!match) {
    throw validationError("TIMEZONE_OFFSET_ERROR", `Invalid timezone offset: ${offset}`, { offset });
  }
  const [, sign, hours, minutes] = match;
  const total = Number(hours) * 60 + Number(minutes);
  return sign === "-" ? -total : total;
}

/**
 * Render a date as local time at the given offset,
 * e.g. 2021-08-20T23:37:41+09:00. Milliseconds appear only when non-zero.
 */
export function formatIsoWithOffset(date: Date, offset: string = UTC_OFFSET): string {
  const shifted = new Date(date.getTime() + offsetToMinutes(offset) * 60_000);
  const iso = shifted.toISOString();
  const base = iso.slice(0, 19);
  const millis = iso.slice(20, 23);
  const fraction = millis === "000" ? "" : `.${millis}000`;
  return `${base}${fraction}${offset}`;
}

/** Epoch seconds → "2021-08-20T14:37:41+00:00"; fails fast on values no calendar date can hold */
export function epochToIsoTimestamp(epochSeconds: number): string {
  const millis = epochSeconds * 1000;
  if (!Number.isFinite(millis) || millis < MIN_DATE_MS || millis > MAX_DATE_MS) {
    throw new RecallError({
      code: "CONVERSION_ERROR",
      message: `Error converting date: ${epochSeconds}`,
      context: { epochSeconds },
    });
  }
  return formatIsoWithOffset(new Date(millis), UTC_OFFSET);
}

/** Slack message ts ("1629470261.000200") → Date */
export function slackTsToDate(ts: string): Date {
  const seconds = Number(ts);
  if (!Number.isFinite(seconds)) {
    throw new RecallError({
      code: "CONVERSION_ERROR",
      message: `Error converting date: ${ts}`,
      context: { ts },
    });
  }
  return new Date(seconds * 1000);
}

/** Clock emoji for an offset: "+09:00" → ":clock9:", "+05:30" → ":clock530:" */
export function clockEmojiForOffset(offset: string): string {
  const [hoursPart = "0", minutesPart = "0"] = offset.split(":");
  let hours = Number(hoursPart);
  const minutes = Number(minutesPart);

  if (hours < 0 && minutes === 30) {
    hours -= 1;
  }

  const clockHours = (hours + 12) % 12;

  if (minutes === 30) {
    return `:clock${clockHours}30:`;
  }
  return `:clock${clockHours === 0 ? 12 : clockHours}:`;
}
