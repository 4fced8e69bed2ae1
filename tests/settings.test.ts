// ============================================
// Workspace and Channel Settings Tests
// ============================================

import { describe, it, expect } from "vitest";
import { resolveEffectiveSettings } from "../src/conversation/settings.js";
import { isRecallError } from "../src/lib/errors.js";
import { extractEmojiText, parseChannelSettings } from "../src/slack/channelSettings.js";
import {
  defaultSettings,
  parseTemperature,
  validateContext,
  validateModel,
  validateSettingsPatch,
  validateTemperature,
  validateTimezoneOffset,
} from "../src/workspace/settings.js";

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
    return undefined;
  } catch (err) {
    return isRecallError(err) ? err.code : "not a RecallError";
  }
}

describe("workspace setting validation", () => {
  it("accepts the selectable models only", () => {
    expect(validateModel("gpt-4o")).toBe("gpt-4o");
    expect(codeOf(() => validateModel("gpt-4"))).toBe("MODEL_SELECT_ERROR");
  });

  it("bounds temperature to 0.0 - 2.0 inclusive", () => {
    expect(validateTemperature(0)).toBe(0);
    expect(validateTemperature(2)).toBe(2);
    expect(codeOf(() => validateTemperature(2.1))).toBe("TEMPERATURE_RANGE_ERROR");
    expect(codeOf(() => validateTemperature(-0.1))).toBe("TEMPERATURE_RANGE_ERROR");
    expect(codeOf(() => validateTemperature(Number.NaN))).toBe("TEMPERATURE_RANGE_ERROR");
  });

  it("parses typed temperatures", () => {
    expect(parseTemperature(" 0.7 ")).toBe(0.7);
    expect(codeOf(() => parseTemperature("warm"))).toBe("TEMPERATURE_RANGE_ERROR");
    expect(codeOf(() => parseTemperature(""))).toBe("TEMPERATURE_RANGE_ERROR");
  });

  it("reads decimal forms only", () => {
    expect(parseTemperature("1.")).toBe(1);
    expect(parseTemperature(".5")).toBe(0.5);
    expect(parseTemperature("+1.5")).toBe(1.5);
    expect(parseTemperature("1e0")).toBe(1);
    for (const raw of ["0x1", "0b1", "0o1", "1_0", "Infinity", "1.5.2", "."]) {
      expect(codeOf(() => parseTemperature(raw))).toBe("TEMPERATURE_RANGE_ERROR");
    }
  });

  it("accepts listed timezone offsets only", () => {
    expect(validateTimezoneOffset("+05:30")).toBe("+05:30");
    expect(codeOf(() => validateTimezoneOffset("+01:30"))).toBe("TIMEZONE_OFFSET_ERROR");
  });

  it("caps context at 256 characters", () => {
    expect(validateContext("a".repeat(256))).toHaveLength(256);
    expect(codeOf(() => validateContext("a".repeat(257)))).toBe("CONTEXT_LENGTH_ERROR");
  });

  it("validates only the fields a patch carries", () => {
    expect(validateSettingsPatch({ temperature: 0.4 })).toEqual({ temperature: 0.4 });
    expect(codeOf(() => validateSettingsPatch({ model: "gpt-4o", timezoneOffset: "+99:00" }))).toBe(
      "TIMEZONE_OFFSET_ERROR"
    );
  });

  it("defaults to gpt-3.5-turbo at temperature 1 in UTC", () => {
    const defaults = defaultSettings();
    expect(defaults.model).toBe("gpt-3.5-turbo");
    expect(defaults.temperature).toBe(1);
    expect(defaults.timezoneOffset).toBe("+00:00");
  });
});

describe("extractEmojiText", () => {
  it("reads the text after an emoji on its own line", () => {
    expect(extractEmojiText(":thermometer: 0.3", ":thermometer:")).toBe("0.3");
  });

  it("stops at the next emoji line", () => {
    const text = "Team channel\n:thermometer: 0.3\n:round_pushpin: +09:00";
    expect(extractEmojiText(text, ":thermometer:")).toBe("0.3");
    expect(extractEmojiText(text, ":round_pushpin:")).toBe("+09:00");
  });

  it("keeps multi-line values", () => {
    const text = ":speech_balloon: Answer briefly.\nUse bullet points.\n:thermometer: 1";
    expect(extractEmojiText(text, ":speech_balloon:")).toBe("Answer briefly.\nUse bullet points.");
  });

  it("ignores emoji in the middle of a line", () => {
    expect(extractEmojiText("it is hot :thermometer: 2.0", ":thermometer:")).toBeUndefined();
  });

  it("treats an empty value as unset", () => {
    expect(extractEmojiText(":thermometer:   ", ":thermometer:")).toBeUndefined();
  });
});

describe("parseChannelSettings", () => {
  it("returns nothing for plain topics", () => {
    expect(parseChannelSettings("Release planning", "")).toEqual({});
  });

  it("prefers the topic over the description", () => {
    const settings = parseChannelSettings(":thermometer: 0.2", ":thermometer: 1.5\n:speech_balloon: Be terse.");
    expect(settings).toEqual({ temperature: 0.2, context: "Be terse." });
  });

  it("rejects out-of-range temperatures", () => {
    expect(codeOf(() => parseChannelSettings(":thermometer: 5.0", ""))).toBe("TEMPERATURE_RANGE_ERROR");
  });

  it("rejects unknown timezone offsets", () => {
    expect(codeOf(() => parseChannelSettings("", ":round_pushpin: +01:30"))).toBe("TIMEZONE_OFFSET_ERROR");
  });
});

describe("resolveEffectiveSettings", () => {
  const workspace = { model: "gpt-4o", temperature: 1, context: "Workspace context", timezoneOffset: "+00:00" };

  it("uses workspace values when the channel sets nothing", () => {
    expect(resolveEffectiveSettings(workspace, {})).toEqual(workspace);
  });

  it("lets the channel override everything but the model", () => {
    expect(
      resolveEffectiveSettings(workspace, { temperature: 0, context: "Channel context", timezoneOffset: "+09:00" })
    ).toEqual({ model: "gpt-4o", temperature: 0, context: "Channel context", timezoneOffset: "+09:00" });
  });
});
