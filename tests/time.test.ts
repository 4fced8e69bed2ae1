// ============================================
// Time Helper Tests
// ============================================

import { describe, it, expect } from "vitest";
import {
  clockEmojiForOffset,
  epochToIsoTimestamp,
  formatIsoWithOffset,
  offsetToMinutes,
  slackTsToDate,
} from "../src/lib/time.js";
import { isRecallError } from "../src/lib/errors.js";

const AUG_20 = new Date(Date.UTC(2021, 7, 20, 14, 37, 41));

describe("offsetToMinutes", () => {
  it("parses signed offsets", () => {
    expect(offsetToMinutes("+05:30")).toBe(330);
    expect(offsetToMinutes("-03:30")).toBe(-210);
    expect(offsetToMinutes("+00:00")).toBe(0);
  });

  it("rejects malformed offsets", () => {
    expect(() => offsetToMinutes("0530")).toThrow("Invalid timezone offset: 0530");
  });
});

describe("formatIsoWithOffset", () => {
  it("renders UTC with an explicit offset", () => {
    expect(formatIsoWithOffset(AUG_20)).toBe("2021-08-20T14:37:41+00:00");
  });

  it("shifts the wall clock to the offset", () => {
    expect(formatIsoWithOffset(AUG_20, "+09:00")).toBe("2021-08-20T23:37:41+09:00");
    expect(formatIsoWithOffset(AUG_20, "-03:30")).toBe("2021-08-20T11:07:41-03:30");
  });

  it("shows microseconds only when there are milliseconds", () => {
    const withMillis = new Date(AUG_20.getTime() + 250);
    expect(formatIsoWithOffset(withMillis)).toBe("2021-08-20T14:37:41.250000+00:00");
  });
});

describe("epochToIsoTimestamp", () => {
  it("converts epoch seconds", () => {
    expect(epochToIsoTimestamp(1629470261)).toBe("2021-08-20T14:37:41+00:00");
  });

  it("fails with CONVERSION_ERROR outside the calendar range", () => {
    try {
      epochToIsoTimestamp(1e12);
      expect.unreachable();
    } catch (err) {
      expect(isRecallError(err, "CONVERSION_ERROR")).toBe(true);
      expect(err instanceof Error && err.message).toBe("Error converting date: 1000000000000");
    }
  });

  it("fails on non-finite input", () => {
    expect(() => epochToIsoTimestamp(Number.NaN)).toThrow("Error converting date: NaN");
  });
});

describe("slackTsToDate", () => {
  it("reads the seconds and fraction of a message ts", () => {
    expect(slackTsToDate("1629470261.250000").getTime()).toBe(1629470261250);
  });

  it("rejects non-numeric ts values", () => {
    expect(() => slackTsToDate("yesterday")).toThrow("Error converting date: yesterday");
  });
});

describe("clockEmojiForOffset", () => {
  it("uses the hour hand of the offset", () => {
    expect(clockEmojiForOffset("+09:00")).toBe(":clock9:");
    expect(clockEmojiForOffset("-11:00")).toBe(":clock1:");
  });

  it("shows twelve for midnight", () => {
    expect(clockEmojiForOffset("+00:00")).toBe(":clock12:");
    expect(clockEmojiForOffset("+12:00")).toBe(":clock12:");
  });

  it("uses half-hour clocks", () => {
    expect(clockEmojiForOffset("+05:30")).toBe(":clock530:");
    expect(clockEmojiForOffset("-03:30")).toBe(":clock830:");
    expect(clockEmojiForOffset("-09:30")).toBe(":clock230:");
  });
});
