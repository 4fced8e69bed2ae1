// ============================================
// Slack Block Builder Tests
// ============================================

import { describe, it, expect } from "vitest";
import { buildChannelConfigurationBlocks } from "../src/slack/blocks/channelConfiguration.js";
import {
  ACTION_IDS,
  buildHomeScreenBlocks,
  CONTEXT_BLOCK_ID,
  TIMEZONE_OFFSET_OPTIONS,
  temperatureOptionValue,
} from "../src/slack/blocks/homeScreen.js";
import type { Workspace } from "../src/workspace/settings.js";

describe("buildChannelConfigurationBlocks", () => {
  it("is empty when the channel sets nothing", () => {
    expect(buildChannelConfigurationBlocks({})).toEqual([]);
  });

  it("summarizes every setting", () => {
    expect(buildChannelConfigurationBlocks({ temperature: 0.5, timezoneOffset: "+09:00", context: "Be terse." })).toEqual([
      { type: "section", text: { type: "plain_text", text: "Configuration is set for this channel" } },
      {
        type: "section",
        fields: [
          { type: "mrkdwn", text: "*AI temperature:*\n0.5" },
          { type: "mrkdwn", text: "*Timezone:*\n+09:00" },
        ],
      },
      { type: "section", text: { type: "mrkdwn", text: "*System Message*\nBe terse." } },
    ]);
  });

  it("shows a zero temperature", () => {
    const blocks = buildChannelConfigurationBlocks({ temperature: 0 });
    expect(blocks).toHaveLength(2);
    expect(blocks[1]).toEqual({ type: "section", fields: [{ type: "mrkdwn", text: "*AI temperature:*\n0" }] });
  });
});

describe("buildHomeScreenBlocks", () => {
  const workspace: Workspace = {
    teamId: "T1",
    botId: "UBOT",
    namespaceUuid: "6ba7b810-9dad-11d1-80b4-00c04fd430c8",
    model: "gpt-4o",
    temperature: 0.2,
    context: "Be helpful.",
    timezoneOffset: "+05:30",
  };

  const blocks = buildHomeScreenBlocks(workspace);

  function blockWithId(id: string) {
    return blocks.find((b) => b.block_id === id);
  }

  it("greets with a mention of the bot", () => {
    expect(blocks[0]).toEqual({ type: "header", text: { type: "plain_text", text: ":wave:  Welcome", emoji: true } });
    expect(JSON.stringify(blocks[1])).toContain("<@UBOT>");
  });

  it("preselects the current model, temperature and timezone", () => {
    expect(blockWithId("model_block")).toMatchObject({
      accessory: { action_id: ACTION_IDS.modelSelect, initial_option: { value: "gpt-4o" } },
    });
    expect(blockWithId("temperature_block")).toMatchObject({
      accessory: { action_id: ACTION_IDS.temperatureSelect, initial_option: { value: "0.2" } },
    });
    expect(blockWithId("timezone_offset_block")).toMatchObject({
      accessory: { action_id: ACTION_IDS.timezoneOffsetSelect, initial_option: { value: "+05:30" } },
    });
  });

  it("leaves the select empty when the value is not an option", () => {
    const custom = buildHomeScreenBlocks({ ...workspace, temperature: 0.7 });
    const block = custom.find((b) => b.block_id === "temperature_block");
    expect(block).toMatchObject({ accessory: { action_id: ACTION_IDS.temperatureSelect } });
    expect(JSON.stringify(block)).not.toContain("initial_option");
  });

  it("prefills the context input", () => {
    const input = blocks.find((b) => b.type === "input");
    expect(input).toMatchObject({
      block_id: CONTEXT_BLOCK_ID,
      element: { action_id: ACTION_IDS.contextInput, initial_value: "Be helpful.", max_length: 256 },
    });
  });

  it("offers one timezone option per allowed offset", () => {
    expect(TIMEZONE_OFFSET_OPTIONS).toHaveLength(34);
    expect(TIMEZONE_OFFSET_OPTIONS[0]).toEqual({
      text: { type: "plain_text", text: ":clock1:  -11:00", emoji: true },
      value: "-11:00",
    });
  });

  it("formats temperatures with one decimal", () => {
    expect(temperatureOptionValue(1)).toBe("1.0");
    expect(temperatureOptionValue(0.4)).toBe("0.4");
  });
});
