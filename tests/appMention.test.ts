// ============================================
// Mention Handler Tests
// ============================================

import { describe, it, expect } from "vitest";
import { handleAppMention } from "../src/handlers/appMention.js";
import { getUserMessage } from "../src/lib/errors.js";
import type { AppMentionEnvelope } from "../src/slack/types.js";
import { FakeSlack } from "./helpers/fakeSlack.js";
import { callTool, reply, ScriptedChatModel } from "./helpers/scriptedModel.js";
import { createTestServices, envelope } from "./helpers/services.js";
import { CONVERSATION_SEARCH_TOOL_NAME } from "../src/llm/prompts.js";

function mention(overrides: Partial<AppMentionEnvelope["event"]> = {}): AppMentionEnvelope {
  return envelope({
    channel: "C1",
    user: "U1",
    text: "<@UBOT> when is the release?",
    ts: "1629470261.000200",
    ...overrides,
  });
}

describe("handleAppMention", () => {
  it("answers in the thread of the mention", async () => {
    const model = new ScriptedChatModel([reply("Friday.")]);
    const services = createTestServices(model);
    const slack = new FakeSlack({ thread: [mention().event] });

    await handleAppMention(services, slack, mention());

    expect(slack.posted).toEqual([{ channel: "C1", text: "Friday.", threadTs: "1629470261.000200" }]);
    expect(services.modelOptions).toEqual([{ model: "gpt-3.5-turbo", temperature: 1 }]);
    expect(services.vectorEngine.collections.has("MessageT1")).toBe(true);
  });

  it("replies in the existing thread of a reply", async () => {
    const model = new ScriptedChatModel([reply("ok")]);
    const services = createTestServices(model);
    const event = mention({ thread_ts: "1629470000.000100" });
    const slack = new FakeSlack({
      thread: [{ ts: "1629470000.000100", user: "U2", text: "release plan" }, event.event],
    });

    await handleAppMention(services, slack, event);

    expect(slack.posted[0]?.threadTs).toBe("1629470000.000100");
    expect(model.requests[0]?.messages.map((m) => m.role)).toEqual(["system", "user", "user"]);
  });

  it("applies channel overrides from the topic", async () => {
    const model = new ScriptedChatModel([reply("ok")]);
    const services = createTestServices(model);
    const slack = new FakeSlack({
      channel: { topic: ":thermometer: 0\n:speech_balloon: Reply in French." },
      thread: [mention().event],
    });

    await handleAppMention(services, slack, mention());

    expect(services.modelOptions).toEqual([{ model: "gpt-3.5-turbo", temperature: 0 }]);
    expect(model.requests[0]?.messages[0]?.content).toContain("Reply in French.");
  });

  it("searches only what a public channel may see", async () => {
    const model = new ScriptedChatModel([
      callTool(CONVERSATION_SEARCH_TOOL_NAME, { query: "release date" }),
      reply("Friday."),
    ]);
    const services = createTestServices(model);
    const slack = new FakeSlack({ thread: [mention().event] });

    await handleAppMention(services, slack, mention());

    expect(services.vectorEngine.queries).toEqual([
      {
        text: "release date",
        filter: {
          operator: "And",
          operands: [
            { path: ["channel_type"], operator: "Equal", valueString: "channel" },
            { path: ["thread_ts"], operator: "NotEqual", valueString: "1629470261.000200" },
          ],
        },
        limit: 4,
      },
    ]);
    expect(slack.posted[0]?.text).toBe("Friday.");
  });

  it("apologizes for an invalid channel temperature", async () => {
    const model = new ScriptedChatModel([]);
    const services = createTestServices(model);
    const slack = new FakeSlack({ channel: { topic: ":thermometer: 5.0" } });

    await handleAppMention(services, slack, mention());

    expect(slack.posted).toEqual([
      {
        channel: "C1",
        text: getUserMessage({ code: "TEMPERATURE_RANGE_ERROR", message: "" }),
        threadTs: "1629470261.000200",
      },
    ]);
    expect(model.requests).toHaveLength(0);
  });

  it("apologizes when the model fails", async () => {
    const services = createTestServices(new ScriptedChatModel([new Error("timeout")]));
    const slack = new FakeSlack({ thread: [mention().event] });

    await handleAppMention(services, slack, mention());

    expect(slack.posted[0]?.text).toBe("I'm sorry, something went wrong.");
  });

  it("ignores edited mentions", async () => {
    const model = new ScriptedChatModel([]);
    const services = createTestServices(model);
    const slack = new FakeSlack();

    await handleAppMention(services, slack, mention({ edited: { user: "U1", ts: "1629470300.000100" } }));

    expect(slack.posted).toEqual([]);
    expect(services.modelOptions).toEqual([]);
  });
});
