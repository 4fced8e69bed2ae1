// ============================================
// Conversation Memory Tests
// ============================================

import { describe, it, expect } from "vitest";
import { TokenBufferMemory } from "../src/conversation/memory.js";
import { formatThreadMessage } from "../src/conversation/format.js";
import { TextBudgeter } from "../src/documents/textBudget.js";

const budgeter = new TextBudgeter("gpt-3.5-turbo");

describe("TokenBufferMemory", () => {
  it("defaults to the model budget", () => {
    expect(new TokenBufferMemory(budgeter).maxTokens).toBe(3000);
  });

  it("keeps messages in order with their roles", () => {
    const memory = new TokenBufferMemory(budgeter);
    memory.addUserMessage("message one");
    memory.addAssistantMessage("message two");

    expect(memory.messages).toEqual([
      { role: "user", content: "message one" },
      { role: "assistant", content: "message two" },
    ]);
    expect(memory.tokenCount).toBe(4);
  });

  it("drops the oldest messages once over budget", () => {
    const memory = new TokenBufferMemory(budgeter, 4);
    memory.addUserMessage("message one");
    memory.addAssistantMessage("message two");
    memory.addUserMessage("message three");

    expect(memory.messages.map((m) => m.content)).toEqual(["message two", "message three"]);
    expect(memory.tokenCount).toBe(4);
  });

  it("drops even the newest message when it alone is too large", () => {
    const memory = new TokenBufferMemory(budgeter, 1);
    memory.addUserMessage("message one");

    expect(memory.messages).toEqual([]);
    expect(memory.tokenCount).toBe(0);
  });
});

describe("formatThreadMessage", () => {
  const message = { ts: "1629470261.000200", user: "U1", text: "When is the release?" };

  it("renders the message as an action record", () => {
    expect(JSON.parse(formatThreadMessage(message, budgeter))).toEqual({
      user_id: "U1",
      action: "Message",
      action_input: "When is the release?",
    });
  });

  it("adds a local timestamp when an offset is given", () => {
    expect(JSON.parse(formatThreadMessage(message, budgeter, { timezoneOffset: "+09:00" }))).toEqual({
      user_id: "U1",
      action: "Message",
      action_input: "When is the release?",
      timestamp: "2021-08-20T23:37:41+09:00",
    });
  });
});
