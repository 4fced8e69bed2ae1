// ============================================
// Handler services wired to in-process fakes
// ============================================

import { MemoryVectorEngine } from "./memoryEngine.js";
import { MemoryWorkspaceStore } from "./memoryWorkspaceStore.js";
import { ScriptedChatModel } from "./scriptedModel.js";
import { loadConfig } from "../../src/config/env.js";
import type { Services } from "../../src/handlers/context.js";
import type { ChatModelOptions } from "../../src/llm/client.js";

export const TEST_ENV = {
  SLACK_BOT_TOKEN: "xoxb-test",
  SLACK_SIGNING_SECRET: "test-secret",
  SUPABASE_URL: "https://test.supabase.co",
  SUPABASE_SERVICE_ROLE_KEY: "test-key",
  OPENAI_API_KEY: "test-key",
};

export interface TestServices extends Services {
  workspaces: MemoryWorkspaceStore;
  vectorEngine: MemoryVectorEngine;
  modelOptions: ChatModelOptions[];
}

export function createTestServices(model: ScriptedChatModel = new ScriptedChatModel([])): TestServices {
  const modelOptions: ChatModelOptions[] = [];
  return {
    config: loadConfig(TEST_ENV),
    workspaces: new MemoryWorkspaceStore(),
    vectorEngine: new MemoryVectorEngine(),
    modelOptions,
    createChatModel: (options) => {
      modelOptions.push(options);
      return model;
    },
  };
}

export function envelope<E>(event: E, teamId = "T1", botId = "UBOT") {
  return {
    team_id: teamId,
    event_time: 1629470261,
    authorizations: [{ user_id: botId }],
    event,
  };
}
