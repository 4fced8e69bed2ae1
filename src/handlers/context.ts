// ============================================
// Handler context — collaborators shared by every event handler
// ============================================

import type { AppConfig } from "../config/env.js";
import type { WorkspaceStore } from "../db/workspaces.js";
import type { VectorIndexEngine } from "../index/engine.js";
import { WorkspaceIndex } from "../index/workspaceIndex.js";
import { RecallError } from "../lib/errors.js";
import type { ChatModelFactory } from "../llm/client.js";

export interface Services {
  config: AppConfig;
  workspaces: WorkspaceStore;
  vectorEngine: VectorIndexEngine;
  createChatModel: ChatModelFactory;
}

export function workspaceIndex(services: Services, teamId: string): WorkspaceIndex {
  return new WorkspaceIndex(services.vectorEngine, teamId);
}

/** The bot's own user id, from the event authorizations */
export function botUserId(envelope: { authorizations: Array<{ user_id: string }> }): string {
  const [authorization] = envelope.authorizations;
  if (!authorization) {
    throw new RecallError({ code: "SLACK_API_ERROR", message: "Event carries no authorizations" });
  }
  return authorization.user_id;
}
