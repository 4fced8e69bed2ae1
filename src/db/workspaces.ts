// ============================================
// Workspace CRUD Operations
// ============================================

import crypto from "crypto";
import type { SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";
import { notFoundError, storageError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import {
  defaultSettings,
  validateSettingsPatch,
  type Workspace,
  type WorkspaceSettingsPatch,
} from "../workspace/settings.js";

export interface WorkspaceStore {
  /** Throws NOT_FOUND when the team has no configuration */
  get(teamId: string): Promise<Workspace>;
  getOrCreate(teamId: string, botId: string): Promise<Workspace>;
  /** Validates every field first; one invalid field rejects the whole write */
  update(teamId: string, patch: WorkspaceSettingsPatch): Promise<Workspace>;
  delete(teamId: string): Promise<void>;
}

const TABLE = "workspaces";

/** PostgREST: no rows for .single() */
const NO_ROWS = "PGRST116";
/** Postgres: unique_violation */
const UNIQUE_VIOLATION = "23505";

const workspaceRowSchema = z.object({
  team_id: z.string(),
  bot_id: z.string(),
  namespace_uuid: z.string().uuid(),
  model: z.string(),
  temperature: z.number(),
  context: z.string(),
  timezone_offset: z.string(),
});

type WorkspaceRow = z.infer<typeof workspaceRowSchema>;

function toWorkspace(data: unknown): Workspace {
  const parsed = workspaceRowSchema.safeParse(data);
  if (!parsed.success) {
    throw storageError("Unexpected workspace row shape", parsed.error);
  }
  const row = parsed.data;
  return {
    teamId: row.team_id,
    botId: row.bot_id,
    namespaceUuid: row.namespace_uuid,
    model: row.model,
    temperature: row.temperature,
    context: row.context,
    timezoneOffset: row.timezone_offset,
  };
}

function toRowPatch(patch: WorkspaceSettingsPatch): Partial<WorkspaceRow> {
  const row: Partial<WorkspaceRow> = {};
  if (patch.model !== undefined) row.model = patch.model;
  if (patch.temperature !== undefined) row.temperature = patch.temperature;
  if (patch.context !== undefined) row.context = patch.context;
  if (patch.timezoneOffset !== undefined) row.timezone_offset = patch.timezoneOffset;
  return row;
}

export class SupabaseWorkspaceStore implements WorkspaceStore {
  constructor(private readonly supabase: SupabaseClient) {}

  private async find(teamId: string): Promise<Workspace | null> {
    const { data, error } = await this.supabase.from(TABLE).select("*").eq("team_id", teamId).single();

    if (error) {
      if (error.code === NO_ROWS) return null;
      logger.error("Error finding workspace", { stage: "db", teamId, error: error.message });
      throw storageError(`Failed to load workspace ${teamId}: ${error.message}`, error);
    }

    return toWorkspace(data);
  }

  async get(teamId: string): Promise<Workspace> {
    const workspace = await this.find(teamId);
    if (!workspace) {
      throw notFoundError(`Workspace not found: ${teamId}`, { teamId });
    }
    return workspace;
  }

  async getOrCreate(teamId: string, botId: string): Promise<Workspace> {
    const existing = await this.find(teamId);
    if (existing) return existing;

    const defaults = defaultSettings();
    const { data, error } = await this.supabase
      .from(TABLE)
      .insert({
        team_id: teamId,
        bot_id: botId,
        namespace_uuid: crypto.randomUUID(),
        model: defaults.model,
        temperature: defaults.temperature,
        context: defaults.context,
        timezone_offset: defaults.timezoneOffset,
      })
      .select("*")
      .single();

    if (error) {
      // Another event for the same team created it first
      if (error.code === UNIQUE_VIOLATION) {
        return this.get(teamId);
      }
      logger.error("Error creating workspace", { stage: "db", teamId, error: error.message });
      throw storageError(`Failed to create workspace ${teamId}: ${error.message}`, error);
    }

    logger.info("Created workspace configuration", { stage: "db", teamId });
    return toWorkspace(data);
  }

  async update(teamId: string, patch: WorkspaceSettingsPatch): Promise<Workspace> {
    const validated = validateSettingsPatch(patch);

    const { data, error } = await this.supabase
      .from(TABLE)
      .update({ ...toRowPatch(validated), updated_at: new Date().toISOString() })
      .eq("team_id", teamId)
      .select("*")
      .maybeSingle();

    if (error) {
      logger.error("Error updating workspace", { stage: "db", teamId, error: error.message });
      throw storageError(`Failed to update workspace ${teamId}: ${error.message}`, error);
    }
    if (data === null) {
      throw notFoundError(`Workspace not found: ${teamId}`, { teamId });
    }

    return toWorkspace(data);
  }

  async delete(teamId: string): Promise<void> {
    const { error } = await this.supabase.from(TABLE).delete().eq("team_id", teamId);

    if (error) {
      logger.error("Error deleting workspace", { stage: "db", teamId, error: error.message });
      throw storageError(`Failed to delete workspace ${teamId}: ${error.message}`, error);
    }
  }
}
