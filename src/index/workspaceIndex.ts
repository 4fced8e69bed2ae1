// ============================================
// Workspace Index — one vector collection per Slack workspace
// ============================================

import type { VectorIndexEngine, WhereFilter } from "./engine.js";
import { loadPlaceholderDocuments } from "../documents/loaders/placeholder.js";
import { METADATA_FIELDS, type Document, type MetadataField } from "../documents/types.js";
import { indexError, isRecallError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";

export function indexNameForTeam(teamId: string): string {
  return `Message${teamId}`;
}

export class WorkspaceIndex {
  readonly teamId: string;
  readonly name: string;
  private readonly engine: VectorIndexEngine;

  constructor(engine: VectorIndexEngine, teamId: string) {
    this.engine = engine;
    this.teamId = teamId;
    this.name = indexNameForTeam(teamId);
  }

  /** Run an engine call, surfacing any failure as INDEX_ERROR */
  private async guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (isRecallError(err, "INDEX_ERROR")) throw err;
      throw indexError(`Vector index ${operation} failed for ${this.name}`, err, {
        teamId: this.teamId,
        operation,
      });
    }
  }

  /** Create the collection with its schema and placeholder if missing */
  async ensureIndex(): Promise<void> {
    await this.guard("ensure", async () => {
      if (await this.engine.collectionExists(this.name)) {
        return;
      }

      await this.engine.createCollection(this.name, {
        description: `Slack messages, files and links of workspace ${this.teamId}`,
        properties: METADATA_FIELDS,
      });
      await this.engine.addDocuments(this.name, loadPlaceholderDocuments());

      logger.info("Created workspace index", { stage: "index", teamId: this.teamId, index: this.name });
    });
  }

  /** Add documents one at a time; ids, when given, pair up by position */
  async addDocuments(documents: Document[], ids?: string[]): Promise<string[]> {
    if (ids && ids.length !== documents.length) {
      throw indexError(`Got ${ids.length} ids for ${documents.length} documents`, undefined, {
        teamId: this.teamId,
      });
    }

    return this.guard("add", async () => {
      const stored: string[] = [];
      for (const [i, document] of documents.entries()) {
        const id = ids?.[i];
        const added = await this.engine.addDocuments(this.name, [document], id === undefined ? undefined : [id]);
        stored.push(...added);
      }
      return stored;
    });
  }

  private async deleteWhereEqual(field: MetadataField, value: string): Promise<void> {
    await this.guard(`delete by ${field}`, () =>
      this.engine.deleteWhere(this.name, { path: [field], operator: "Equal", valueString: value })
    );
    logger.debug("Deleted documents", { stage: "index", teamId: this.teamId, field, value });
  }

  async deleteMessage(ts: string): Promise<void> {
    await this.deleteWhereEqual("ts", ts);
  }

  async deleteFileOrAttachment(fileOrAttachmentId: string): Promise<void> {
    await this.deleteWhereEqual("file_or_attachment_id", fileOrAttachmentId);
  }

  async deleteChannel(channelId: string): Promise<void> {
    await this.deleteWhereEqual("channel_id", channelId);
  }

  /** No-op when the collection was never created */
  async deleteIndex(): Promise<void> {
    await this.guard("delete index", async () => {
      if (!(await this.engine.collectionExists(this.name))) {
        return;
      }
      await this.engine.deleteCollection(this.name);
      logger.info("Deleted workspace index", { stage: "index", teamId: this.teamId, index: this.name });
    });
  }

  async similaritySearch(query: string, filter: WhereFilter, limit: number): Promise<Document[]> {
    return this.guard("search", () => this.engine.queryNearest(this.name, { text: query, filter, limit }));
  }

  async findOne(filter: WhereFilter): Promise<Document | undefined> {
    const [first] = await this.guard("lookup", () => this.engine.queryFilter(this.name, { filter, limit: 1 }));
    return first;
  }
}
