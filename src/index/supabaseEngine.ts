// ============================================
// Supabase vector engine — pgvector collections behind PostgREST
// Filter trees are evaluated in SQL (see supabase/migrations)
// ============================================

import crypto from "crypto";
import type { SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";
import type {
  CollectionSchema,
  FilterQuery,
  NearestQuery,
  VectorIndexEngine,
  WhereFilter,
} from "./engine.js";
import type { Embedder } from "./embeddings.js";
import type { Document } from "../documents/types.js";
import { indexError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";

const COLLECTIONS_TABLE = "vector_collections";
const DOCUMENTS_TABLE = "vector_documents";

const documentRowSchema = z.object({
  id: z.string(),
  content: z.string(),
  metadata: z.object({
    file_or_attachment_id: z.string(),
    content_type: z.string(),
    channel_type: z.string(),
    channel_id: z.string(),
    thread_ts: z.string(),
    ts: z.string(),
    permalink: z.string(),
    timestamp: z.string(),
  }),
});

function toDocuments(data: unknown, operation: string): Document[] {
  const parsed = z.array(documentRowSchema).safeParse(data ?? []);
  if (!parsed.success) {
    throw indexError(`Unexpected rows from ${operation}`, parsed.error);
  }
  return parsed.data.map((row) => ({ content: row.content, metadata: row.metadata }));
}

export class SupabaseVectorEngine implements VectorIndexEngine {
  constructor(
    private readonly supabase: SupabaseClient,
    private readonly embedder: Embedder
  ) {}

  async collectionExists(name: string): Promise<boolean> {
    const { data, error } = await this.supabase
      .from(COLLECTIONS_TABLE)
      .select("name")
      .eq("name", name)
      .maybeSingle();

    if (error) {
      throw indexError(`Failed to look up collection ${name}: ${error.message}`, error);
    }
    return data !== null;
  }

  async createCollection(name: string, schema: CollectionSchema): Promise<void> {
    // Concurrent first events for one workspace race here; the loser is a no-op
    const { error } = await this.supabase
      .from(COLLECTIONS_TABLE)
      .upsert(
        { name, description: schema.description, properties: schema.properties },
        { onConflict: "name", ignoreDuplicates: true }
      );

    if (error) {
      throw indexError(`Failed to create collection ${name}: ${error.message}`, error);
    }
  }

  async deleteCollection(name: string): Promise<void> {
    // Documents go with it (on delete cascade)
    const { error } = await this.supabase.from(COLLECTIONS_TABLE).delete().eq("name", name);

    if (error) {
      throw indexError(`Failed to delete collection ${name}: ${error.message}`, error);
    }
  }

  async addDocuments(name: string, documents: Document[], ids?: string[]): Promise<string[]> {
    if (documents.length === 0) return [];

    const embeddings = await this.embedder.embedChunks(documents.map((d) => d.content));
    if (embeddings.length !== documents.length) {
      throw indexError(`Got ${embeddings.length} embeddings for ${documents.length} documents`);
    }

    const rows = documents.map((document, i) => ({
      collection: name,
      id: ids?.[i] ?? crypto.randomUUID(),
      content: document.content,
      metadata: document.metadata,
      embedding: embeddings[i],
    }));

    const { error } = await this.supabase
      .from(DOCUMENTS_TABLE)
      .upsert(rows, { onConflict: "collection,id" });

    if (error) {
      throw indexError(`Failed to store documents in ${name}: ${error.message}`, error);
    }

    logger.debug("Stored documents", { stage: "index", index: name, count: rows.length });

    return rows.map((row) => row.id);
  }

  async deleteWhere(name: string, filter: WhereFilter): Promise<void> {
    const { error } = await this.supabase.rpc("delete_vector_documents", {
      collection_name: name,
      filter,
    });

    if (error) {
      throw indexError(`Failed to delete documents from ${name}: ${error.message}`, error);
    }
  }

  async queryNearest(name: string, query: NearestQuery): Promise<Document[]> {
    const embedding = await this.embedder.embedQuery(query.text);

    const { data, error } = await this.supabase.rpc("match_vector_documents", {
      collection_name: name,
      query_embedding: embedding,
      match_count: query.limit,
      filter: query.filter,
    });

    if (error) {
      throw indexError(`Similarity search failed in ${name}: ${error.message}`, error);
    }
    return toDocuments(data, "match_vector_documents");
  }

  async queryFilter(name: string, query: FilterQuery): Promise<Document[]> {
    const { data, error } = await this.supabase.rpc("filter_vector_documents", {
      collection_name: name,
      filter: query.filter,
      match_count: query.limit,
    });

    if (error) {
      throw indexError(`Filtered lookup failed in ${name}: ${error.message}`, error);
    }
    return toDocuments(data, "filter_vector_documents");
  }
}
