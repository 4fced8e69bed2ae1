// ============================================
// Embeddings — OpenAI embedding generation
// Pin versions for retrieval determinism.
// ============================================

import { getEncoding, type Tiktoken } from "js-tiktoken";
import type OpenAI from "openai";
import { logger } from "../lib/logger.js";

/**
 * Embedding model version.
 * PINNED for retrieval determinism - bump carefully.
 * Must match the vector column width in supabase/migrations.
 */
export const EMBEDDING_MODEL = "text-embedding-3-large";
export const EMBEDDING_DIMENSIONS = 1536;

/** Input limit of the embedding model, in cl100k_base tokens */
export const EMBEDDING_MAX_INPUT_TOKENS = 8191;

let embeddingEncoding: Tiktoken | undefined;

/** Cut text to the embedding model's input limit; text that fits is returned unchanged */
export function fitEmbeddingInput(text: string): string {
  embeddingEncoding ??= getEncoding("cl100k_base");
  const tokens = embeddingEncoding.encode(text, [], []);
  if (tokens.length <= EMBEDDING_MAX_INPUT_TOKENS) {
    return text;
  }
  logger.warn("Embedding input cut to the model limit", {
    stage: "index",
    tokens: tokens.length,
    limit: EMBEDDING_MAX_INPUT_TOKENS,
  });
  return embeddingEncoding.decode(tokens.slice(0, EMBEDDING_MAX_INPUT_TOKENS));
}

export interface Embedder {
  embedQuery(text: string): Promise<number[]>;
  embedChunks(texts: string[]): Promise<number[][]>;
}

export function createEmbedder(openai: OpenAI): Embedder {
  async function embedChunks(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];
    try {
      const response = await openai.embeddings.create({
        model: EMBEDDING_MODEL,
        input: texts.map(fitEmbeddingInput),
        dimensions: EMBEDDING_DIMENSIONS,
      });
      return response.data.map((d) => d.embedding);
    } catch (err) {
      logger.error("Batch embedding generation failed", {
        stage: "index",
        textCount: texts.length,
        error: err,
      });
      throw err;
    }
  }

  async function embedQuery(text: string): Promise<number[]> {
    const [embedding] = await embedChunks([text]);
    if (!embedding) {
      throw new Error("No embedding returned from OpenAI");
    }
    return embedding;
  }

  return { embedQuery, embedChunks };
}
