// ============================================
// Scoped retriever — search a workspace index within a mention's scope
// ============================================

import { buildPermalinkFilter, buildRetrievalFilter, type RetrievalScope } from "./scope.js";
import type { WorkspaceIndex } from "../index/workspaceIndex.js";
import type { Document } from "../documents/types.js";
import { DOCUMENT_NOT_FOUND } from "../llm/prompts.js";
import { logger } from "../lib/logger.js";

/** What the conversation tools can ask of the index */
export interface ConversationSearch {
  search(query: string): Promise<Document[]>;
  /** Content of the document stored under this permalink */
  searchUrl(url: string): Promise<string>;
}

export const DEFAULT_SEARCH_LIMIT = 4;

export class ScopedRetriever implements ConversationSearch {
  constructor(
    private readonly index: Pick<WorkspaceIndex, "similaritySearch" | "findOne">,
    readonly scope: RetrievalScope,
    private readonly limit: number = DEFAULT_SEARCH_LIMIT
  ) {}

  async search(query: string): Promise<Document[]> {
    const documents = await this.index.similaritySearch(query, buildRetrievalFilter(this.scope), this.limit);

    logger.info("Retrieved documents", {
      stage: "retrieval",
      channelId: this.scope.channelId,
      threadTs: this.scope.threadTs,
      count: documents.length,
    });

    return documents;
  }

  async searchUrl(url: string): Promise<string> {
    const document = await this.index.findOne(buildPermalinkFilter(this.scope, url));
    return document?.content ?? DOCUMENT_NOT_FOUND;
  }
}
