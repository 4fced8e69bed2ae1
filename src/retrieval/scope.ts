// ============================================
// Retrieval scope — which documents a mention may see
// ============================================

import type { WhereCondition, WhereFilter } from "../index/engine.js";
import type { MetadataField } from "../documents/types.js";

export interface RetrievalScope {
  /** Channel the mention came from */
  channelId: string;
  isPrivate: boolean;
  /** Thread being answered; its own messages are already in memory */
  threadTs: string;
}

function equal(field: MetadataField, value: string): WhereCondition {
  return { path: [field], operator: "Equal", valueString: value };
}

function notEqual(field: MetadataField, value: string): WhereCondition {
  return { path: [field], operator: "NotEqual", valueString: value };
}

/** Private channels see themselves plus every public channel */
function privateVisibility(channelId: string): WhereFilter {
  return {
    operator: "Or",
    operands: [equal("channel_id", channelId), equal("channel_type", "channel")],
  };
}

/**
 * Semantic search filter. Public channels see public channels only;
 * the current thread is excluded in both cases.
 */
export function buildRetrievalFilter(scope: RetrievalScope): WhereFilter {
  if (scope.isPrivate) {
    return {
      operator: "And",
      operands: [notEqual("thread_ts", scope.threadTs), privateVisibility(scope.channelId)],
    };
  }
  return {
    operator: "And",
    operands: [equal("channel_type", "channel"), notEqual("thread_ts", scope.threadTs)],
  };
}

/** Exact permalink lookup under the same visibility rules */
export function buildPermalinkFilter(scope: RetrievalScope, url: string): WhereFilter {
  if (scope.isPrivate) {
    return {
      operator: "And",
      operands: [equal("permalink", url), privateVisibility(scope.channelId)],
    };
  }
  return {
    operator: "And",
    operands: [equal("channel_type", "channel"), equal("permalink", url)],
  };
}
