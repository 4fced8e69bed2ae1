// ============================================
// Vector index engine — the storage contract behind a workspace index
// ============================================

import type { Document, MetadataField } from "../documents/types.js";

export interface WhereCondition {
  path: [MetadataField];
  operator: "Equal" | "NotEqual";
  valueString: string;
}

export interface WhereGroup {
  operator: "And" | "Or";
  operands: WhereFilter[];
}

/** Boolean filter tree over document metadata */
export type WhereFilter = WhereCondition | WhereGroup;

export interface CollectionSchema {
  description: string;
  /** Metadata keys stored and filterable on every document */
  properties: readonly MetadataField[];
}

export interface NearestQuery {
  text: string;
  filter: WhereFilter;
  limit: number;
}

export interface FilterQuery {
  filter: WhereFilter;
  limit: number;
}

/**
 * Any engine that can hold named collections of documents with
 * filterable metadata and answer similarity queries.
 */
export interface VectorIndexEngine {
  collectionExists(name: string): Promise<boolean>;
  createCollection(name: string, schema: CollectionSchema): Promise<void>;
  deleteCollection(name: string): Promise<void>;
  /** Insert or overwrite; returns the ids stored */
  addDocuments(name: string, documents: Document[], ids?: string[]): Promise<string[]>;
  deleteWhere(name: string, filter: WhereFilter): Promise<void>;
  queryNearest(name: string, query: NearestQuery): Promise<Document[]>;
  queryFilter(name: string, query: FilterQuery): Promise<Document[]>;
}

export function isWhereGroup(filter: WhereFilter): filter is WhereGroup {
  return filter.operator === "And" || filter.operator === "Or";
}
