// ============================================
// Text budgeter — token-aware truncation and paging
// ============================================

import { encodingForModel, type Tiktoken, type TiktokenModel } from "js-tiktoken";
import { RecallError } from "../lib/errors.js";

/** Tokens of document text allowed per model */
export const MODEL_TOKEN_BUDGETS = {
  "gpt-3.5-turbo": 3000,
  "gpt-4": 6000,
  "gpt-4-32k": 30000,
  "gpt-4o": 30000,
} as const satisfies Record<string, number>;

export type BudgetedModel = keyof typeof MODEL_TOKEN_BUDGETS;

const TOKENIZER_MODELS: Record<BudgetedModel, TiktokenModel> = {
  "gpt-3.5-turbo": "gpt-3.5-turbo",
  "gpt-4": "gpt-4",
  "gpt-4-32k": "gpt-4-32k",
  "gpt-4o": "gpt-4o",
};

/** Budget for nested values (link titles, file names) inside a document */
export const NESTED_VALUE_TOKEN_BUDGET = 100;

/** Tokens shared by consecutive file pages */
export const PAGE_OVERLAP_TOKENS = 200;

/**
 * Ceiling on file page size. A serialized page must fit the embedding
 * model's 8191-token input, measured with its own tokenizer.
 */
export const EMBEDDABLE_PAGE_TOKENS = 6000;

export const TRUNCATION_MARKER = "...";

export function isBudgetedModel(model: string): model is BudgetedModel {
  return Object.prototype.hasOwnProperty.call(MODEL_TOKEN_BUDGETS, model);
}

function assertBudgetedModel(model: string): BudgetedModel {
  if (!isBudgetedModel(model)) {
    throw new RecallError({
      code: "UNSUPPORTED_MODEL",
      message: `Unsupported model: ${model}`,
      context: { model },
    });
  }
  return model;
}

export function tokenBudgetForModel(model: string): number {
  return MODEL_TOKEN_BUDGETS[assertBudgetedModel(model)];
}

// Loading an encoding parses its whole rank table; keep one per model
const encodings = new Map<BudgetedModel, Tiktoken>();

function encodingFor(model: BudgetedModel): Tiktoken {
  let encoding = encodings.get(model);
  if (!encoding) {
    encoding = encodingForModel(TOKENIZER_MODELS[model]);
    encodings.set(model, encoding);
  }
  return encoding;
}

export class TextBudgeter {
  readonly model: BudgetedModel;
  readonly budget: number;
  /** Tokens per file page: the model budget, capped to what can be embedded */
  readonly pageSize: number;
  private readonly encoding: Tiktoken;

  constructor(model: string) {
    this.model = assertBudgetedModel(model);
    this.budget = MODEL_TOKEN_BUDGETS[this.model];
    this.pageSize = Math.min(this.budget, EMBEDDABLE_PAGE_TOKENS);
    this.encoding = encodingFor(this.model);
  }

  /** Special-token markers in user text are encoded as ordinary text */
  private encode(text: string): number[] {
    return this.encoding.encode(text, [], []);
  }

  countTokens(text: string): number {
    return this.encode(text).length;
  }

  /**
   * Keep the first budget - 1 tokens. Text that survives whole comes back
   * unchanged; anything cut gets a trailing "...".
   */
  truncate(text: string, budget: number = this.budget): string {
    const tokens = this.encode(text);
    const truncated = this.encoding.decode(tokens.slice(0, Math.max(budget - 1, 0)));
    if (truncated.length === text.length) {
      return text;
    }
    return `${truncated}${TRUNCATION_MARKER}`;
  }

  /** Overlapping token windows; empty text has no pages */
  split(text: string, chunkSize: number = this.budget, overlap: number = PAGE_OVERLAP_TOKENS): string[] {
    if (overlap >= chunkSize) {
      throw new RangeError(`Page overlap (${overlap}) must be smaller than page size (${chunkSize})`);
    }

    const tokens = this.encode(text);
    const pages: string[] = [];
    let start = 0;

    while (start < tokens.length) {
      const end = Math.min(start + chunkSize, tokens.length);
      pages.push(this.encoding.decode(tokens.slice(start, end)));
      if (end === tokens.length) break;
      start += chunkSize - overlap;
    }

    return pages;
  }
}
