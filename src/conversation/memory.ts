// ============================================
// Conversation memory — thread history within a token budget
// ============================================

import type { TextBudgeter } from "../documents/textBudget.js";
import type { ChatMessage } from "../llm/client.js";

interface MemoryEntry {
  role: "user" | "assistant";
  content: string;
  tokens: number;
}

/** Oldest messages are dropped first once the budget is exceeded */
export class TokenBufferMemory {
  private entries: MemoryEntry[] = [];
  private total = 0;
  readonly maxTokens: number;

  constructor(
    private readonly budgeter: TextBudgeter,
    maxTokens: number = budgeter.budget
  ) {
    this.maxTokens = maxTokens;
  }

  addUserMessage(content: string): void {
    this.add("user", content);
  }

  addAssistantMessage(content: string): void {
    this.add("assistant", content);
  }

  get tokenCount(): number {
    return this.total;
  }

  get messages(): ChatMessage[] {
    return this.entries.map(({ role, content }) => ({ role, content }));
  }

  private add(role: MemoryEntry["role"], content: string): void {
    const tokens = this.budgeter.countTokens(content);
    this.entries.push({ role, content, tokens });
    this.total += tokens;
    this.prune();
  }

  private prune(): void {
    while (this.total > this.maxTokens) {
      const dropped = this.entries.shift();
      if (!dropped) break;
      this.total -= dropped.tokens;
    }
  }
}
