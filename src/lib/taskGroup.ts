// ============================================
// Task Group — bounded background work with a drainable shutdown
// ============================================

import pLimit, { type LimitFunction } from "p-limit";
import { logger } from "./logger.js";

export interface TaskGroupOptions {
  /** Max tasks running at once; the rest queue in spawn order */
  maxConcurrency: number;
}

/**
 * Event listeners hand their work here and return immediately.
 * drain() stops intake and waits for in-flight work, up to a deadline.
 */
export class TaskGroup {
  private readonly limit: LimitFunction;
  private readonly active = new Set<Promise<void>>();
  private closed = false;

  constructor(options: TaskGroupOptions) {
    this.limit = pLimit(options.maxConcurrency);
  }

  /** Tasks spawned and not yet settled, queued ones included */
  get size(): number {
    return this.active.size;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Schedule a task. Returns false once the group is draining.
   * A task's failure is logged here; it never reaches the caller.
   */
  spawn(name: string, task: () => Promise<void>): boolean {
    if (this.closed) {
      logger.warn("Task rejected, shutting down", { stage: "tasks", task: name });
      return false;
    }

    const tracked: Promise<void> = this.limit(task)
      .catch((error: unknown) => {
        logger.error("Background task failed", { stage: "tasks", task: name, error });
      })
      .finally(() => {
        this.active.delete(tracked);
      });

    this.active.add(tracked);
    return true;
  }

  /**
   * Stop accepting work and wait for everything in flight.
   * Resolves true when all tasks settled, false when the timeout hit first.
   */
  async drain(timeoutMs: number): Promise<boolean> {
    this.closed = true;

    if (this.active.size === 0) {
      return true;
    }

    logger.info("Waiting for background tasks", { stage: "tasks", activeTasks: this.active.size });

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<false>((resolve) => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });
    const settled = Promise.all(Array.from(this.active)).then(() => true);

    const finished = await Promise.race([settled, timeout]);
    clearTimeout(timer);

    if (!finished) {
      logger.warn("Some background tasks did not finish before the drain timeout", {
        stage: "tasks",
        remainingTasks: this.active.size,
      });
    }

    return finished;
  }
}
