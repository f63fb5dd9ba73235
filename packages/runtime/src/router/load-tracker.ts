// In-flight invocation counts per agent

import type { Id } from '@huddle/protocol';

/**
 * Counts in-flight invocations per agent. Single-threaded event loop
 * semantics make check-then-acquire atomic when done without an await
 * in between.
 */
export class LoadTracker {
  private readonly counts = new Map<Id, number>();

  load(agentId: Id): number {
    return this.counts.get(agentId) ?? 0;
  }

  /**
   * Count one invocation. The returned release function is idempotent.
   */
  acquire(agentId: Id): () => void {
    this.counts.set(agentId, this.load(agentId) + 1);

    let released = false;
    return () => {
      if (released) return;
      released = true;
      const next = this.load(agentId) - 1;
      if (next <= 0) {
        this.counts.delete(agentId);
      } else {
        this.counts.set(agentId, next);
      }
    };
  }

  /**
   * Snapshot of all non-zero loads
   */
  snapshot(): Record<Id, number> {
    return Object.fromEntries(this.counts);
  }
}
