// Result store - one result per command, with bounded waits
//
// First publish wins; a second publish for the same id is rejected.
// A wait that times out leaves nothing behind: a late result is still
// stored and can be read by polling.

import type { AwaitOutcome, CommandResult } from '@cmdbridge/protocol';
import { DuplicateResultError } from '../errors.js';

type StoredResult = {
  result: CommandResult;
  publishedAt: number;
  retrievedAt: number | null;
};

type Waiter = (outcome: AwaitOutcome) => void;

export type ResultStoreOptions = {
  /** Milliseconds clock used for retention (defaults to Date.now) */
  now?: () => number;
};

export class ResultStore {
  private results = new Map<string, StoredResult>();
  private waiters = new Map<string, Set<Waiter>>();
  private readonly now: () => number;

  constructor(options: ResultStoreOptions = {}) {
    this.now = options.now ?? Date.now;
  }

  /**
   * Store a result and wake everyone waiting on it.
   *
   * @throws DuplicateResultError if a result already exists for the command
   */
  publish(result: CommandResult): void {
    if (this.results.has(result.commandId)) {
      throw new DuplicateResultError(result.commandId);
    }

    this.results.set(result.commandId, {
      result,
      publishedAt: this.now(),
      retrievedAt: null,
    });

    const waiting = this.waiters.get(result.commandId);
    if (waiting) {
      this.waiters.delete(result.commandId);
      this.markRetrieved(result.commandId);
      for (const waiter of waiting) {
        waiter({ status: 'completed', result });
      }
    }
  }

  /**
   * Read a result, marking it retrieved for retention purposes.
   */
  get(commandId: string): CommandResult | null {
    const stored = this.results.get(commandId);
    if (!stored) {
      return null;
    }
    this.markRetrieved(commandId);
    return stored.result;
  }

  /**
   * Read a result without marking it retrieved.
   */
  peek(commandId: string): CommandResult | null {
    return this.results.get(commandId)?.result ?? null;
  }

  has(commandId: string): boolean {
    return this.results.has(commandId);
  }

  /**
   * Wait for a result. Resolves immediately if one is already stored.
   * Never rejects: timeouts and resets are outcomes.
   */
  await(commandId: string, timeoutMs: number): Promise<AwaitOutcome> {
    const existing = this.get(commandId);
    if (existing) {
      return Promise.resolve({ status: 'completed', result: existing });
    }

    return new Promise<AwaitOutcome>((resolve) => {
      let waiters = this.waiters.get(commandId);
      if (!waiters) {
        waiters = new Set();
        this.waiters.set(commandId, waiters);
      }
      const group = waiters;

      const waiter: Waiter = (outcome) => {
        clearTimeout(timer);
        resolve(outcome);
      };

      const timer = setTimeout(() => {
        group.delete(waiter);
        if (group.size === 0 && this.waiters.get(commandId) === group) {
          this.waiters.delete(commandId);
        }
        resolve({ status: 'timed_out', commandId, timeoutMs });
      }, timeoutMs);

      group.add(waiter);
    });
  }

  /**
   * Number of callers currently waiting.
   */
  get waitingCount(): number {
    let count = 0;
    for (const group of this.waiters.values()) {
      count += group.size;
    }
    return count;
  }

  get size(): number {
    return this.results.size;
  }

  /**
   * Remove results retrieved more than `retentionMs` ago.
   *
   * @returns Ids of removed results
   */
  sweep(retentionMs: number): string[] {
    const cutoff = this.now() - retentionMs;
    const removed: string[] = [];

    for (const [commandId, stored] of this.results) {
      if (stored.retrievedAt !== null && stored.retrievedAt <= cutoff) {
        this.results.delete(commandId);
        removed.push(commandId);
      }
    }
    return removed;
  }

  /**
   * Drop every result and release every waiter with `session_reset`.
   *
   * @returns Number of results dropped
   */
  clear(): number {
    const dropped = this.results.size;
    const waiters = this.waiters;

    this.results = new Map();
    this.waiters = new Map();

    for (const [commandId, group] of waiters) {
      for (const waiter of group) {
        waiter({ status: 'session_reset', commandId });
      }
    }
    return dropped;
  }

  private markRetrieved(commandId: string): void {
    const stored = this.results.get(commandId);
    if (stored && stored.retrievedAt === null) {
      stored.retrievedAt = this.now();
    }
  }
}
