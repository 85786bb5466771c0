// Owner thread
//
// The host's document model tolerates no concurrent mutation, so every
// handler runs on one serial lane. Callers wait for their call to finish
// or fail, bounded by a hard timeout. The timeout bounds only the wait: a
// call that exceeds it keeps the lane until it settles, and later calls
// queue behind it.

import { AsyncLocalStorage } from 'node:async_hooks';
import { SerialLane } from '../concurrency/serial-lane.js';
import { OperationError, OwnerThreadTimeoutError } from '../errors.js';
import type { BridgeLogger } from '../logger.js';
import { describeError, silentLogger } from '../logger.js';

export const DEFAULT_OWNER_THREAD_TIMEOUT_MS = 60_000;

export type OwnerThreadOptions = {
  /** Hard timeout per call (default 60s) */
  timeoutMs?: number;
  logger?: BridgeLogger;
};

export type InvokeOptions = {
  /** Override the hard timeout for this call */
  timeoutMs?: number;

  /** Shown in timeout errors and logs, usually the command type */
  label?: string;
};

type OwnerToken = { readonly lane: SerialLane };

export class OwnerThread {
  private readonly lane = new SerialLane();
  private readonly token: OwnerToken = { lane: this.lane };
  private readonly storage = new AsyncLocalStorage<OwnerToken>();
  private readonly timeoutMs: number;
  private readonly logger: BridgeLogger;
  private abandoned = 0;

  constructor(options: OwnerThreadOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_OWNER_THREAD_TIMEOUT_MS;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Run a task on the owner thread and wait for it.
   *
   * @throws OwnerThreadTimeoutError if the task does not settle in time
   */
  invoke<T>(task: () => Promise<T> | T, options: InvokeOptions = {}): Promise<T> {
    const timeoutMs = options.timeoutMs ?? this.timeoutMs;

    return new Promise<T>((resolve, reject) => {
      let timer: ReturnType<typeof setTimeout> | undefined;
      let timedOut = false;

      const work = this.lane.run(() => {
        timer = setTimeout(() => {
          timedOut = true;
          this.abandoned++;
          this.logger.warn('Owner thread call timed out; lane held until it settles', {
            label: options.label,
            timeoutMs,
          });
          reject(new OwnerThreadTimeoutError(timeoutMs, options.label));
        }, timeoutMs);
        return this.storage.run(this.token, async () => task());
      });

      work.then(
        (value) => {
          clearTimeout(timer);
          resolve(value);
        },
        (error: unknown) => {
          clearTimeout(timer);
          if (timedOut) {
            this.logger.warn('Timed-out owner thread call failed', {
              label: options.label,
              error: describeError(error),
            });
          }
          reject(error);
        }
      );
    });
  }

  /**
   * True when called from inside a task running on this owner thread.
   */
  isCurrent(): boolean {
    return this.storage.getStore() === this.token;
  }

  /**
   * Throw unless called from inside a task running on this owner thread.
   * Handlers that touch document state call this first.
   */
  assertCurrent(operation: string): void {
    if (!this.isCurrent()) {
      throw new OperationError(`${operation} must run on the host owner thread`);
    }
  }

  /**
   * Calls queued or running.
   */
  get pending(): number {
    return this.lane.size;
  }

  /**
   * Calls whose caller stopped waiting after the timeout.
   */
  get abandonedCount(): number {
    return this.abandoned;
  }
}
