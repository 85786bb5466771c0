// Host executor - the single consumer that runs commands on the owner thread
//
// Each command moves through:
//   received → marshalled → handler_invoked → result_computed | exception_caught → published
//
// Handler failures become failed outcomes. Only protocol violations
// (a command delivered twice, a duplicate result) stop the executor.

import type { Command, ExecutionOutcome } from '@cmdbridge/protocol';
import type { DispatchTable } from '../dispatch/dispatch-table.js';
import type { BridgeLogger } from '../logger.js';
import { silentLogger, describeError } from '../logger.js';
import { isProtocolViolation, QueueCorruptionError, type ProtocolViolation } from '../errors.js';
import { OwnerThread } from './owner-thread.js';
import { classifyError, notRegisteredDetails } from './classify.js';
import type { CommandSource, ExecutionStage, ResultSink } from './types.js';

export const DEFAULT_BATCH_SIZE = 20;
export const DEFAULT_POLL_INTERVAL_MS = 1000;
export const DEFAULT_MAX_POLL_INTERVAL_MS = 5000;

/**
 * Ids remembered for duplicate-delivery detection.
 */
const SEEN_COMMAND_LIMIT = 10_000;

export type HostExecutorOptions = {
  source: CommandSource;
  sink: ResultSink;
  dispatch: DispatchTable;

  /** Shared owner thread; created with handlerTimeoutMs if omitted */
  ownerThread?: OwnerThread;

  /** Hard timeout per handler call (default 60s) */
  handlerTimeoutMs?: number;

  /** Max commands per drain (default 20) */
  batchSize?: number;

  /** Idle poll interval; doubles while idle up to maxPollIntervalMs */
  pollIntervalMs?: number;
  maxPollIntervalMs?: number;

  logger?: BridgeLogger;

  /** Observe stage transitions (testing, tracing) */
  onStage?: (commandId: string, stage: ExecutionStage) => void;

  /** Called before the executor stops on a protocol violation */
  onProtocolViolation?: (error: ProtocolViolation) => void;
};

export class HostExecutor {
  private readonly source: CommandSource;
  private readonly sink: ResultSink;
  private readonly dispatch: DispatchTable;
  private readonly ownerThread: OwnerThread;
  private readonly logger: BridgeLogger;
  private readonly batchSize: number;
  private readonly pollIntervalMs: number;
  private readonly maxPollIntervalMs: number;
  private readonly onStage?: (commandId: string, stage: ExecutionStage) => void;
  private readonly onProtocolViolation?: (error: ProtocolViolation) => void;

  private readonly seen = new Set<string>();
  private running = false;
  private loop: Promise<void> | null = null;
  private wake: (() => void) | null = null;
  private executed = 0;
  private fatalError: ProtocolViolation | null = null;

  constructor(options: HostExecutorOptions) {
    this.source = options.source;
    this.sink = options.sink;
    this.dispatch = options.dispatch;
    this.logger = options.logger ?? silentLogger;
    this.ownerThread =
      options.ownerThread ??
      new OwnerThread({ timeoutMs: options.handlerTimeoutMs, logger: this.logger });
    this.batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.maxPollIntervalMs = options.maxPollIntervalMs ?? DEFAULT_MAX_POLL_INTERVAL_MS;
    this.onStage = options.onStage;
    this.onProtocolViolation = options.onProtocolViolation;
  }

  /**
   * Drain one batch and execute it in order.
   *
   * @returns Number of commands executed
   * @throws ProtocolViolation if the source delivers a command twice or
   *   the sink rejects a result as a duplicate
   */
  async runOnce(): Promise<number> {
    const commands = await this.source.drain(this.batchSize);

    for (const command of commands) {
      await this.execute(command);
    }

    return commands.length;
  }

  /**
   * Execute a single drained command and publish its outcome.
   */
  async execute(command: Command): Promise<ExecutionOutcome> {
    this.stage(command.id, 'received');
    this.guardDelivery(command);

    const logger = this.logger;
    logger.debug('Executing command', { commandId: command.id, type: command.type });
    const startTime = Date.now();

    const outcome = await this.ownerThread
      .invoke(
        async (): Promise<ExecutionOutcome> => {
          this.stage(command.id, 'marshalled');
          this.stage(command.id, 'handler_invoked');

          const dispatched = await this.dispatch.dispatch(command, {
            command,
            logger,
            ownerThread: this.ownerThread,
          });

          if (dispatched.kind === 'not_registered') {
            logger.warn(`No handler registered for command type: ${command.type}`, {
              commandId: command.id,
              availableCommands: dispatched.availableCommands,
            });
            return {
              success: false,
              error: notRegisteredDetails(command.type, dispatched.availableCommands),
            };
          }

          return { success: true, data: dispatched.data };
        },
        { label: command.type }
      )
      .catch((error: unknown): ExecutionOutcome => {
        const details = classifyError(error);
        logger.error('Command handler failed', {
          commandId: command.id,
          type: command.type,
          kind: details.kind,
          error: describeError(error),
        });
        return { success: false, error: details };
      });

    this.stage(command.id, outcome.success ? 'result_computed' : 'exception_caught');

    try {
      await this.sink.complete(command.id, {
        ...outcome,
        debugInfo: { durationMs: Date.now() - startTime },
      });
    } catch (error) {
      if (isProtocolViolation(error)) {
        throw this.fail(error);
      }
      logger.error('Failed to publish command result', {
        commandId: command.id,
        error: describeError(error),
      });
      return outcome;
    }

    this.executed++;
    this.stage(command.id, 'published');
    logger.info('Command executed', {
      commandId: command.id,
      type: command.type,
      success: outcome.success,
      durationMs: Date.now() - startTime,
    });

    return outcome;
  }

  /**
   * Start polling the source in the background.
   */
  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    this.loop = this.pollLoop();
  }

  /**
   * Stop polling and wait for the in-flight batch to finish.
   */
  async stop(): Promise<void> {
    this.running = false;
    this.wake?.();
    const loop = this.loop;
    this.loop = null;
    if (loop) {
      await loop;
    }
  }

  get isRunning(): boolean {
    return this.running;
  }

  get executedCount(): number {
    return this.executed;
  }

  /**
   * The protocol violation that stopped the executor, if any.
   */
  get fatal(): ProtocolViolation | null {
    return this.fatalError;
  }

  get owner(): OwnerThread {
    return this.ownerThread;
  }

  private async pollLoop(): Promise<void> {
    let idleInterval = this.pollIntervalMs;

    while (this.running) {
      let executed = 0;
      try {
        executed = await this.runOnce();
      } catch (error) {
        if (isProtocolViolation(error)) {
          this.running = false;
          break;
        }
        this.logger.error('Command poll failed', { error: describeError(error) });
      }

      if (!this.running) break;

      if (executed > 0) {
        idleInterval = this.pollIntervalMs;
        continue;
      }

      await this.sleep(idleInterval);
      idleInterval = Math.min(idleInterval * 2, this.maxPollIntervalMs);
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.wake = null;
        resolve();
      }, ms);
      this.wake = () => {
        clearTimeout(timer);
        this.wake = null;
        resolve();
      };
    });
  }

  private guardDelivery(command: Command): void {
    if (command.status !== 'executing') {
      throw this.fail(
        new QueueCorruptionError(command.id, `delivered in status ${command.status}`)
      );
    }
    if (this.seen.has(command.id)) {
      throw this.fail(new QueueCorruptionError(command.id, 'delivered more than once'));
    }

    this.seen.add(command.id);
    if (this.seen.size > SEEN_COMMAND_LIMIT) {
      const oldest = this.seen.values().next();
      if (!oldest.done) {
        this.seen.delete(oldest.value);
      }
    }
  }

  private fail(error: ProtocolViolation): ProtocolViolation {
    this.fatalError = error;
    this.running = false;
    this.logger.error('Protocol violation; stopping executor', {
      code: error.code,
      error: error.message,
    });
    this.onProtocolViolation?.(error);
    return error;
  }

  private stage(commandId: string, stage: ExecutionStage): void {
    this.onStage?.(commandId, stage);
  }
}
