// Command bridge - one session's queue, results and entity registry
//
// Producers submit and await. A host drains pending commands and reports
// outcomes. On a successful outcome the bridge records the entities the
// result reports, touches the entity the command targeted, then publishes
// the result. The host keeps no registry state of its own.

import { randomUUID } from 'node:crypto';
import type {
  AwaitOutcome,
  Command,
  CommandHistoryEntry,
  CommandParameters,
  CommandResult,
  CommandStatus,
  CommandView,
  Entity,
  EntityRegistryStats,
  ExecutionOutcome,
  ResolutionMethod,
  ResolveOutcome,
} from '@cmdbridge/protocol';
import { validateSubmitInput } from '@cmdbridge/protocol';
import { CommandQueue } from '../commands/queue.js';
import { ResultStore } from '../results/result-store.js';
import type { EntityRegistry } from '../registry/entity-registry.js';
import { ReferenceResolver } from '../resolver/reference-resolver.js';
import type { CommandSource, ResultSink } from '../host/types.js';
import {
  CommandNotFoundError,
  DuplicateResultError,
  EntityNotFoundError,
  InvalidCommandError,
  InvalidStatusTransitionError,
  QueueCorruptionError,
  ReferenceAmbiguousError,
  ReferenceNotFoundError,
  type ProtocolViolation,
} from '../errors.js';
import type { BridgeLogger } from '../logger.js';
import { describeError, silentLogger } from '../logger.js';
import { extractEntityChanges } from './extract-entities.js';

export const DEFAULT_AWAIT_TIMEOUT_MS = 10_000;
export const DEFAULT_MAX_AWAIT_TIMEOUT_MS = 300_000;
export const DEFAULT_RESULT_RETENTION_MS = 300_000;
export const DEFAULT_HOST_STALE_AFTER_MS = 15_000;
export const DEFAULT_HISTORY_LIMIT = 100;

export type CommandBridgeOptions = {
  registry: EntityRegistry;
  resolver?: ReferenceResolver;
  logger?: BridgeLogger;
  clock?: () => Date;
  idFactory?: () => string;

  defaultAwaitTimeoutMs?: number;
  maxAwaitTimeoutMs?: number;

  /** How long a retrieved result is kept before sweep() drops it */
  resultRetentionMs?: number;

  /** A host that has not polled for this long is unavailable */
  hostStaleAfterMs?: number;

  historyLimit?: number;

  /** Called on a duplicate result or queue corruption, before the error is thrown */
  onProtocolViolation?: (error: ProtocolViolation) => void;
};

/**
 * Receipt returned by submit.
 */
export type SubmitReceipt = {
  commandId: string;
  type: string;
  createdAt: string;
  resolvedReference: { hint: string; entityId: string; method: ResolutionMethod } | null;
};

export type HostConnectionState = 'connected' | 'stale' | 'never_seen';

export type HostStatus = {
  state: HostConnectionState;
  lastSeenAt: string | null;
  availableCommands: string[];
};

export type BridgeStatus = {
  sessionId: string;
  startedAt: string;
  serverTime: string;
  commands: Record<CommandStatus, number>;
  waiting: number;
  registry: EntityRegistryStats;
  host: HostStatus;
  recentCommands: CommandHistoryEntry[];
};

export type ResetSummary = {
  sessionId: string;
  droppedCommands: number;
  droppedResults: number;
  clearedEntities: number;
};

export class CommandBridge implements CommandSource, ResultSink {
  readonly queue: CommandQueue;
  readonly results: ResultStore;
  readonly registry: EntityRegistry;
  readonly resolver: ReferenceResolver;

  private readonly logger: BridgeLogger;
  private readonly clock: () => Date;
  private readonly defaultAwaitTimeoutMs: number;
  private readonly maxAwaitTimeoutMs: number;
  private readonly resultRetentionMs: number;
  private readonly hostStaleAfterMs: number;
  private readonly historyLimit: number;
  private readonly onProtocolViolation?: (error: ProtocolViolation) => void;

  private session: { id: string; startedAt: Date };
  private generation = 0;
  private lastHostPollAt: Date | null = null;
  private availableCommands: string[] = [];
  private history: CommandHistoryEntry[] = [];
  private completing = new Map<string, { outcome: ExecutionOutcome; done: Promise<void> }>();

  constructor(options: CommandBridgeOptions) {
    this.logger = options.logger ?? silentLogger;
    this.clock = options.clock ?? (() => new Date());
    this.registry = options.registry;
    this.resolver = options.resolver ?? new ReferenceResolver(options.registry);
    this.queue = new CommandQueue({
      logger: this.logger,
      clock: this.clock,
      idFactory: options.idFactory,
    });
    this.results = new ResultStore({ now: () => this.clock().getTime() });
    this.defaultAwaitTimeoutMs = options.defaultAwaitTimeoutMs ?? DEFAULT_AWAIT_TIMEOUT_MS;
    this.maxAwaitTimeoutMs = options.maxAwaitTimeoutMs ?? DEFAULT_MAX_AWAIT_TIMEOUT_MS;
    this.resultRetentionMs = options.resultRetentionMs ?? DEFAULT_RESULT_RETENTION_MS;
    this.hostStaleAfterMs = options.hostStaleAfterMs ?? DEFAULT_HOST_STALE_AFTER_MS;
    this.historyLimit = options.historyLimit ?? DEFAULT_HISTORY_LIMIT;
    this.onProtocolViolation = options.onProtocolViolation;
    this.session = { id: randomUUID(), startedAt: this.clock() };
  }

  // Producer API

  /**
   * Enqueue a command.
   *
   * A string `reference` parameter is resolved first (optionally narrowed
   * by a `reference_type` parameter) and the entity id is injected as
   * `entity_id`. An explicit `entity_id` skips resolution.
   *
   * @throws InvalidCommandError, ReferenceNotFoundError, ReferenceAmbiguousError
   */
  submit(type: string, parameters: CommandParameters = {}): SubmitReceipt {
    const validation = validateSubmitInput({ type, parameters });
    if (!validation.valid) {
      throw new InvalidCommandError(validation.errors);
    }

    let resolvedReference: SubmitReceipt['resolvedReference'] = null;
    let finalParameters = parameters;

    const hint = parameters.reference;
    if (typeof hint === 'string' && parameters.entity_id === undefined) {
      const referenceType =
        typeof parameters.reference_type === 'string' ? parameters.reference_type : undefined;
      const outcome = this.resolveReference(hint, referenceType);

      if (outcome.status === 'ambiguous') {
        throw new ReferenceAmbiguousError(hint, outcome.reason, outcome.candidates);
      }
      if (outcome.status === 'not_found') {
        throw new ReferenceNotFoundError(hint, outcome.reason, outcome.typeFilter);
      }

      finalParameters = { ...parameters, entity_id: outcome.entityId };
      resolvedReference = { hint, entityId: outcome.entityId, method: outcome.method };
    }

    const command = this.enqueue(type, finalParameters);

    this.logger.info('Command submitted', {
      commandId: command.id,
      type,
      reference: resolvedReference,
    });

    return {
      commandId: command.id,
      type: command.type,
      createdAt: command.createdAt,
      resolvedReference,
    };
  }

  /**
   * Wait for a command's result.
   *
   * Resolves early with `host_unavailable` when the command is still
   * pending and no host has polled within the stale window. Timing out
   * only stops waiting; a late result is still published.
   *
   * @throws CommandNotFoundError
   */
  async await(commandId: string, timeoutMs?: number): Promise<AwaitOutcome> {
    const command = this.queue.get(commandId);
    if (!command && !this.results.has(commandId)) {
      throw new CommandNotFoundError(commandId);
    }

    const timeout = this.clampTimeout(timeoutMs);

    if (command?.status === 'pending' && this.isHostStale()) {
      return this.hostUnavailable(commandId);
    }

    const outcome = await this.results.await(commandId, timeout);

    if (outcome.status === 'timed_out') {
      const current = this.queue.get(commandId);
      if (current?.status === 'pending' && this.isHostStale()) {
        return this.hostUnavailable(commandId);
      }
      this.logger.info('Await timed out', { commandId, timeoutMs: timeout });
    }

    return outcome;
  }

  /**
   * Submit, then wait for the result.
   */
  async submitAndAwait(
    type: string,
    parameters: CommandParameters = {},
    timeoutMs?: number
  ): Promise<{ receipt: SubmitReceipt; outcome: AwaitOutcome }> {
    const receipt = this.submit(type, parameters);
    const outcome = await this.await(receipt.commandId, timeoutMs);
    return { receipt, outcome };
  }

  /**
   * Current state of a command and its result, if published.
   *
   * @throws CommandNotFoundError
   */
  poll(commandId: string): CommandView {
    const command = this.queue.require(commandId);
    return { command, result: this.results.get(commandId) };
  }

  // Registry query API

  resolveReference(hint: string, typeFilter?: string | string[]): ResolveOutcome {
    const outcome = this.resolver.resolve(hint, typeFilter);
    this.logger.debug('Reference resolved', {
      hint,
      status: outcome.status,
      entityId: outcome.status === 'resolved' ? outcome.entityId : null,
    });
    return outcome;
  }

  /**
   * @throws EntityNotFoundError
   */
  lookup(entityId: string): Entity {
    return this.registry.lookup(entityId);
  }

  // Host-facing API

  /**
   * Hand up to `maxCount` pending commands to a host.
   */
  async drain(maxCount: number): Promise<Command[]> {
    this.lastHostPollAt = this.clock();

    try {
      return this.queue.drain(maxCount);
    } catch (error) {
      if (error instanceof QueueCorruptionError) {
        this.violation(error);
      }
      throw error;
    }
  }

  /**
   * Record the command types a host can execute.
   */
  advertiseCommands(commandTypes: string[]): void {
    this.availableCommands = [...new Set(commandTypes)].sort();
  }

  /**
   * Accept a host's outcome for an executing command.
   *
   * Redelivering the outcome already accepted for a command (a host retry
   * after a lost response) returns the stored result. Only a different
   * second outcome is a protocol violation.
   *
   * @throws CommandNotFoundError for unknown ids (for example after a reset)
   * @throws DuplicateResultError if a different result was already accepted
   * @throws InvalidStatusTransitionError if the command was never drained
   */
  async complete(commandId: string, outcome: ExecutionOutcome): Promise<CommandResult> {
    const generation = this.generation;
    const command = this.queue.get(commandId);

    const inFlight = this.completing.get(commandId);
    if (inFlight) {
      if (!sameOutcome(inFlight.outcome, outcome)) {
        throw this.violation(new DuplicateResultError(commandId));
      }
      // A failed first delivery reports to its own caller; this one retries
      await inFlight.done.catch(() => undefined);
      return this.complete(commandId, outcome);
    }

    const stored = this.results.peek(commandId);
    if (stored) {
      if (!sameOutcome(outcomeOf(stored), outcome)) {
        throw this.violation(new DuplicateResultError(commandId));
      }
      this.logger.info('Redelivered result acknowledged', { commandId });
      return stored;
    }
    if (!command) {
      throw new CommandNotFoundError(commandId);
    }
    if (command.status !== 'executing') {
      throw new InvalidStatusTransitionError(
        commandId,
        command.status,
        outcome.success ? 'completed' : 'failed'
      );
    }

    if (outcome.success) {
      const done = this.applyEntityChanges(command, outcome.data);
      this.completing.set(commandId, { outcome, done });
      try {
        await done;
      } finally {
        this.completing.delete(commandId);
      }
    }

    if (generation !== this.generation) {
      throw new CommandNotFoundError(commandId);
    }

    const result: CommandResult = outcome.success
      ? {
          commandId,
          success: true,
          data: outcome.data,
          debugInfo: outcome.debugInfo,
          completedAt: this.clock().toISOString(),
        }
      : {
          commandId,
          success: false,
          data: outcome.data ?? null,
          error: outcome.error.message,
          errorDetails: outcome.error,
          debugInfo: outcome.debugInfo,
          completedAt: this.clock().toISOString(),
        };

    this.queue.finish(commandId, result.success);
    this.results.publish(result);
    this.pushHistory({
      commandId,
      type: command.type,
      success: result.success,
      completedAt: result.completedAt,
    });

    this.logger.info('Command completed', {
      commandId,
      type: command.type,
      success: result.success,
      errorKind: result.errorDetails?.kind,
    });

    return result;
  }

  // Session control

  /**
   * Clear queue, results and registry. Waiters are released with
   * `session_reset`; outcomes for dropped commands are refused.
   */
  async reset(): Promise<ResetSummary> {
    this.generation++;
    const droppedCommands = this.queue.clear();
    const droppedResults = this.results.clear();
    this.history = [];
    this.session = { id: randomUUID(), startedAt: this.clock() };
    const clearing = this.registry.clear();

    const clearedEntities = await clearing;
    this.logger.info('Session reset', {
      sessionId: this.session.id,
      droppedCommands,
      droppedResults,
      clearedEntities,
    });

    return { sessionId: this.session.id, droppedCommands, droppedResults, clearedEntities };
  }

  /**
   * Drop results retrieved longer ago than the retention window, with
   * their commands.
   *
   * @returns Number of commands removed
   */
  sweep(): number {
    const removed = this.results.sweep(this.resultRetentionMs);
    for (const commandId of removed) {
      this.queue.forget(commandId);
    }
    if (removed.length > 0) {
      this.logger.debug('Swept retrieved results', { count: removed.length });
    }
    return removed.length;
  }

  // Observability

  hostStatus(): HostStatus {
    let state: HostConnectionState = 'never_seen';
    if (this.lastHostPollAt) {
      state = this.isHostStale() ? 'stale' : 'connected';
    }
    return {
      state,
      lastSeenAt: this.lastHostPollAt?.toISOString() ?? null,
      availableCommands: [...this.availableCommands],
    };
  }

  /**
   * Most recent completions first.
   */
  recentHistory(limit = 10): CommandHistoryEntry[] {
    return this.history.slice(-limit).reverse();
  }

  status(): BridgeStatus {
    return {
      sessionId: this.session.id,
      startedAt: this.session.startedAt.toISOString(),
      serverTime: this.clock().toISOString(),
      commands: this.queue.counts(),
      waiting: this.results.waitingCount,
      registry: this.registry.stats(),
      host: this.hostStatus(),
      recentCommands: this.recentHistory(10),
    };
  }

  get sessionId(): string {
    return this.session.id;
  }

  // Internals

  private enqueue(type: string, parameters: CommandParameters): Command {
    try {
      return this.queue.enqueue({ type, parameters });
    } catch (error) {
      if (error instanceof QueueCorruptionError) {
        this.violation(error);
      }
      throw error;
    }
  }

  /**
   * Record created entities in order of appearance, then touch modified
   * ones and the command's target. Registry failures are logged; the
   * result is still published.
   */
  private async applyEntityChanges(command: Command, data: unknown): Promise<void> {
    const { created, modified } = extractEntityChanges(data);
    const createdIds = new Set(created.map((entity) => entity.id));

    const target = command.parameters.entity_id;
    const touched = [...modified];
    if (typeof target === 'string' && !createdIds.has(target) && !touched.includes(target)) {
      touched.push(target);
    }

    if (created.length > 0) {
      try {
        await this.registry.recordMany(created, command.id);
      } catch (error) {
        this.logger.error('Failed to record entities', {
          commandId: command.id,
          entityIds: [...createdIds],
          error: describeError(error),
        });
      }
    }

    for (const entityId of touched) {
      try {
        await this.registry.touch(entityId, command.id);
      } catch (error) {
        const level = error instanceof EntityNotFoundError ? 'warn' : 'error';
        this.logger[level]('Failed to touch entity', {
          commandId: command.id,
          entityId,
          error: describeError(error),
        });
      }
    }
  }

  private pushHistory(entry: CommandHistoryEntry): void {
    this.history.push(entry);
    if (this.history.length > this.historyLimit) {
      this.history.splice(0, this.history.length - this.historyLimit);
    }
  }

  private clampTimeout(timeoutMs?: number): number {
    const requested = timeoutMs ?? this.defaultAwaitTimeoutMs;
    return Math.min(Math.max(requested, 1), this.maxAwaitTimeoutMs);
  }

  private isHostStale(): boolean {
    const reference = this.lastHostPollAt ?? this.session.startedAt;
    return this.clock().getTime() - reference.getTime() > this.hostStaleAfterMs;
  }

  private hostUnavailable(commandId: string): AwaitOutcome {
    this.logger.warn('Host unavailable; command still pending', {
      commandId,
      lastHostSeenAt: this.lastHostPollAt?.toISOString() ?? null,
    });
    return {
      status: 'host_unavailable',
      commandId,
      lastHostSeenAt: this.lastHostPollAt?.toISOString() ?? null,
    };
  }

  private violation<E extends ProtocolViolation>(error: E): E {
    this.logger.error('Protocol violation', { code: error.code, error: error.message });
    this.onProtocolViolation?.(error);
    return error;
  }
}

function outcomeOf(result: CommandResult): ExecutionOutcome {
  return result.success
    ? { success: true, data: result.data, debugInfo: result.debugInfo }
    : {
        success: false,
        error: result.errorDetails ?? { kind: 'UnexpectedError', message: result.error ?? '' },
        data: result.data,
        debugInfo: result.debugInfo,
      };
}

// Compared through JSON so that absent and undefined fields match.
function sameOutcome(a: ExecutionOutcome, b: ExecutionOutcome): boolean {
  const key = (outcome: ExecutionOutcome) =>
    JSON.stringify({
      success: outcome.success,
      data: outcome.data ?? null,
      error: outcome.success ? null : outcome.error,
      debugInfo: outcome.debugInfo ?? null,
    });
  return key(a) === key(b);
}
