// Command queue - FIFO of pending commands with per-command bookkeeping
//
// Producers enqueue; the single consumer drains. Draining moves a command
// from pending to executing in the same synchronous step that removes it
// from the queue, so no command can be handed out twice.

import type { Command, CommandStatus } from '@cmdbridge/protocol';
import { CommandNotFoundError, QueueCorruptionError } from '../errors.js';
import type { BridgeLogger } from '../logger.js';
import { silentLogger } from '../logger.js';
import { createCommand, transitionCommand } from './envelope.js';

export type CommandQueueOptions = {
  logger?: BridgeLogger;
  clock?: () => Date;
  idFactory?: () => string;
};

export class CommandQueue {
  private readonly logger: BridgeLogger;
  private readonly clock: () => Date;
  private readonly idFactory?: () => string;

  /** Ids awaiting drain, oldest first, starting at `head` */
  private pending: string[] = [];
  private head = 0;

  /** Every known command, by id */
  private commands = new Map<string, Command>();

  constructor(options: CommandQueueOptions = {}) {
    this.logger = options.logger ?? silentLogger;
    this.clock = options.clock ?? (() => new Date());
    this.idFactory = options.idFactory;
  }

  /**
   * Validate and enqueue a command.
   *
   * @returns The pending envelope
   * @throws InvalidCommandError if the input is malformed
   */
  enqueue(input: unknown): Command {
    const command = createCommand(input, { id: this.idFactory?.(), now: this.clock() });

    if (this.commands.has(command.id)) {
      throw new QueueCorruptionError(command.id, 'id already in use');
    }

    this.commands.set(command.id, command);
    this.pending.push(command.id);
    this.logger.debug('Command enqueued', { commandId: command.id, type: command.type });
    return command;
  }

  /**
   * Remove up to `maxCount` pending commands in FIFO order, moving each
   * to executing.
   *
   * @throws QueueCorruptionError if a queued id is not pending
   */
  drain(maxCount: number): Command[] {
    const drained: Command[] = [];

    while (drained.length < maxCount && this.head < this.pending.length) {
      const id = this.pending[this.head];
      this.head++;

      const command = this.commands.get(id);
      if (!command) {
        throw new QueueCorruptionError(id, 'queued id has no envelope');
      }
      if (command.status !== 'pending') {
        throw new QueueCorruptionError(id, `queued command is ${command.status}`);
      }

      const executing = transitionCommand(command, 'executing');
      this.commands.set(id, executing);
      drained.push(executing);
    }

    this.compactPending();

    if (drained.length > 0) {
      this.logger.debug('Commands drained', {
        count: drained.length,
        commandIds: drained.map((c) => c.id),
      });
    }
    return drained;
  }

  /**
   * Move an executing command to completed or failed.
   *
   * @throws CommandNotFoundError, InvalidStatusTransitionError
   */
  finish(commandId: string, success: boolean): Command {
    const command = this.require(commandId);
    const finished = transitionCommand(command, success ? 'completed' : 'failed');
    this.commands.set(commandId, finished);
    return finished;
  }

  get(commandId: string): Command | null {
    return this.commands.get(commandId) ?? null;
  }

  /**
   * @throws CommandNotFoundError
   */
  require(commandId: string): Command {
    const command = this.commands.get(commandId);
    if (!command) {
      throw new CommandNotFoundError(commandId);
    }
    return command;
  }

  /**
   * Drop a terminal command's bookkeeping.
   *
   * @returns true if the command was removed
   */
  forget(commandId: string): boolean {
    const command = this.commands.get(commandId);
    if (!command || command.status === 'pending' || command.status === 'executing') {
      return false;
    }
    return this.commands.delete(commandId);
  }

  /**
   * Commands in a given status, oldest first.
   */
  list(status?: CommandStatus): Command[] {
    const all = Array.from(this.commands.values());
    return status ? all.filter((command) => command.status === status) : all;
  }

  counts(): Record<CommandStatus, number> {
    const counts: Record<CommandStatus, number> = {
      pending: 0,
      executing: 0,
      completed: 0,
      failed: 0,
    };
    for (const command of this.commands.values()) {
      counts[command.status]++;
    }
    return counts;
  }

  get pendingCount(): number {
    return this.pending.length - this.head;
  }

  get size(): number {
    return this.commands.size;
  }

  /**
   * Drop every command.
   *
   * @returns Number of commands dropped
   */
  clear(): number {
    const dropped = this.commands.size;
    this.commands = new Map();
    this.pending = [];
    this.head = 0;
    return dropped;
  }

  private compactPending(): void {
    if (this.head > 1024 && this.head * 2 > this.pending.length) {
      this.pending = this.pending.slice(this.head);
      this.head = 0;
    }
  }
}
