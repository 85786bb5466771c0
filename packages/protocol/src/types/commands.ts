// Command envelope types

import type { Id, JsonObject, Timestamp } from './common.js';

/**
 * Lifecycle status of a command.
 * Transitions are monotonic: pending → executing → completed | failed.
 */
export type CommandStatus = 'pending' | 'executing' | 'completed' | 'failed';

/**
 * Terminal statuses. A command in one of these has exactly one published result.
 */
export const TERMINAL_COMMAND_STATUSES: readonly CommandStatus[] = ['completed', 'failed'];

/**
 * Allowed next statuses for each status.
 */
export const COMMAND_STATUS_TRANSITIONS: Readonly<Record<CommandStatus, readonly CommandStatus[]>> = {
  pending: ['executing'],
  executing: ['completed', 'failed'],
  completed: [],
  failed: [],
};

/**
 * Parameters are opaque to the bridge, with two exceptions: a string
 * `reference` is resolved against the entity registry at submit time,
 * and the resolved id is injected as `entity_id`.
 */
export type CommandParameters = JsonObject;

/**
 * A typed, parameterized unit of work for the host.
 * Envelopes are immutable; a status change produces a new envelope.
 */
export type Command = {
  readonly id: Id;
  readonly type: string;
  readonly parameters: Readonly<CommandParameters>;
  readonly createdAt: Timestamp;
  readonly status: CommandStatus;
};

/**
 * Producer input for a new command.
 */
export type SubmitCommandInput = {
  type: string;
  parameters?: CommandParameters;
};

/**
 * Shape delivered to a host on `GET /pending_commands`.
 */
export type WireCommand = {
  id: Id;
  type: string;
  parameters: CommandParameters;
  timestamp: Timestamp;
};

/**
 * Check whether a status transition is allowed.
 */
export function canTransition(from: CommandStatus, to: CommandStatus): boolean {
  return COMMAND_STATUS_TRANSITIONS[from].includes(to);
}

/**
 * Check whether a status is terminal.
 */
export function isTerminalStatus(status: CommandStatus): boolean {
  return TERMINAL_COMMAND_STATUSES.includes(status);
}

/**
 * Convert an envelope to its wire form.
 */
export function toWireCommand(command: Command): WireCommand {
  return {
    id: command.id,
    type: command.type,
    parameters: { ...command.parameters },
    timestamp: command.createdAt,
  };
}
