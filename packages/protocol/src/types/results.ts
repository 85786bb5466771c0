// Command result types

import type { Id, Timestamp } from './common.js';
import type { Command } from './commands.js';

/**
 * Classification of a failed command.
 *
 * - ArgumentError: the handler rejected its parameters
 * - OperationError: the host could not perform the operation
 * - UnexpectedError: anything else thrown by a handler
 * - NotRegistered: no handler exists for the command type
 * - HandlerTimeout: the owner-thread call exceeded its hard timeout
 */
export type CommandErrorKind =
  | 'ArgumentError'
  | 'OperationError'
  | 'UnexpectedError'
  | 'NotRegistered'
  | 'HandlerTimeout';

export const COMMAND_ERROR_KINDS: readonly CommandErrorKind[] = [
  'ArgumentError',
  'OperationError',
  'UnexpectedError',
  'NotRegistered',
  'HandlerTimeout',
];

/**
 * Structured error payload carried by a failed result.
 */
export type CommandErrorDetails = {
  kind: CommandErrorKind;
  message: string;

  /** Class name of the thrown error, when there was one */
  exceptionClass?: string;

  /** Stack trace truncated to a fixed number of frames */
  stack?: string;

  /** Known command types (NotRegistered only) */
  availableCommands?: string[];
};

/**
 * The outcome of one command. Exactly one exists per command id.
 */
export type CommandResult = {
  commandId: Id;
  success: boolean;
  data: unknown;

  /** Human readable error message (failed results only) */
  error?: string;

  errorDetails?: CommandErrorDetails;
  debugInfo?: unknown;
  completedAt: Timestamp;
};

/**
 * What an executor reports back for a command, before the bridge
 * stamps it into a CommandResult.
 */
export type ExecutionOutcome =
  | { success: true; data: unknown; debugInfo?: unknown }
  | { success: false; error: CommandErrorDetails; data?: unknown; debugInfo?: unknown };

/**
 * Producer-observed result of waiting on a command.
 *
 * `timed_out`, `host_unavailable` and `session_reset` stop the wait only;
 * they are not command states.
 */
export type AwaitOutcome =
  | { status: 'completed'; result: CommandResult }
  | { status: 'timed_out'; commandId: Id; timeoutMs: number }
  | { status: 'host_unavailable'; commandId: Id; lastHostSeenAt: Timestamp | null }
  | { status: 'session_reset'; commandId: Id };

/**
 * Snapshot of a command and, once terminal, its result.
 */
export type CommandView = {
  command: Command;
  result: CommandResult | null;
};

/**
 * Entry in the bounded command history.
 */
export type CommandHistoryEntry = {
  commandId: Id;
  type: string;
  success: boolean;
  completedAt: Timestamp;
};

/**
 * Body of `POST /command_result`.
 * `result` is accepted as a synonym for `data`.
 */
export type WireCommandResult = {
  command_id: Id;
  success: boolean;
  data?: unknown;
  result?: unknown;
  error?: string | WireCommandError;
  debug_info?: unknown;
  timestamp?: Timestamp;
};

/**
 * Structured error on the wire.
 */
export type WireCommandError = {
  kind?: CommandErrorKind;
  message: string;
  exception_class?: string;
  stack?: string;
  available_commands?: string[];
};
