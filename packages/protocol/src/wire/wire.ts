// Conversions between domain values and their HTTP wire forms
//
// Hosts exchange snake_case JSON with the bridge. A host written against
// the legacy polling endpoints sends `result` instead of `data` and a
// plain string error; both are accepted.

import type {
  Command,
  CommandErrorDetails,
  CommandErrorKind,
  ExecutionOutcome,
  WireCommand,
  WireCommandError,
  WireCommandResult,
} from '../types/index.js';
import { COMMAND_ERROR_KINDS } from '../types/index.js';

export const MISSING_ERROR_MESSAGE = 'Host reported failure without an error message';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isErrorKind(value: unknown): value is CommandErrorKind {
  return typeof value === 'string' && COMMAND_ERROR_KINDS.some((kind) => kind === value);
}

/**
 * Type guard for one element of a `GET /pending_commands` response.
 */
export function isWireCommand(value: unknown): value is WireCommand {
  return (
    isPlainObject(value) &&
    typeof value.id === 'string' &&
    typeof value.type === 'string' &&
    isPlainObject(value.parameters) &&
    typeof value.timestamp === 'string'
  );
}

/**
 * Rebuild a drained command on the host side. Commands on the wire have
 * already been handed out, so they arrive executing.
 */
export function fromWireCommand(wire: WireCommand): Command {
  return {
    id: wire.id,
    type: wire.type,
    parameters: Object.freeze({ ...wire.parameters }),
    createdAt: wire.timestamp,
    status: 'executing',
  };
}

function fromWireError(error: WireCommandResult['error']): CommandErrorDetails {
  if (error === undefined || error === null) {
    return { kind: 'UnexpectedError', message: MISSING_ERROR_MESSAGE };
  }
  if (typeof error === 'string') {
    return { kind: 'UnexpectedError', message: error };
  }

  const details: CommandErrorDetails = {
    kind: isErrorKind(error.kind) ? error.kind : 'UnexpectedError',
    message: error.message,
  };
  if (error.exception_class !== undefined) details.exceptionClass = error.exception_class;
  if (error.stack !== undefined) details.stack = error.stack;
  if (error.available_commands !== undefined) {
    details.availableCommands = [...error.available_commands];
  }
  return details;
}

/**
 * Turn a host report into an execution outcome.
 */
export function fromWireResult(wire: WireCommandResult): ExecutionOutcome {
  const data = wire.data !== undefined ? wire.data : (wire.result ?? null);

  if (wire.success) {
    return { success: true, data, debugInfo: wire.debug_info };
  }
  return {
    success: false,
    error: fromWireError(wire.error),
    data,
    debugInfo: wire.debug_info,
  };
}

function toWireError(details: CommandErrorDetails): WireCommandError {
  const error: WireCommandError = { kind: details.kind, message: details.message };
  if (details.exceptionClass !== undefined) error.exception_class = details.exceptionClass;
  if (details.stack !== undefined) error.stack = details.stack;
  if (details.availableCommands !== undefined) {
    error.available_commands = [...details.availableCommands];
  }
  return error;
}

/**
 * Turn an execution outcome into a host report.
 */
export function toWireResult(
  commandId: string,
  outcome: ExecutionOutcome,
  timestamp: string
): WireCommandResult {
  const wire: WireCommandResult = {
    command_id: commandId,
    success: outcome.success,
    data: outcome.data ?? null,
    timestamp,
  };
  if (!outcome.success) {
    wire.error = toWireError(outcome.error);
  }
  if (outcome.debugInfo !== undefined) {
    wire.debug_info = outcome.debugInfo;
  }
  return wire;
}
