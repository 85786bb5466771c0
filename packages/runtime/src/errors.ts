// Bridge error types

import type { CommandStatus, Entity, ValidationIssue } from '@cmdbridge/protocol';

/**
 * Base class for all bridge errors.
 * Provides a stable code for transport mapping and logging.
 */
export class BridgeError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'BridgeError';
    this.code = code;
  }
}

/**
 * Malformed command envelope, rejected at enqueue.
 */
export class InvalidCommandError extends BridgeError {
  readonly issues: ValidationIssue[];

  constructor(issues: ValidationIssue[]) {
    super('INVALID_COMMAND', `Invalid command: ${issues.map((i) => i.message).join('; ')}`);
    this.name = 'InvalidCommandError';
    this.issues = issues;
  }
}

/**
 * No handler is registered for a command type.
 * Executors convert this into a failed result; it is never surfaced to the host.
 */
export class NotRegisteredError extends BridgeError {
  readonly commandType: string;
  readonly availableCommands: string[];

  constructor(commandType: string, availableCommands: string[]) {
    super(
      'NOT_REGISTERED',
      `No handler registered for command type '${commandType}'. Available commands: ${
        availableCommands.length > 0 ? availableCommands.join(', ') : '(none)'
      }`
    );
    this.name = 'NotRegisteredError';
    this.commandType = commandType;
    this.availableCommands = availableCommands;
  }
}

/**
 * A second result was published for the same command.
 * This is a protocol violation: the command may have executed twice.
 */
export class DuplicateResultError extends BridgeError {
  readonly commandId: string;

  constructor(commandId: string) {
    super('DUPLICATE_RESULT', `A result was already published for command ${commandId}`);
    this.name = 'DuplicateResultError';
    this.commandId = commandId;
  }
}

/**
 * The queue handed out a command that is not pending, or the same
 * command twice. Fatal to the bridge.
 */
export class QueueCorruptionError extends BridgeError {
  readonly commandId: string;

  constructor(commandId: string, reason: string) {
    super('QUEUE_CORRUPTION', `Queue corruption at command ${commandId}: ${reason}`);
    this.name = 'QueueCorruptionError';
    this.commandId = commandId;
  }
}

/**
 * Unknown command id (never submitted, or dropped by a reset or sweep).
 */
export class CommandNotFoundError extends BridgeError {
  readonly commandId: string;

  constructor(commandId: string) {
    super('COMMAND_NOT_FOUND', `Command not found: ${commandId}`);
    this.name = 'CommandNotFoundError';
    this.commandId = commandId;
  }
}

/**
 * A status change that would move a command backwards or skip a step.
 */
export class InvalidStatusTransitionError extends BridgeError {
  readonly commandId: string;
  readonly from: CommandStatus;
  readonly to: CommandStatus;

  constructor(commandId: string, from: CommandStatus, to: CommandStatus) {
    super(
      'INVALID_STATUS_TRANSITION',
      `Command ${commandId} cannot move from ${from} to ${to}`
    );
    this.name = 'InvalidStatusTransitionError';
    this.commandId = commandId;
    this.from = from;
    this.to = to;
  }
}

/**
 * The owner-thread call did not finish within its hard timeout.
 */
export class OwnerThreadTimeoutError extends BridgeError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number, label?: string) {
    super(
      'OWNER_THREAD_TIMEOUT',
      `${label ? `${label}: ` : ''}owner thread call timed out after ${timeoutMs}ms`
    );
    this.name = 'OwnerThreadTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Thrown by handlers when the caller supplied bad parameters.
 */
export class ArgumentError extends BridgeError {
  readonly parameter?: string;

  constructor(message: string, parameter?: string) {
    super('ARGUMENT_ERROR', message);
    this.name = 'ArgumentError';
    this.parameter = parameter;
  }
}

/**
 * Thrown by handlers when the host could not carry out the operation.
 */
export class OperationError extends BridgeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('OPERATION_ERROR', message, options);
    this.name = 'OperationError';
  }
}

/**
 * Entity id not present in the registry.
 */
export class EntityNotFoundError extends BridgeError {
  readonly entityId: string;

  constructor(entityId: string) {
    super('ENTITY_NOT_FOUND', `Entity not found: ${entityId}`);
    this.name = 'EntityNotFoundError';
    this.entityId = entityId;
  }
}

/**
 * A vague reference matched nothing in the registry.
 */
export class ReferenceNotFoundError extends BridgeError {
  readonly hint: string;
  readonly typeFilter: string[] | null;

  constructor(hint: string, reason: string, typeFilter: string[] | null) {
    super('REFERENCE_NOT_FOUND', `Could not resolve "${hint}": ${reason}`);
    this.name = 'ReferenceNotFoundError';
    this.hint = hint;
    this.typeFilter = typeFilter;
  }
}

/**
 * A vague reference could mean more than one entity.
 */
export class ReferenceAmbiguousError extends BridgeError {
  readonly hint: string;
  readonly candidates: Entity[];

  constructor(hint: string, reason: string, candidates: Entity[]) {
    super('REFERENCE_AMBIGUOUS', `Ambiguous reference "${hint}": ${reason}`);
    this.name = 'ReferenceAmbiguousError';
    this.hint = hint;
    this.candidates = candidates;
  }
}

/**
 * The registry's persistent store failed.
 */
export class RegistryStoreError extends BridgeError {
  constructor(operation: string, cause: unknown) {
    super(
      'STORE_ERROR',
      `Entity registry ${operation} failed: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause }
    );
    this.name = 'RegistryStoreError';
  }
}

/**
 * Protocol violations halt the bridge rather than continue in a corrupted state.
 */
export type ProtocolViolation = DuplicateResultError | QueueCorruptionError;

export function isProtocolViolation(error: unknown): error is ProtocolViolation {
  return error instanceof DuplicateResultError || error instanceof QueueCorruptionError;
}
