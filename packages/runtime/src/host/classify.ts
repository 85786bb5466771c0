// Handler error classification
//
// Converts anything a handler throws into the structured payload of a
// failed result. Nothing thrown by a handler propagates past the executor.

import type { CommandErrorDetails, CommandErrorKind } from '@cmdbridge/protocol';
import {
  ArgumentError,
  NotRegisteredError,
  OperationError,
  OwnerThreadTimeoutError,
} from '../errors.js';

export const MAX_STACK_FRAMES = 12;

/**
 * Classify a thrown value.
 *
 * ArgumentError and RangeError map to ArgumentError, OperationError to
 * OperationError, owner-thread timeouts to HandlerTimeout, and
 * everything else to UnexpectedError.
 */
export function classifyError(error: unknown): CommandErrorDetails {
  if (error instanceof NotRegisteredError) {
    return notRegisteredDetails(error.commandType, error.availableCommands);
  }

  if (!(error instanceof Error)) {
    return {
      kind: 'UnexpectedError',
      message: typeof error === 'string' ? error : `Non-error value thrown: ${String(error)}`,
      exceptionClass: typeof error,
    };
  }

  return {
    kind: errorKind(error),
    message: error.message,
    exceptionClass: error.name,
    stack: truncateStack(error.stack),
  };
}

function errorKind(error: Error): CommandErrorKind {
  if (error instanceof OwnerThreadTimeoutError) return 'HandlerTimeout';
  if (error instanceof ArgumentError || error instanceof RangeError) return 'ArgumentError';
  if (error instanceof OperationError) return 'OperationError';
  return 'UnexpectedError';
}

/**
 * Failed-result payload for an unknown command type.
 */
export function notRegisteredDetails(
  commandType: string,
  availableCommands: string[]
): CommandErrorDetails {
  return {
    kind: 'NotRegistered',
    message: new NotRegisteredError(commandType, availableCommands).message,
    exceptionClass: 'NotRegisteredError',
    availableCommands: [...availableCommands],
  };
}

/**
 * Keep the header lines and at most `maxFrames` stack frames.
 */
export function truncateStack(
  stack: string | undefined,
  maxFrames: number = MAX_STACK_FRAMES
): string | undefined {
  if (!stack) {
    return undefined;
  }

  const lines = stack.split('\n');
  const firstFrame = lines.findIndex((line) => line.trimStart().startsWith('at '));
  if (firstFrame === -1) {
    return stack;
  }

  const header = lines.slice(0, firstFrame);
  const frames = lines.slice(firstFrame);
  if (frames.length <= maxFrames) {
    return stack;
  }

  const omitted = frames.length - maxFrames;
  return [...header, ...frames.slice(0, maxFrames), `    ... ${omitted} more frames`].join('\n');
}
