// Command envelope construction and status transitions

import { randomUUID } from 'node:crypto';
import type { Command, CommandStatus, SubmitCommandInput } from '@cmdbridge/protocol';
import { canTransition, validateSubmitInput } from '@cmdbridge/protocol';
import { InvalidCommandError, InvalidStatusTransitionError } from '../errors.js';

export type EnvelopeOptions = {
  /** Override id generation (defaults to a random UUID) */
  id?: string;

  /** Override creation time */
  now?: Date;
};

/**
 * Validate producer input and build a pending, frozen envelope.
 *
 * @throws InvalidCommandError if the input is malformed
 */
export function createCommand(input: unknown, options: EnvelopeOptions = {}): Command {
  const validation = validateSubmitInput(input);
  if (!validation.valid || !isInput(input)) {
    throw new InvalidCommandError(validation.errors);
  }

  return freeze({
    id: options.id ?? randomUUID(),
    type: input.type,
    parameters: { ...(input.parameters ?? {}) },
    createdAt: (options.now ?? new Date()).toISOString(),
    status: 'pending',
  });
}

/**
 * Return a copy of the envelope in a new status.
 *
 * @throws InvalidStatusTransitionError for reverse or skipped transitions
 */
export function transitionCommand(command: Command, to: CommandStatus): Command {
  if (!canTransition(command.status, to)) {
    throw new InvalidStatusTransitionError(command.id, command.status, to);
  }
  return freeze({ ...command, status: to });
}

function freeze(command: Command): Command {
  Object.freeze(command.parameters);
  return Object.freeze(command);
}

function isInput(input: unknown): input is SubmitCommandInput {
  return typeof input === 'object' && input !== null && 'type' in input && typeof input.type === 'string';
}
