// Command envelope validation
//
// Checks producer input before it reaches the queue, and host reports
// before they reach the result store.

import type { SubmitCommandInput, WireCommandResult } from '../types/index.js';

/**
 * Result of validating an input
 */
export type ValidationResult = {
  valid: boolean;
  errors: ValidationIssue[];
};

/**
 * A single validation problem
 */
export type ValidationIssue = {
  path: string;
  message: string;
};

/**
 * Command types are identifiers such as `create_curve` or `get_document_info`.
 */
const COMMAND_TYPE_PATTERN = /^[A-Za-z][A-Za-z0-9_.:-]*$/;

const MAX_COMMAND_TYPE_LENGTH = 128;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate producer input for a new command.
 */
export function validateSubmitInput(input: unknown): ValidationResult {
  const errors: ValidationIssue[] = [];

  if (!isPlainObject(input)) {
    return { valid: false, errors: [{ path: '', message: 'Command must be an object' }] };
  }

  const { type, parameters } = input;

  if (type === undefined || type === null || type === '') {
    errors.push({ path: 'type', message: 'Command type is required' });
  } else if (typeof type !== 'string') {
    errors.push({ path: 'type', message: 'Command type must be a string' });
  } else if (type.length > MAX_COMMAND_TYPE_LENGTH) {
    errors.push({
      path: 'type',
      message: `Command type must be at most ${MAX_COMMAND_TYPE_LENGTH} characters`,
    });
  } else if (!COMMAND_TYPE_PATTERN.test(type)) {
    errors.push({ path: 'type', message: `Invalid command type: ${type}` });
  }

  if (parameters !== undefined && !isPlainObject(parameters)) {
    errors.push({ path: 'parameters', message: 'Parameters must be an object' });
  }

  if (isPlainObject(parameters) && parameters.reference !== undefined) {
    if (typeof parameters.reference !== 'string') {
      errors.push({ path: 'parameters.reference', message: 'Reference must be a string' });
    }
  }

  return { valid: errors.length === 0, errors };
}

/**
 * Type guard over validateSubmitInput.
 */
export function isSubmitCommandInput(input: unknown): input is SubmitCommandInput {
  return validateSubmitInput(input).valid;
}

/**
 * Validate a host report for `POST /command_result`.
 */
export function validateWireResult(input: unknown): ValidationResult {
  const errors: ValidationIssue[] = [];

  if (!isPlainObject(input)) {
    return { valid: false, errors: [{ path: '', message: 'Result must be an object' }] };
  }

  if (typeof input.command_id !== 'string' || input.command_id === '') {
    errors.push({ path: 'command_id', message: 'command_id is required' });
  }

  if (typeof input.success !== 'boolean') {
    errors.push({ path: 'success', message: 'success must be a boolean' });
  }

  const error = input.error;
  if (error !== undefined && error !== null && typeof error !== 'string') {
    if (!isPlainObject(error) || typeof error.message !== 'string') {
      errors.push({ path: 'error', message: 'error must be a string or { message }' });
    }
  }

  return { valid: errors.length === 0, errors };
}

/**
 * Type guard over validateWireResult.
 */
export function isWireCommandResult(input: unknown): input is WireCommandResult {
  return validateWireResult(input).valid;
}
