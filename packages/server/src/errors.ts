// Mapping of bridge errors onto HTTP and tRPC
//
// Error codes are defined by the runtime's BridgeError subclasses.

import type { TRPCError } from '@trpc/server';
import type { ValidationIssue } from '@cmdbridge/protocol';
import {
  BridgeError,
  InvalidCommandError,
  ReferenceAmbiguousError,
  ReferenceNotFoundError,
} from '@cmdbridge/runtime';

type ErrorMapping = { status: number; trpc: TRPCError['code'] };

const ERROR_MAPPINGS: Record<string, ErrorMapping> = {
  INVALID_COMMAND: { status: 400, trpc: 'BAD_REQUEST' },
  INVALID_RESULT: { status: 400, trpc: 'BAD_REQUEST' },
  ARGUMENT_ERROR: { status: 400, trpc: 'BAD_REQUEST' },
  COMMAND_NOT_FOUND: { status: 404, trpc: 'NOT_FOUND' },
  ENTITY_NOT_FOUND: { status: 404, trpc: 'NOT_FOUND' },
  REFERENCE_NOT_FOUND: { status: 404, trpc: 'NOT_FOUND' },
  REFERENCE_AMBIGUOUS: { status: 409, trpc: 'CONFLICT' },
  DUPLICATE_RESULT: { status: 409, trpc: 'CONFLICT' },
  INVALID_STATUS_TRANSITION: { status: 409, trpc: 'CONFLICT' },
  STORE_ERROR: { status: 503, trpc: 'INTERNAL_SERVER_ERROR' },
};

/**
 * A host report for `POST /command_result` that fails validation.
 */
export class InvalidResultError extends BridgeError {
  readonly issues: ValidationIssue[];

  constructor(issues: ValidationIssue[]) {
    super('INVALID_RESULT', `Invalid command result: ${issues.map((i) => i.message).join('; ')}`);
    this.name = 'InvalidResultError';
    this.issues = issues;
  }
}

const INTERNAL: ErrorMapping = { status: 500, trpc: 'INTERNAL_SERVER_ERROR' };

export function mappingFor(error: BridgeError): ErrorMapping {
  return ERROR_MAPPINGS[error.code] ?? INTERNAL;
}

/**
 * Structured details a caller can act on, if the error carries any.
 */
export function errorDetails(error: BridgeError): Record<string, unknown> | undefined {
  if (error instanceof InvalidCommandError || error instanceof InvalidResultError) {
    return { issues: error.issues };
  }
  if (error instanceof ReferenceAmbiguousError) {
    return { hint: error.hint, candidates: error.candidates };
  }
  if (error instanceof ReferenceNotFoundError) {
    return { hint: error.hint, typeFilter: error.typeFilter };
  }
  return undefined;
}
