// Parameter accessors for handlers
// Each throws ArgumentError naming the parameter when it is missing or mistyped.

import type { CommandParameters } from '@cmdbridge/protocol';
import { ArgumentError } from '../errors.js';

export function requireString(parameters: Readonly<CommandParameters>, name: string): string {
  const value = parameters[name];
  if (typeof value !== 'string' || value === '') {
    throw new ArgumentError(`Parameter '${name}' must be a non-empty string`, name);
  }
  return value;
}

export function requireNumber(parameters: Readonly<CommandParameters>, name: string): number {
  const value = parameters[name];
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ArgumentError(`Parameter '${name}' must be a finite number`, name);
  }
  return value;
}

export function optionalNumber(
  parameters: Readonly<CommandParameters>,
  name: string,
  fallback: number
): number {
  return parameters[name] === undefined ? fallback : requireNumber(parameters, name);
}

export function optionalString(
  parameters: Readonly<CommandParameters>,
  name: string
): string | undefined {
  return parameters[name] === undefined ? undefined : requireString(parameters, name);
}

export function requireArray(parameters: Readonly<CommandParameters>, name: string): unknown[] {
  const value = parameters[name];
  if (!Array.isArray(value)) {
    throw new ArgumentError(`Parameter '${name}' must be an array`, name);
  }
  return value;
}
