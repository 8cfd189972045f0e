/**
 * Readers for loosely-typed tool input.
 *
 * Tool callers (chat, CLI, dashboard) pass JSON objects. A missing key falls
 * back to the analyzer default; a present key of the wrong shape raises
 * InvalidParameterError, which the handlers turn into `{ error }`.
 */

import { InvalidParameterError, errorMessage } from '../infra/errors.js';

export type ToolInput = Record<string, unknown>;

export interface ToolError {
  error: string;
}

export function optionalNumber(input: ToolInput, key: string): number | undefined {
  const value = input[key];
  if (value === undefined || value === null) return undefined;
  const parsed = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
  if (typeof parsed !== 'number' || !Number.isFinite(parsed)) {
    throw new InvalidParameterError(key, 'must be a number');
  }
  return parsed;
}

export function optionalInteger(input: ToolInput, key: string): number | undefined {
  const value = optionalNumber(input, key);
  if (value !== undefined && !Number.isInteger(value)) {
    throw new InvalidParameterError(key, 'must be a whole number');
  }
  return value;
}

export function optionalString(input: ToolInput, key: string): string | undefined {
  const value = input[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string' || value.trim() === '') {
    throw new InvalidParameterError(key, 'must be a non-empty string');
  }
  return value.trim();
}

export function optionalBoolean(input: ToolInput, key: string): boolean | undefined {
  const value = input[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value === 'boolean') return value;
  if (value === 'true') return true;
  if (value === 'false') return false;
  throw new InvalidParameterError(key, 'must be true or false');
}

export function optionalEnum<T extends string>(
  input: ToolInput,
  key: string,
  values: readonly T[],
): T | undefined {
  const value = input[key];
  if (value === undefined || value === null) return undefined;
  const match = values.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new InvalidParameterError(key, `must be one of ${values.join(', ')}`);
  }
  return match;
}

/**
 * Run a tool body, mapping parameter errors to `{ error }`. Anything else
 * (store failures included) propagates.
 */
export function withParameterErrors<T>(fn: () => T): T | ToolError {
  try {
    return fn();
  } catch (err) {
    if (err instanceof InvalidParameterError) {
      return { error: errorMessage(err) };
    }
    throw err;
  }
}
