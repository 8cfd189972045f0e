/**
 * Error taxonomy for the analytics engine.
 *
 * - DataAccessError: the store failed. Always propagates to the caller; an
 *   analyzer never turns it into an empty result.
 * - LedgerWriteError: a write that would break the ledger invariants.
 * - InvalidParameterError: a caller-supplied parameter outside its domain.
 *
 * Ledger discrepancies are not errors: the integrity detector reports them
 * as regular output.
 */

export class DataAccessError extends Error {
  readonly sql: string;

  constructor(message: string, sql: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'DataAccessError';
    this.sql = sql;
  }
}

export class LedgerWriteError extends Error {
  readonly entity: string;
  readonly entityId?: number;

  constructor(message: string, entity: string, entityId?: number) {
    super(message);
    this.name = 'LedgerWriteError';
    this.entity = entity;
    this.entityId = entityId;
  }
}

export class InvalidParameterError extends Error {
  readonly parameter: string;

  constructor(parameter: string, message: string) {
    super(`${parameter}: ${message}`);
    this.name = 'InvalidParameterError';
    this.parameter = parameter;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
