/**
 * Database - SQLite (sql.js WASM) store for the stock ledger
 *
 * The whole database lives in memory. File-backed databases are loaded on
 * open and written back atomically (temp file + rename) after every
 * committed mutation.
 */

import initSqlJs, { type Database as SqlJsDatabase, type Statement } from 'sql.js';
import { dirname } from 'path';
import { mkdirSync, existsSync, readFileSync, writeFileSync, renameSync } from 'fs';
import { createLogger } from '../utils/logger.js';
import { DataAccessError, errorMessage } from '../infra/errors.js';
import { createMigrationRunner } from './migrations.js';

const logger = createLogger('db');

export const MEMORY_PATH = ':memory:';

/**
 * Values that can be bound to SQL parameters.
 */
export type SqlBindValue = string | number | null;

export type SqlParams = SqlBindValue[];

export interface RunResult {
  changes: number;
  lastInsertRowid: number;
}

// ---------------------------------------------------------------------------
// Database interface
// ---------------------------------------------------------------------------

export interface Database {
  /** File the database persists to, or null for in-memory databases */
  readonly path: string | null;

  run(sql: string, params?: SqlParams): RunResult;
  query<T>(sql: string, params?: SqlParams): T[];

  /**
   * Run `fn` inside a transaction. Commits (and persists) when it returns,
   * rolls back when it throws. Nested calls join the outer transaction.
   */
  transaction<T>(fn: () => T): T;

  save(): void;
  close(): void;
}

export interface CreateDatabaseOptions {
  /** File path, or ':memory:' (default) */
  path?: string;
  /** Apply pending migrations on open (default: true) */
  migrate?: boolean;
}

// ---------------------------------------------------------------------------
// createDatabase
// ---------------------------------------------------------------------------

export async function createDatabase(options: CreateDatabaseOptions = {}): Promise<Database> {
  const filePath = options.path && options.path !== MEMORY_PATH ? options.path : null;

  let raw: SqlJsDatabase;
  try {
    const SQL = await initSqlJs();
    if (filePath && existsSync(filePath)) {
      logger.info({ path: filePath }, 'Opening database');
      raw = new SQL.Database(readFileSync(filePath));
    } else {
      raw = new SQL.Database();
    }
  } catch (err) {
    throw new DataAccessError(`Failed to open database: ${errorMessage(err)}`, '', err);
  }

  raw.run('PRAGMA foreign_keys = ON');

  const db = wrapSqlJs(raw, filePath);
  if (options.migrate !== false) {
    createMigrationRunner(db).migrate();
  }
  return db;
}

function wrapSqlJs(raw: SqlJsDatabase, filePath: string | null): Database {
  let txDepth = 0;
  let closed = false;

  function ensureOpen(sql: string): void {
    if (closed) throw new DataAccessError('Database is closed', sql);
  }

  function persist(): void {
    if (!filePath || txDepth > 0) return;
    const dir = dirname(filePath);
    if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
    const tmpPath = `${filePath}.tmp`;
    writeFileSync(tmpPath, Buffer.from(raw.export()));
    renameSync(tmpPath, filePath);
  }

  const db: Database = {
    path: filePath,

    run(sql: string, params: SqlParams = []): RunResult {
      ensureOpen(sql);
      try {
        raw.run(sql, params);
        const changes = raw.getRowsModified();
        const idRows = raw.exec('SELECT last_insert_rowid()');
        const lastInsertRowid = Number(idRows[0]?.values[0]?.[0] ?? 0);
        persist();
        return { changes, lastInsertRowid };
      } catch (err) {
        logger.error({ err, sql }, 'Statement failed');
        throw new DataAccessError(`Statement failed: ${errorMessage(err)}`, sql, err);
      }
    },

    query<T>(sql: string, params: SqlParams = []): T[] {
      ensureOpen(sql);
      let stmt: Statement;
      try {
        stmt = raw.prepare(sql);
      } catch (err) {
        logger.error({ err, sql }, 'Query preparation failed');
        throw new DataAccessError(`Query failed: ${errorMessage(err)}`, sql, err);
      }
      try {
        stmt.bind(params);
        const results: T[] = [];
        while (stmt.step()) {
          results.push(stmt.getAsObject() as T);
        }
        return results;
      } catch (err) {
        logger.error({ err, sql }, 'Query failed');
        throw new DataAccessError(`Query failed: ${errorMessage(err)}`, sql, err);
      } finally {
        stmt.free();
      }
    },

    transaction<T>(fn: () => T): T {
      ensureOpen('BEGIN');
      if (txDepth > 0) {
        txDepth++;
        try {
          return fn();
        } finally {
          txDepth--;
        }
      }

      raw.run('BEGIN');
      txDepth = 1;
      try {
        const result = fn();
        raw.run('COMMIT');
        txDepth = 0;
        persist();
        return result;
      } catch (err) {
        txDepth = 0;
        raw.run('ROLLBACK');
        throw err;
      }
    },

    save(): void {
      ensureOpen('');
      persist();
    },

    close(): void {
      if (closed) return;
      persist();
      raw.close();
      closed = true;
    },
  };

  return db;
}

/** Convenience for single-row aggregate queries. */
export function queryOne<T>(db: Database, sql: string, params: SqlParams = []): T | undefined {
  return db.query<T>(sql, params)[0];
}
