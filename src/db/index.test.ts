import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, existsSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { createDatabase, MEMORY_PATH, queryOne, type Database } from './index';
import { createMigrationRunner, getMigrations } from './migrations';
import { DataAccessError } from '../infra/errors';

// =============================================================================
// In-memory database
// =============================================================================

describe('createDatabase (in-memory)', () => {
  let db: Database;

  beforeEach(async () => {
    db = await createDatabase({ path: MEMORY_PATH });
  });

  afterEach(() => {
    db.close();
  });

  it('applies every migration on open', () => {
    const runner = createMigrationRunner(db);
    expect(runner.getCurrentVersion()).toBe(getMigrations().length);
    expect(runner.getPendingMigrations()).toEqual([]);
    expect(db.path).toBeNull();
  });

  it('creates the seven ledger tables', () => {
    const tables = db
      .query<{ name: string }>(
        "SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' AND name != '_migrations' ORDER BY name",
      )
      .map((r) => r.name);
    expect(tables).toEqual([
      'product',
      'purchase_order',
      'purchase_order_item',
      'sale_order',
      'sale_order_item',
      'stock_movement',
      'supplier',
    ]);
  });

  it('reports changes and last insert id from run()', () => {
    const result = db.run(
      `INSERT INTO supplier (name, tax_id, is_active, created_at) VALUES ('Acme', 'T-1', 1, 0)`,
    );
    expect(result).toEqual({ changes: 1, lastInsertRowid: 1 });
  });

  it('rejects a movement that breaks stock_after = stock_before + quantity', () => {
    db.run(
      `INSERT INTO product (sku, name, sale_price, cost_price, created_at, updated_at)
       VALUES ('A', 'A', 1, 1, 0, 0)`,
    );
    expect(() =>
      db.run(
        `INSERT INTO stock_movement (product_id, movement_type, quantity, stock_before, stock_after, movement_date)
         VALUES (1, 'ADJUSTMENT', 5, 0, 4, 0)`,
      ),
    ).toThrow(DataAccessError);
  });

  it('rejects an unknown movement type', () => {
    db.run(
      `INSERT INTO product (sku, name, sale_price, cost_price, created_at, updated_at)
       VALUES ('A', 'A', 1, 1, 0, 0)`,
    );
    expect(() =>
      db.run(
        `INSERT INTO stock_movement (product_id, movement_type, quantity, stock_before, stock_after, movement_date)
         VALUES (1, 'TRANSFER', 5, 0, 5, 0)`,
      ),
    ).toThrow(DataAccessError);
  });

  it('rolls back a failed transaction', () => {
    expect(() =>
      db.transaction(() => {
        db.run(`INSERT INTO supplier (name, tax_id, is_active, created_at) VALUES ('Acme', 'T-1', 1, 0)`);
        throw new Error('boom');
      }),
    ).toThrow('boom');
    expect(queryOne<{ n: number }>(db, 'SELECT COUNT(*) AS n FROM supplier')?.n).toBe(0);
  });

  it('joins nested transactions to the outer one', () => {
    const result = db.transaction(() => {
      db.transaction(() => {
        db.run(`INSERT INTO supplier (name, tax_id, is_active, created_at) VALUES ('Acme', 'T-1', 1, 0)`);
      });
      return db.query<{ n: number }>('SELECT COUNT(*) AS n FROM supplier')[0]?.n;
    });
    expect(result).toBe(1);
  });

  it('wraps SQL errors in DataAccessError carrying the statement', () => {
    try {
      db.query('SELECT * FROM missing_table');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(DataAccessError);
      if (err instanceof DataAccessError) {
        expect(err.sql).toBe('SELECT * FROM missing_table');
      }
    }
  });

  it('refuses queries after close', () => {
    db.close();
    expect(() => db.query('SELECT 1')).toThrow(DataAccessError);
  });

  it('rolls back and re-applies migrations', () => {
    const runner = createMigrationRunner(db);
    runner.rollbackTo(1);
    expect(runner.getCurrentVersion()).toBe(1);
    runner.reset();
    expect(runner.getCurrentVersion()).toBe(0);
    runner.migrate();
    expect(runner.getAppliedMigrations().map((m) => m.name)).toEqual(['ledger_schema', 'analytics_indexes']);
  });
});

// =============================================================================
// File-backed database
// =============================================================================

describe('createDatabase (file-backed)', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'stock-insight-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('persists committed writes and reloads them', async () => {
    const path = join(dir, 'nested', 'ledger.db');
    const first = await createDatabase({ path });
    first.run(`INSERT INTO supplier (name, tax_id, is_active, created_at) VALUES ('Acme', 'T-1', 1, 0)`);
    first.close();
    expect(existsSync(path)).toBe(true);

    const second = await createDatabase({ path });
    expect(second.query<{ name: string }>('SELECT name FROM supplier')).toEqual([{ name: 'Acme' }]);
    second.close();
  });
});
