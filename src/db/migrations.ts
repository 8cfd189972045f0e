/**
 * Database Migrations - Versioned schema management for the stock ledger
 *
 * Features:
 * - Sequential migration execution
 * - Up/down migrations (string SQL or programmatic)
 * - Migration tracking via _migrations table
 * - Rollback support (single, to-version, full reset)
 */

import type { Database } from './index.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('migrations');

/** Migration definition */
export type MigrationStep = string | ((db: Database) => void);

export interface Migration {
  /** Migration version (sequential number) */
  version: number;
  /** Migration name for display */
  name: string;
  /** SQL or function to apply migration */
  up: MigrationStep;
  /** SQL or function to revert migration */
  down: MigrationStep;
}

/** Migration status record */
export interface MigrationStatus {
  version: number;
  name: string;
  appliedAt: Date;
}

const LEDGER_SCHEMA_UP = `
  CREATE TABLE IF NOT EXISTS product (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    sku TEXT NOT NULL UNIQUE,
    gtin TEXT,
    name TEXT NOT NULL,
    category TEXT,
    brand TEXT,
    sale_price REAL NOT NULL CHECK (sale_price >= 0),
    cost_price REAL NOT NULL CHECK (cost_price >= 0),
    current_stock REAL NOT NULL DEFAULT 0,
    min_stock REAL NOT NULL DEFAULT 0,
    is_active INTEGER NOT NULL DEFAULT 1,
    created_at INTEGER NOT NULL,
    updated_at INTEGER NOT NULL
  );

  CREATE TABLE IF NOT EXISTS supplier (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL,
    tax_id TEXT NOT NULL UNIQUE,
    email TEXT,
    phone TEXT,
    address TEXT,
    city TEXT,
    state TEXT,
    is_active INTEGER NOT NULL DEFAULT 1,
    created_at INTEGER NOT NULL
  );

  CREATE TABLE IF NOT EXISTS purchase_order (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    order_number TEXT NOT NULL UNIQUE,
    supplier_id INTEGER NOT NULL REFERENCES supplier(id),
    order_date INTEGER NOT NULL,
    received_date INTEGER,
    total_amount REAL NOT NULL,
    status TEXT NOT NULL DEFAULT 'PENDING' CHECK (status IN ('PENDING', 'RECEIVED', 'CANCELLED')),
    notes TEXT,
    created_at INTEGER NOT NULL,
    updated_at INTEGER NOT NULL
  );

  CREATE TABLE IF NOT EXISTS purchase_order_item (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    purchase_order_id INTEGER NOT NULL REFERENCES purchase_order(id) ON DELETE CASCADE,
    product_id INTEGER NOT NULL REFERENCES product(id),
    quantity REAL NOT NULL CHECK (quantity > 0),
    unit_price REAL NOT NULL CHECK (unit_price >= 0)
  );

  CREATE TABLE IF NOT EXISTS sale_order (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    order_number TEXT NOT NULL UNIQUE,
    sale_date INTEGER NOT NULL,
    total_amount REAL NOT NULL,
    status TEXT NOT NULL DEFAULT 'PAID' CHECK (status IN ('PENDING', 'PAID', 'CANCELLED')),
    notes TEXT,
    created_at INTEGER NOT NULL,
    updated_at INTEGER NOT NULL
  );

  CREATE TABLE IF NOT EXISTS sale_order_item (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    sale_order_id INTEGER NOT NULL REFERENCES sale_order(id) ON DELETE CASCADE,
    product_id INTEGER NOT NULL REFERENCES product(id),
    quantity REAL NOT NULL CHECK (quantity > 0),
    unit_price REAL NOT NULL CHECK (unit_price >= 0)
  );

  CREATE TABLE IF NOT EXISTS stock_movement (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    product_id INTEGER NOT NULL REFERENCES product(id),
    movement_type TEXT NOT NULL CHECK (movement_type IN ('PURCHASE', 'SALE', 'ADJUSTMENT', 'RETURN', 'LOSS')),
    reference_id INTEGER,
    quantity REAL NOT NULL,
    unit_cost REAL,
    stock_before REAL NOT NULL,
    stock_after REAL NOT NULL,
    movement_date INTEGER NOT NULL,
    notes TEXT,
    CHECK (abs(stock_after - (stock_before + quantity)) < 0.0005)
  )
`;

const LEDGER_SCHEMA_DOWN = `
  DROP TABLE IF EXISTS stock_movement;
  DROP TABLE IF EXISTS sale_order_item;
  DROP TABLE IF EXISTS sale_order;
  DROP TABLE IF EXISTS purchase_order_item;
  DROP TABLE IF EXISTS purchase_order;
  DROP TABLE IF EXISTS supplier;
  DROP TABLE IF EXISTS product
`;

const ANALYTICS_INDEXES_UP = `
  CREATE INDEX IF NOT EXISTS idx_product_active ON product(is_active);
  CREATE INDEX IF NOT EXISTS idx_purchase_order_status ON purchase_order(status);
  CREATE INDEX IF NOT EXISTS idx_purchase_order_date ON purchase_order(order_date);
  CREATE INDEX IF NOT EXISTS idx_purchase_order_supplier ON purchase_order(supplier_id);
  CREATE INDEX IF NOT EXISTS idx_purchase_item_product ON purchase_order_item(product_id);
  CREATE INDEX IF NOT EXISTS idx_sale_order_status_date ON sale_order(status, sale_date);
  CREATE INDEX IF NOT EXISTS idx_sale_item_product ON sale_order_item(product_id);
  CREATE INDEX IF NOT EXISTS idx_movement_product_date ON stock_movement(product_id, movement_date);
  CREATE INDEX IF NOT EXISTS idx_movement_type ON stock_movement(movement_type)
`;

const ANALYTICS_INDEXES_DOWN = `
  DROP INDEX IF EXISTS idx_movement_type;
  DROP INDEX IF EXISTS idx_movement_product_date;
  DROP INDEX IF EXISTS idx_sale_item_product;
  DROP INDEX IF EXISTS idx_sale_order_status_date;
  DROP INDEX IF EXISTS idx_purchase_item_product;
  DROP INDEX IF EXISTS idx_purchase_order_supplier;
  DROP INDEX IF EXISTS idx_purchase_order_date;
  DROP INDEX IF EXISTS idx_purchase_order_status;
  DROP INDEX IF EXISTS idx_product_active
`;

/** All migrations in order */
const MIGRATIONS: Migration[] = [
  {
    version: 1,
    name: 'ledger_schema',
    up: LEDGER_SCHEMA_UP,
    down: LEDGER_SCHEMA_DOWN,
  },
  {
    version: 2,
    name: 'analytics_indexes',
    up: ANALYTICS_INDEXES_UP,
    down: ANALYTICS_INDEXES_DOWN,
  },
];

// =============================================================================
// Migration Runner
// =============================================================================

export interface MigrationRunner {
  /** Get current database version */
  getCurrentVersion(): number;

  /** Get all applied migrations */
  getAppliedMigrations(): MigrationStatus[];

  /** Get pending migrations */
  getPendingMigrations(): Migration[];

  /** Run all pending migrations */
  migrate(): void;

  /** Rollback to a specific version */
  rollbackTo(version: number): void;

  /** Reset database (rollback all) */
  reset(): void;
}

function executeStep(db: Database, step: MigrationStep): void {
  if (typeof step === 'string') {
    // Migration SQL may contain multiple statements
    const statements = step
      .split(';')
      .map((s) => s.trim())
      .filter((s) => s.length > 0);

    for (const sql of statements) {
      db.run(sql);
    }
  } else {
    step(db);
  }
}

export function createMigrationRunner(db: Database): MigrationRunner {
  db.run(`
    CREATE TABLE IF NOT EXISTS _migrations (
      version INTEGER PRIMARY KEY,
      name TEXT NOT NULL,
      applied_at INTEGER NOT NULL
    )
  `);

  function getCurrentVersion(): number {
    const results = db.query<{ version: number | null }>(
      'SELECT MAX(version) as version FROM _migrations',
    );
    return results[0]?.version ?? 0;
  }

  function getAppliedMigrations(): MigrationStatus[] {
    const rows = db.query<{ version: number; name: string; applied_at: number }>(
      'SELECT version, name, applied_at FROM _migrations ORDER BY version',
    );
    return rows.map((row) => ({
      version: row.version,
      name: row.name,
      appliedAt: new Date(row.applied_at),
    }));
  }

  function getPendingMigrations(): Migration[] {
    const currentVersion = getCurrentVersion();
    return MIGRATIONS.filter((m) => m.version > currentVersion);
  }

  function applyMigration(migration: Migration): void {
    logger.info({ version: migration.version, name: migration.name }, 'Applying migration');

    try {
      db.transaction(() => {
        executeStep(db, migration.up);
        db.run('INSERT INTO _migrations (version, name, applied_at) VALUES (?, ?, ?)', [
          migration.version,
          migration.name,
          Date.now(),
        ]);
      });
    } catch (err) {
      logger.error({ err, version: migration.version }, 'Migration failed');
      throw err;
    }
  }

  function revertMigration(migration: Migration): void {
    logger.info({ version: migration.version, name: migration.name }, 'Reverting migration');

    try {
      db.transaction(() => {
        executeStep(db, migration.down);
        db.run('DELETE FROM _migrations WHERE version = ?', [migration.version]);
      });
    } catch (err) {
      logger.error({ err, version: migration.version }, 'Rollback failed');
      throw err;
    }
  }

  function rollbackTo(version: number): void {
    const current = getCurrentVersion();
    if (version >= current) {
      logger.info('Nothing to rollback');
      return;
    }

    const toRevert = MIGRATIONS.filter(
      (m) => m.version > version && m.version <= current,
    ).reverse();

    for (const migration of toRevert) {
      revertMigration(migration);
    }
  }

  return {
    getCurrentVersion,
    getAppliedMigrations,
    getPendingMigrations,

    migrate() {
      const pending = getPendingMigrations();

      if (pending.length === 0) {
        logger.debug('Database is up to date');
        return;
      }

      logger.info({ count: pending.length }, 'Running migrations');

      for (const migration of pending) {
        applyMigration(migration);
      }

      logger.info({ version: getCurrentVersion() }, 'Migrations complete');
    },

    rollbackTo,

    reset() {
      rollbackTo(0);
    },
  };
}

/** Get all defined migrations */
export function getMigrations(): Migration[] {
  return [...MIGRATIONS];
}
