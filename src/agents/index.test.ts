import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { Database } from '../db/index';
import { executeTool, listTools } from './index';
import { DataAccessError } from '../infra/errors';
import { addProduct, openTestDb } from '../testing/fixtures';

describe('executeTool', () => {
  let db: Database;

  beforeEach(async () => {
    db = await openTestDb();
  });

  afterEach(() => {
    db.close();
  });

  it('registers every area once', () => {
    const names = listTools().map((t) => t.name);

    expect(names).toHaveLength(21);
    expect(new Set(names).size).toBe(21);
    expect(names).toContain('get_stock_alerts');
    expect(names).toContain('tool_search');
  });

  it('routes a call to the owning handler', () => {
    const product = addProduct(db, { initialStock: 100 });
    db.run('UPDATE product SET current_stock = 50 WHERE id = ?', [product.id]);

    expect(executeTool('detect_stock_losses', {}, db)).toMatchObject({ success: true, count: 1, totalLossValue: 300 });
  });

  it('returns parameter errors as results', () => {
    expect(executeTool('detect_stock_losses', { tolerance_pct: 150 }, db)).toEqual({
      error: 'tolerancePct: must be between 0 and 100 (got 150)',
    });
    expect(executeTool('forecast_everything', {}, db)).toEqual({ error: 'Unknown tool: forecast_everything' });
  });

  it('rethrows store failures', () => {
    db.close();
    expect(() => executeTool('detect_stock_losses', {}, db)).toThrow(DataAccessError);
  });

  it('searches the catalog by category', () => {
    expect(executeTool('tool_search', { category: 'integrity' }, db)).toEqual({
      success: true,
      total: 2,
      tools: [
        {
          name: 'detect_stock_losses',
          description: 'Reconcile stock on hand against the movement ledger and report discrepancies',
          category: 'integrity',
        },
        {
          name: 'get_explicit_losses',
          description: 'Recorded LOSS movements (breakage, theft, expiry) in a period',
          category: 'integrity',
        },
      ],
    });
    expect(executeTool('tool_search', { query: 'losses', category: 'suppliers' }, db)).toEqual({
      success: true,
      total: 0,
      tools: [],
    });
  });
});
