import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { Database } from '../db/index';
import { detectStockLosses, discrepancySeverity, getExplicitLosses } from './losses';
import { handleLossTool } from './losses-index';
import { recordLoss } from '../ledger/writer';
import { NOW, addProduct, addSupplier, daysAgo, openTestDb, receive, sell } from '../testing/fixtures';

describe('loss detection', () => {
  let db: Database;

  beforeEach(async () => {
    db = await openTestDb();
  });

  afterEach(() => {
    db.close();
  });

  /** Moves cached stock without a movement, as a bad import would. */
  function tamper(productId: number, currentStock: number): void {
    db.run('UPDATE product SET current_stock = ? WHERE id = ?', [currentStock, productId]);
  }

  describe('detectStockLosses', () => {
    it('finds nothing on a ledger maintained by the writer', () => {
      const supplier = addSupplier(db);
      const product = addProduct(db, { initialStock: 40 });
      receive(db, supplier.id, product.id, 25, daysAgo(20));
      sell(db, product.id, 12, daysAgo(5));
      recordLoss(db, product.id, 2, { at: daysAgo(3) });

      expect(detectStockLosses(db)).toEqual([]);
    });

    it('reports exactly the injected discrepancy', () => {
      const product = addProduct(db, { initialStock: 100 });
      sell(db, product.id, 20, daysAgo(4));
      tamper(product.id, 60);

      expect(detectStockLosses(db)).toEqual([
        {
          productId: product.id,
          sku: product.sku,
          name: 'Test product',
          category: 'N/A',
          currentStock: 60,
          expectedStock: 80,
          discrepancy: 20,
          discrepancyPercentage: 25,
          estimatedLossValue: 120,
          lastMovementDate: daysAgo(4).toISOString(),
          lossMovements: 0,
          severity: 'CRITICAL',
          recommendation: 'URGENT: Perform physical count and investigate immediately',
        },
      ]);
    });

    it('orders by severity then loss value and honours the tolerance', () => {
      const high = addProduct(db, { initialStock: 100 });
      tamper(high.id, 88);
      const withLoss = addProduct(db, { initialStock: 100 });
      recordLoss(db, withLoss.id, 3, { at: daysAgo(1) });
      tamper(withLoss.id, 90);
      const surplus = addProduct(db, { initialStock: 100 });
      tamper(surplus.id, 110);
      const minor = addProduct(db, { initialStock: 100 });
      tamper(minor.id, 97);

      const results = detectStockLosses(db);

      expect(results.map((r) => [r.productId, r.severity, r.discrepancy, r.estimatedLossValue])).toEqual([
        [high.id, 'HIGH', 12, 72],
        [surplus.id, 'MEDIUM', -10, 60],
        [withLoss.id, 'MEDIUM', 7, 42],
      ]);
      expect(results[2]).toMatchObject({ discrepancyPercentage: 7.22, lossMovements: 1 });
      expect(detectStockLosses(db, { tolerancePct: 2 }).map((r) => r.productId)).toContain(minor.id);
    });

    it('skips products without movements, zero expected stock, or inactive', () => {
      const bare = addProduct(db);
      tamper(bare.id, 5);
      const emptied = addProduct(db, { initialStock: 10 });
      sell(db, emptied.id, 10, daysAgo(2));
      tamper(emptied.id, 5);
      const retired = addProduct(db, { initialStock: 10, isActive: false });
      tamper(retired.id, 1);

      expect(detectStockLosses(db)).toEqual([]);
    });

    it('grades severity above 20 and 10 percent', () => {
      expect(discrepancySeverity(20.01)).toBe('CRITICAL');
      expect(discrepancySeverity(20)).toBe('HIGH');
      expect(discrepancySeverity(10)).toBe('MEDIUM');
    });
  });

  describe('getExplicitLosses', () => {
    it('lists recent LOSS movements, newest first', () => {
      const glass = addProduct(db, { initialStock: 50 });
      const fruit = addProduct(db, { initialStock: 50 });
      recordLoss(db, glass.id, 3, { at: daysAgo(10), notes: 'Broken in transit' });
      recordLoss(db, fruit.id, 4, { at: daysAgo(2), unitCost: 2.5 });
      recordLoss(db, glass.id, 1, { at: daysAgo(100) });

      const losses = getExplicitLosses(db, { now: NOW });

      expect(losses.map((l) => [l.productId, l.quantityLost, l.lossValue, l.daysAgo, l.notes])).toEqual([
        [fruit.id, 4, 10, 2, 'No notes'],
        [glass.id, 3, 18, 10, 'Broken in transit'],
      ]);
      expect(losses[1]?.lossDate).toBe(daysAgo(10).toISOString());
    });

    it('stays separate from reconciliation', () => {
      const product = addProduct(db, { initialStock: 50 });
      recordLoss(db, product.id, 5, { at: daysAgo(1) });

      expect(detectStockLosses(db)).toEqual([]);
      expect(getExplicitLosses(db, { now: NOW })).toHaveLength(1);
    });
  });

  describe('handleLossTool', () => {
    it('maps a bad tolerance to an error result', () => {
      expect(handleLossTool('detect_stock_losses', { tolerance_pct: 150 }, db)).toEqual({
        error: 'tolerancePct: must be between 0 and 100 (got 150)',
      });
    });

    it('totals reported losses', () => {
      const product = addProduct(db, { initialStock: 100 });
      tamper(product.id, 50);
      expect(handleLossTool('detect_stock_losses', {}, db)).toMatchObject({ success: true, count: 1, totalLossValue: 300 });
    });
  });
});
