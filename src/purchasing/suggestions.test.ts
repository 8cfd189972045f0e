import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { Database } from '../db/index';
import { groupSuggestionsBySupplier, roundOrderQuantity, suggestPurchaseOrders } from './suggestions';
import { cancelPurchaseOrder } from '../ledger/writer';
import { NOW, addProduct, addSupplier, daysAgo, openTestDb, order, receive, sell } from '../testing/fixtures';

// =============================================================================
// roundOrderQuantity
// =============================================================================

describe('roundOrderQuantity', () => {
  it('rounds to the nearest unit below 10', () => {
    expect(roundOrderQuantity(4.4)).toBe(4);
    expect(roundOrderQuantity(9.6)).toBe(10);
  });

  it('rounds to the nearest 5 between 10 and 100', () => {
    expect(roundOrderQuantity(12.4)).toBe(10);
    expect(roundOrderQuantity(24)).toBe(25);
    expect(roundOrderQuantity(97)).toBe(95);
    expect(roundOrderQuantity(99.9)).toBe(100);
  });

  it('rounds to the nearest 10 from 100 on', () => {
    expect(roundOrderQuantity(104)).toBe(100);
    expect(roundOrderQuantity(106)).toBe(110);
  });

  it('sends exact midpoints to the even multiple', () => {
    expect(roundOrderQuantity(2.5)).toBe(2);
    expect(roundOrderQuantity(3.5)).toBe(4);
    expect(roundOrderQuantity(12.5)).toBe(10);
    expect(roundOrderQuantity(17.5)).toBe(20);
    expect(roundOrderQuantity(105)).toBe(100);
    expect(roundOrderQuantity(125)).toBe(120);
    expect(roundOrderQuantity(135)).toBe(140);
  });

  it('keeps a midpoint below one unit at the floor of one', () => {
    expect(roundOrderQuantity(0.5)).toBe(1);
  });

  it('never goes below one unit', () => {
    expect(roundOrderQuantity(0.3)).toBe(1);
    for (let raw = 0.05; raw < 150; raw += 0.35) {
      expect(roundOrderQuantity(raw)).toBeGreaterThanOrEqual(1);
    }
  });
});

// =============================================================================
// suggestPurchaseOrders / groupSuggestionsBySupplier
// =============================================================================

describe('purchase suggestions', () => {
  let db: Database;

  beforeEach(async () => {
    db = await openTestDb();
  });

  afterEach(() => {
    db.close();
  });

  /** Sells 90 units over the last 90 days: one unit a day on average. */
  function productSellingOnePerDay(initialStock: number, costPrice = 6): number {
    const product = addProduct(db, { initialStock, costPrice });
    for (const days of [85, 75, 65, 55, 45, 35, 25, 15, 5]) {
      sell(db, product.id, 10, daysAgo(days));
    }
    return product.id;
  }

  /** One received unit from the supplier `days` ago. */
  function previouslyBoughtFrom(supplierId: number, productId: number, days: number): void {
    receive(db, supplierId, productId, 1, daysAgo(days));
  }

  it('sizes, prices and prioritises suggestions', () => {
    const supplier = addSupplier(db);
    const medium = productSellingOnePerDay(100);
    const high = productSellingOnePerDay(93);
    productSellingOnePerDay(100, 1); // order too small
    productSellingOnePerDay(200); // enough stock
    const covered = productSellingOnePerDay(93);
    order(db, supplier.id, covered, 40, daysAgo(1));

    const suggestions = suggestPurchaseOrders(db, { now: NOW });

    expect(suggestions.map((s) => [s.productId, s.priority, s.suggestedQuantity, s.orderValue])).toEqual([
      [high, 'HIGH', 30, 180],
      [medium, 'MEDIUM', 25, 150],
      [covered, 'LOW', 30, 180],
    ]);
    expect(suggestions[1]).toMatchObject({
      currentStock: 10,
      avgDailySales: 1,
      forecastedDemand: 30,
      stockNeeded: 20,
      unitCost: 6,
      daysUntilStockout: 10,
      lastSaleDate: daysAgo(5).toISOString(),
      pendingOrders: { hasPending: false, totalQuantity: 0, orderCount: 0, isSufficient: false },
    });
    expect(suggestions[2]?.pendingOrders).toEqual({
      hasPending: true,
      totalQuantity: 40,
      orderCount: 1,
      isSufficient: true,
    });
  });

  it('honours the minimum order value', () => {
    productSellingOnePerDay(100);
    expect(suggestPurchaseOrders(db, { minOrderValue: 151, now: NOW })).toEqual([]);
    expect(suggestPurchaseOrders(db, { minOrderValue: 150, now: NOW })).toHaveLength(1);
  });

  it('groups by most recent supplier and keeps never-purchased products visible', () => {
    const acme = addSupplier(db, { name: 'Acme' });
    const globex = addSupplier(db, { name: 'Globex' });

    // Initial stock leaves room for the units received below
    const medium = productSellingOnePerDay(98);
    const high = productSellingOnePerDay(92);
    const covered = productSellingOnePerDay(93);
    const newcomer = productSellingOnePerDay(93);

    previouslyBoughtFrom(globex.id, medium, 200);
    previouslyBoughtFrom(acme.id, medium, 100);
    previouslyBoughtFrom(acme.id, high, 100);
    order(db, globex.id, covered, 40, daysAgo(1));

    const grouping = groupSuggestionsBySupplier(db, { now: NOW });

    expect(grouping.suppliers.map((s) => [s.supplierName, s.productsCount, s.totalOrderValue, s.highPriorityItems])).toEqual([
      ['Acme', 2, 330, 1],
      ['Globex', 1, 180, 0],
    ]);
    expect(grouping.suppliers[0]?.products.map((p) => p.productId)).toEqual([high, medium]);
    expect(grouping.unassigned).toEqual([
      expect.objectContaining({ productId: newcomer, quantity: 30, orderValue: 180, priority: 'HIGH' }),
    ]);
    expect(grouping.unassignedValue).toBe(180);
  });

  it('ignores cancelled purchase orders when picking the supplier', () => {
    const acme = addSupplier(db, { name: 'Acme' });
    const globex = addSupplier(db, { name: 'Globex' });

    const high = productSellingOnePerDay(92);
    previouslyBoughtFrom(acme.id, high, 100);
    cancelPurchaseOrder(db, order(db, globex.id, high, 5, daysAgo(20)).id);

    const onlyCancelled = productSellingOnePerDay(93);
    cancelPurchaseOrder(db, order(db, globex.id, onlyCancelled, 5, daysAgo(20)).id);

    const grouping = groupSuggestionsBySupplier(db, { now: NOW });

    expect(grouping.suppliers.map((s) => [s.supplierName, s.products.map((p) => p.productId)])).toEqual([
      ['Acme', [high]],
    ]);
    expect(grouping.unassigned.map((line) => line.productId)).toEqual([onlyCancelled]);
  });
});
