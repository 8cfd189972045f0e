import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { Database } from '../db/index';
import { abcClassFor, getAbcAnalysis } from './abc';
import { calculateProfitability, getProfitabilitySummary, profitabilityRating } from './profitability';
import { analyzePurchaseToSaleTime, getInventoryAgeDistribution, turnoverRating } from './turnover';
import { getSalesByCategory, getTopSellingProducts, stockStatus } from './sales';
import { cancelSale, recordSale } from '../ledger/writer';
import { InvalidParameterError } from '../infra/errors';
import { NOW, addProduct, addSupplier, daysAgo, openTestDb, receive, sell } from '../testing/fixtures';

describe('classification analytics', () => {
  let db: Database;

  beforeEach(async () => {
    db = await openTestDb();
  });

  afterEach(() => {
    db.close();
  });

  // ===========================================================================
  // ABC
  // ===========================================================================

  describe('getAbcAnalysis', () => {
    /** Revenue shares 82% / 10% / 8% over the last month. */
    function paretoCatalogue(): number[] {
      const ids: number[] = [];
      for (const units of [8, 82, 10]) {
        const product = addProduct(db, { initialStock: 100 });
        sell(db, product.id, units, daysAgo(5));
        ids.push(product.id);
      }
      return ids;
    }

    it('keeps the top product in A even when it alone passes 80%', () => {
      const [small, big, medium] = paretoCatalogue();

      const abc = getAbcAnalysis(db, { now: NOW });

      expect(abc.classification.map((item) => [item.productId, item.abcClass, item.cumulativePercentage])).toEqual([
        [big, 'A', 82],
        [medium, 'B', 92],
        [small, 'C', 100],
      ]);
      expect(abc.classification[0]).toMatchObject({ metricValue: 820, totalQuantity: 82, percentageOfTotal: 82 });
    });

    it('summarizes each class and attaches strategies', () => {
      paretoCatalogue();

      const abc = getAbcAnalysis(db, { now: NOW });

      expect(abc.summary).toEqual({
        totalProducts: 3,
        totalMetricValue: 1000,
        metricName: 'revenue',
        classA: { count: 1, percentageOfProducts: 33.3, totalValue: 820, percentageOfTotal: 82 },
        classB: { count: 1, percentageOfProducts: 33.3, totalValue: 100, percentageOfTotal: 10 },
        classC: { count: 1, percentageOfProducts: 33.3, totalValue: 80, percentageOfTotal: 8 },
      });
      expect(abc.recommendations.map((r) => [r.abcClass, r.strategy])).toEqual([
        ['A', 'High Priority Management'],
        ['B', 'Moderate Management'],
        ['C', 'Minimal Management'],
      ]);
    });

    it('classifies every product with a non-decreasing cumulative share ending at 100', () => {
      for (const units of [1, 3, 40, 7, 7, 12, 2, 30, 5, 9]) {
        const product = addProduct(db, { initialStock: 100 });
        sell(db, product.id, units, daysAgo(3));
      }

      const { classification } = getAbcAnalysis(db, { metric: 'quantity', now: NOW });

      expect(classification).toHaveLength(10);
      for (const item of classification) {
        expect(['A', 'B', 'C']).toContain(item.abcClass);
      }
      for (let i = 1; i < classification.length; i++) {
        expect(classification[i]?.cumulativePercentage).toBeGreaterThanOrEqual(classification[i - 1]?.cumulativePercentage ?? 0);
      }
      expect(classification[classification.length - 1]?.cumulativePercentage).toBeCloseTo(100, 6);
    });

    it('ranks by gross profit under the profit metric', () => {
      const cheap = addProduct(db, { costPrice: 1, initialStock: 100 });
      const dear = addProduct(db, { costPrice: 9, initialStock: 100 });
      sell(db, cheap.id, 10, daysAgo(2));
      sell(db, dear.id, 20, daysAgo(2));

      const byRevenue = getAbcAnalysis(db, { metric: 'revenue', now: NOW });
      const byProfit = getAbcAnalysis(db, { metric: 'profit', now: NOW });

      expect(byRevenue.classification.map((item) => item.productId)).toEqual([dear.id, cheap.id]);
      expect(byProfit.classification.map((item) => [item.productId, item.metricValue])).toEqual([
        [cheap.id, 90],
        [dear.id, 20],
      ]);
    });

    it('ignores sales outside the period or not PAID', () => {
      const product = addProduct(db, { initialStock: 100 });
      sell(db, product.id, 5, daysAgo(45));
      recordSale(db, {
        orderNumber: 'SO-PENDING',
        saleDate: daysAgo(2),
        status: 'PENDING',
        items: [{ productId: product.id, quantity: 5, unitPrice: 10 }],
      });
      const cancelled = sell(db, product.id, 5, daysAgo(2));
      cancelSale(db, cancelled.id, daysAgo(1));

      expect(getAbcAnalysis(db, { now: NOW })).toEqual({ classification: [], summary: null, recommendations: [] });
      expect(getAbcAnalysis(db, { period: 'quarter', now: NOW }).classification).toHaveLength(1);
    });

    it('applies the 80/95 cut-offs after the first product', () => {
      expect(abcClassFor(95, 0)).toBe('A');
      expect(abcClassFor(80, 3)).toBe('A');
      expect(abcClassFor(80.01, 3)).toBe('B');
      expect(abcClassFor(95, 3)).toBe('B');
      expect(abcClassFor(95.01, 3)).toBe('C');
    });
  });

  // ===========================================================================
  // Profitability
  // ===========================================================================

  describe('profitability', () => {
    function margins(): { high: number; low: number; poor: number } {
      const high = addProduct(db, { costPrice: 6, initialStock: 50 });
      const low = addProduct(db, { costPrice: 8, initialStock: 50 });
      const poor = addProduct(db, { costPrice: 12, initialStock: 50 });
      sell(db, high.id, 10, daysAgo(3));
      sell(db, low.id, 10, daysAgo(3));
      sell(db, poor.id, 5, daysAgo(3));
      return { high: high.id, low: low.id, poor: poor.id };
    }

    it('computes profit, margin and ROI per product, most profit first', () => {
      const { high, low, poor } = margins();

      const analysis = calculateProfitability(db, { now: NOW });

      expect(analysis.map((p) => [p.productId, p.grossProfit, p.profitMarginPct, p.rating])).toEqual([
        [high, 40, 40, 'HIGH'],
        [low, 20, 20, 'LOW'],
        [poor, -10, -20, 'POOR'],
      ]);
      expect(analysis[0]).toMatchObject({
        totalRevenue: 100,
        totalCost: 60,
        unitsSold: 10,
        avgSalePrice: 10,
        avgCostPrice: 6,
        profitPerUnit: 4,
        roiPercentage: 66.7,
      });
      expect(analysis[2]?.roiPercentage).toBe(-16.7);
    });

    it('filters on minimum units sold', () => {
      const { poor } = margins();
      const ids = calculateProfitability(db, { minSales: 6, now: NOW }).map((p) => p.productId);
      expect(ids).toHaveLength(2);
      expect(ids).not.toContain(poor);
    });

    it('summarizes the period', () => {
      const { high, poor } = margins();

      const summary = getProfitabilitySummary(db, { now: NOW });

      expect(summary).toMatchObject({
        totalRevenue: 250,
        totalCost: 200,
        totalProfit: 50,
        overallMarginPct: 20,
        productsAnalyzed: 3,
        profitableProducts: 2,
        unprofitableProducts: 1,
      });
      expect(summary.topProfitMakers[0]?.productId).toBe(high);
      expect(summary.bottomPerformers[0]).toMatchObject({ productId: poor, grossProfit: -10, marginPct: -20 });
    });

    it('returns an empty summary when nothing sold', () => {
      expect(getProfitabilitySummary(db, { now: NOW })).toEqual({
        totalRevenue: 0,
        totalCost: 0,
        totalProfit: 0,
        overallMarginPct: 0,
        productsAnalyzed: 0,
        profitableProducts: 0,
        unprofitableProducts: 0,
        topProfitMakers: [],
        bottomPerformers: [],
      });
    });

    it('rates margins on 40/25/10 thresholds', () => {
      expect(profitabilityRating(40)).toBe('HIGH');
      expect(profitabilityRating(39.9)).toBe('MEDIUM');
      expect(profitabilityRating(25)).toBe('MEDIUM');
      expect(profitabilityRating(10)).toBe('LOW');
      expect(profitabilityRating(9.9)).toBe('POOR');
    });

    it('rejects a negative minimum', () => {
      expect(() => calculateProfitability(db, { minSales: -1, now: NOW })).toThrow(InvalidParameterError);
    });
  });

  // ===========================================================================
  // Turnover & age
  // ===========================================================================

  describe('analyzePurchaseToSaleTime', () => {
    it('measures days from each receipt to the next PAID sale', () => {
      const supplier = addSupplier(db);
      const quick = addProduct(db);
      receive(db, supplier.id, quick.id, 20, daysAgo(40));
      sell(db, quick.id, 5, daysAgo(37));
      receive(db, supplier.id, quick.id, 20, daysAgo(20));
      sell(db, quick.id, 5, daysAgo(10));
      receive(db, supplier.id, quick.id, 20, daysAgo(5));

      const slow = addProduct(db);
      receive(db, supplier.id, slow.id, 10, daysAgo(60));
      sell(db, slow.id, 1, daysAgo(30));

      const unsold = addProduct(db);
      receive(db, supplier.id, unsold.id, 10, daysAgo(10));

      const results = analyzePurchaseToSaleTime(db, { now: NOW });

      expect(results.map((r) => [r.productId, r.avgDaysToSale, r.rating])).toEqual([
        [slow.id, 30, 'SLOW'],
        [quick.id, 6.5, 'FAST'],
      ]);
      expect(results[1]).toMatchObject({
        purchasesCount: 3,
        minDaysToSale: 3,
        maxDaysToSale: 10,
        stillUnsoldCount: 1,
        currentStock: 50,
      });
      expect(analyzePurchaseToSaleTime(db, { minPurchases: 3, now: NOW }).map((r) => r.productId)).toEqual([quick.id]);
    });

    it('rates turnover on 7/21 day thresholds', () => {
      expect(turnoverRating(7)).toBe('FAST');
      expect(turnoverRating(7.1)).toBe('MEDIUM');
      expect(turnoverRating(21)).toBe('MEDIUM');
      expect(turnoverRating(21.5)).toBe('SLOW');
    });
  });

  describe('getInventoryAgeDistribution', () => {
    it('buckets in-stock received products by value', () => {
      const supplier = addSupplier(db);
      const fresh = addProduct(db);
      receive(db, supplier.id, fresh.id, 10, daysAgo(5));
      const aging = addProduct(db);
      receive(db, supplier.id, aging.id, 30, daysAgo(45));
      const stale = addProduct(db, { name: 'Stale' });
      receive(db, supplier.id, stale.id, 5, daysAgo(100));
      addProduct(db, { initialStock: 40 });
      const soldOut = addProduct(db);
      receive(db, supplier.id, soldOut.id, 3, daysAgo(20));
      sell(db, soldOut.id, 3, daysAgo(2));

      const distribution = getInventoryAgeDistribution(db, { now: NOW });

      expect(distribution.ageBrackets).toEqual([
        { bracket: '0-7 days', productsCount: 1, totalValue: 60, percentage: 22.2 },
        { bracket: '8-14 days', productsCount: 0, totalValue: 0, percentage: 0 },
        { bracket: '15-30 days', productsCount: 0, totalValue: 0, percentage: 0 },
        { bracket: '31-60 days', productsCount: 1, totalValue: 180, percentage: 66.7 },
        { bracket: '60+ days', productsCount: 1, totalValue: 30, percentage: 11.1 },
      ]);
      expect(distribution.totalProducts).toBe(3);
      expect(distribution.totalValue).toBe(270);
      expect(distribution.avgAgeDays).toBe(50);
      expect(distribution.oldestProduct).toEqual({
        productId: stale.id,
        name: 'Stale',
        sku: stale.sku,
        ageDays: 100,
        stock: 5,
        value: 30,
      });
    });

    it('is empty without stock', () => {
      const distribution = getInventoryAgeDistribution(db, { now: NOW });
      expect(distribution.totalProducts).toBe(0);
      expect(distribution.avgAgeDays).toBe(0);
      expect(distribution.oldestProduct).toBeNull();
    });
  });

  // ===========================================================================
  // Sales
  // ===========================================================================

  describe('sales ranking', () => {
    function catalogue(): { steady: number; bulk: number; thin: number } {
      const steady = addProduct(db, { category: 'Tools', initialStock: 100 });
      for (const days of [3, 6, 9]) sell(db, steady.id, 5, daysAgo(days));
      const bulk = addProduct(db, { category: 'Tools', initialStock: 20 });
      sell(db, bulk.id, 20, daysAgo(4));
      const thin = addProduct(db, { initialStock: 12 });
      sell(db, thin.id, 10, daysAgo(4));
      return { steady: steady.id, bulk: bulk.id, thin: thin.id };
    }

    it('ranks by revenue with stock status', () => {
      const { steady, bulk, thin } = catalogue();

      const top = getTopSellingProducts(db, { now: NOW });

      expect(top.map((p) => [p.rank, p.productId, p.percentageOfTotal, p.stockStatus])).toEqual([
        [1, bulk, 44.4, 'OUT'],
        [2, steady, 33.3, 'OK'],
        [3, thin, 22.2, 'LOW'],
      ]);
      expect(top[1]).toMatchObject({
        totalRevenue: 150,
        totalQuantity: 15,
        salesCount: 3,
        avgSaleValue: 50,
        avgQuantityPerSale: 5,
        currentStock: 85,
      });
    });

    it('ranks by frequency and shares within the limit', () => {
      const { steady, bulk } = catalogue();

      expect(getTopSellingProducts(db, { metric: 'frequency', limit: 1, now: NOW })[0]).toMatchObject({
        productId: steady,
        percentageOfTotal: 100,
      });
      expect(
        getTopSellingProducts(db, { metric: 'quantity', limit: 2, now: NOW }).map((p) => [p.productId, p.percentageOfTotal]),
      ).toEqual([
        [bulk, 57.1],
        [steady, 42.9],
      ]);
    });

    it('groups revenue by category', () => {
      catalogue();

      expect(getSalesByCategory(db, { now: NOW })).toEqual([
        {
          category: 'Tools',
          productsCount: 2,
          totalRevenue: 350,
          totalQuantity: 35,
          salesCount: 4,
          avgProductRevenue: 175,
          percentageOfTotal: 77.8,
        },
        {
          category: 'Uncategorized',
          productsCount: 1,
          totalRevenue: 100,
          totalQuantity: 10,
          salesCount: 1,
          avgProductRevenue: 100,
          percentageOfTotal: 22.2,
        },
      ]);
    });

    it('flags stock against a week of demand', () => {
      expect(stockStatus(0, 1)).toBe('OUT');
      expect(stockStatus(2, 2.34)).toBe('LOW');
      expect(stockStatus(3, 3)).toBe('OK');
    });

    it('rejects a non-positive limit', () => {
      expect(() => getTopSellingProducts(db, { limit: 0, now: NOW })).toThrow(InvalidParameterError);
    });
  });
});
