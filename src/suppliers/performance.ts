/**
 * Supplier Performance Scoring
 *
 * Scores each active supplier on how the products bought from it sell:
 *
 *   turnover  min(avgTurnover x 10, 50)
 *   revenue   min(revenue / 10000 x 30, 30)
 *   freshness max(20 - slowMovingPct / 5, 0)
 *
 * for a 0-100 composite.
 */

import { createLogger } from '../utils/logger.js';
import type { Database } from '../db/index.js';
import { listSuppliers, sumPaidSales } from '../ledger/index.js';
import { assertNever } from '../types.js';
import { cutoff, requirePositiveDays, round1, round2, round3, safeDiv } from '../analytics/helpers.js';
import type {
  SupplierMetric,
  SupplierPerformance,
  SupplierPerformanceOptions,
  SupplierRating,
} from './performance-types.js';

const logger = createLogger('suppliers');

/** Days without a PAID sale after which an in-stock product counts as slow. */
export const SLOW_MOVING_DAYS = 30;

export function supplierScore(avgTurnover: number, revenue: number, slowMovingPct: number): number {
  const turnoverScore = Math.min(avgTurnover * 10, 50);
  const revenueScore = Math.min((revenue / 10000) * 30, 30);
  const freshnessScore = Math.max(20 - slowMovingPct / 5, 0);
  return turnoverScore + revenueScore + freshnessScore;
}

export function supplierRating(score: number): SupplierRating {
  if (score >= 75) return 'Excellent';
  if (score >= 60) return 'Good';
  if (score >= 40) return 'Fair';
  return 'Poor';
}

function compareBy(metric: SupplierMetric): (a: SupplierPerformance, b: SupplierPerformance) => number {
  switch (metric) {
    case 'turnover_rate':
      return (a, b) => b.avgTurnoverRate - a.avgTurnoverRate;
    case 'revenue':
      return (a, b) => b.totalRevenue - a.totalRevenue;
    case 'slow_moving':
      return (a, b) => a.slowMovingPercentage - b.slowMovingPercentage;
    case 'score':
      return (a, b) => b.performanceScore - a.performanceScore;
    default:
      return assertNever(metric);
  }
}

interface SuppliedProductRow {
  id: number;
  current_stock: number;
}

export function analyzeSupplierPerformance(
  db: Database,
  options: SupplierPerformanceOptions = {},
): SupplierPerformance[] {
  const metric = options.metric ?? 'score';
  const periodDays = requirePositiveDays('periodDays', options.periodDays ?? 90);
  const now = options.now ?? Date.now();
  const periodStart = cutoff(now, periodDays);
  const slowCutoff = cutoff(now, SLOW_MOVING_DAYS);

  const results: SupplierPerformance[] = [];
  for (const supplier of listSuppliers(db)) {
    const products = db.query<SuppliedProductRow>(
      `SELECT DISTINCT p.id, p.current_stock
       FROM product p
       JOIN purchase_order_item poi ON poi.product_id = p.id
       JOIN purchase_order po ON poi.purchase_order_id = po.id
       WHERE po.supplier_id = ? AND po.status != 'CANCELLED'
       ORDER BY p.id`,
      [supplier.id],
    );
    if (products.length === 0) continue;

    const purchased = db.query<{ total: number | null }>(
      `SELECT SUM(poi.quantity * poi.unit_price) AS total
       FROM purchase_order_item poi
       JOIN purchase_order po ON poi.purchase_order_id = po.id
       WHERE po.supplier_id = ? AND po.status != 'CANCELLED' AND po.order_date >= ?`,
      [supplier.id, periodStart],
    )[0]?.total ?? 0;

    let revenue = 0;
    let inStock = 0;
    let slowMoving = 0;
    const turnoverRates: number[] = [];

    for (const product of products) {
      const periodSales = sumPaidSales(db, product.id, periodStart, now);
      revenue += periodSales.totalRevenue;
      if (periodSales.totalSold > 0) {
        turnoverRates.push(periodSales.totalSold / periodDays);
      }

      if (product.current_stock > 0) {
        inStock += 1;
        if (sumPaidSales(db, product.id, slowCutoff, now).salesCount === 0) slowMoving += 1;
      }
    }

    const avgTurnover = safeDiv(turnoverRates.reduce((sum, rate) => sum + rate, 0), turnoverRates.length);
    const slowMovingPct = (slowMoving / products.length) * 100;
    const score = supplierScore(avgTurnover, revenue, slowMovingPct);

    results.push({
      supplierId: supplier.id,
      supplierName: supplier.name,
      taxId: supplier.taxId,
      productsSupplied: products.length,
      totalPurchased: round2(purchased),
      totalRevenue: round2(revenue),
      avgTurnoverRate: round3(avgTurnover),
      productsInStock: inStock,
      slowMovingProducts: slowMoving,
      slowMovingPercentage: round1(slowMovingPct),
      performanceScore: round1(score),
      rating: supplierRating(score),
    });
  }

  const compare = compareBy(metric);
  results.sort((a, b) => compare(a, b) || a.supplierId - b.supplierId);

  logger.debug({ metric, periodDays, count: results.length }, 'Supplier performance scored');
  return results;
}
