/**
 * Reactive stock detectors
 *
 * - Stock rupture: stock at or below zero while demand was still arriving.
 * - Slow-moving stock: stock on hand with no PAID sale for a while.
 * - Low cover: stock on hand that recent demand will exhaust within days.
 */

import { createLogger } from '../utils/logger.js';
import type { Database } from '../db/index.js';
import { getLastPaidSaleDate, getLastPurchaseDate, listProducts } from '../ledger/index.js';
import { assertNever } from '../types.js';
import { cutoff, daysBetween, requirePositiveDays, round1, round2, safeDiv, toIso } from './helpers.js';
import type {
  LowCoverageItem,
  LowCoverageOptions,
  RuptureOptions,
  SlowMovingItem,
  SlowMovingOptions,
  SlowMovingTier,
  StockRupture,
} from './stock-health-types.js';

const logger = createLogger('analytics-stock-health');

// =============================================================================
// detectStockRupture
// =============================================================================

interface RuptureRow {
  id: number;
  sku: string;
  name: string;
  category: string | null;
  current_stock: number;
  sale_price: number;
  sales_count: number;
  last_sale_date: number;
  total_quantity_sold: number;
}

/**
 * Products with stock <= 0 that had at least one PAID sale in the lookback
 * window, most units sold first.
 */
export function detectStockRupture(db: Database, options: RuptureOptions = {}): StockRupture[] {
  const lookbackDays = requirePositiveDays('lookbackDays', options.lookbackDays ?? 14);
  const now = options.now ?? Date.now();

  const rows = db.query<RuptureRow>(
    `SELECT p.id, p.sku, p.name, p.category, p.current_stock, p.sale_price,
            COUNT(DISTINCT so.id) AS sales_count,
            MAX(so.sale_date) AS last_sale_date,
            SUM(soi.quantity) AS total_quantity_sold
     FROM product p
     JOIN sale_order_item soi ON soi.product_id = p.id
     JOIN sale_order so ON soi.sale_order_id = so.id
     WHERE p.current_stock <= 0
       AND so.sale_date >= ?
       AND so.sale_date <= ?
       AND so.status = 'PAID'
     GROUP BY p.id
     ORDER BY total_quantity_sold DESC, p.id ASC`,
    [cutoff(now, lookbackDays), now],
  );

  const results = rows.map((row): StockRupture => {
    const dailyDemand = safeDiv(row.total_quantity_sold, lookbackDays);

    // Latest point where the running total hit zero
    const zeroRows = db.query<{ movement_date: number }>(
      `SELECT movement_date FROM stock_movement
       WHERE product_id = ? AND stock_after = 0
       ORDER BY movement_date DESC, id DESC LIMIT 1`,
      [row.id],
    );
    const zeroAt = zeroRows[0]?.movement_date;
    const daysOut = zeroAt === undefined ? 0 : Math.max(0, daysBetween(zeroAt, now));

    return {
      productId: row.id,
      sku: row.sku,
      name: row.name,
      category: row.category ?? 'N/A',
      currentStock: row.current_stock,
      recentSalesCount: row.sales_count,
      lastSaleDate: toIso(row.last_sale_date),
      totalQuantitySold: row.total_quantity_sold,
      estimatedDailyDemand: round2(dailyDemand),
      daysOutOfStock: daysOut,
      lostRevenueEstimate: round2(daysOut * dailyDemand * row.sale_price),
    };
  });

  logger.debug({ lookbackDays, count: results.length }, 'Stock rupture scan complete');
  return results;
}

// =============================================================================
// analyzeSlowMovingStock
// =============================================================================

export function slowMovingTier(daysWithoutSale: number): SlowMovingTier {
  if (daysWithoutSale > 90) return 'URGENT';
  if (daysWithoutSale > 60) return 'IMPORTANT';
  return 'MONITOR';
}

function slowMovingRecommendation(tier: SlowMovingTier): string {
  switch (tier) {
    case 'URGENT':
      return 'URGENT: Consider discount/promotion or return to supplier';
    case 'IMPORTANT':
      return 'IMPORTANT: Apply discount to move stock';
    case 'MONITOR':
      return 'MONITOR: Track sales, consider light promotion';
    default:
      return assertNever(tier);
  }
}

/**
 * Products in stock with no PAID sale for at least `daysThreshold` days.
 * Never-sold products count as infinitely old. Biggest tied-up value first.
 */
export function analyzeSlowMovingStock(db: Database, options: SlowMovingOptions = {}): SlowMovingItem[] {
  const daysThreshold = requirePositiveDays('daysThreshold', options.daysThreshold ?? 30);
  const now = options.now ?? Date.now();

  const results: SlowMovingItem[] = [];
  for (const product of listProducts(db, { inStockOnly: true })) {
    const lastSale = getLastPaidSaleDate(db, product.id, now);
    const age = lastSale === null ? Number.POSITIVE_INFINITY : daysBetween(lastSale.getTime(), now);
    if (age < daysThreshold) continue;

    const tier = slowMovingTier(age);
    results.push({
      productId: product.id,
      sku: product.sku,
      name: product.name,
      category: product.category ?? 'N/A',
      currentStock: product.currentStock,
      stockValue: round2(product.currentStock * product.costPrice),
      lastSaleDate: toIso(lastSale),
      daysWithoutSale: Number.isFinite(age) ? age : null,
      lastPurchaseDate: toIso(getLastPurchaseDate(db, product.id)),
      tier,
      recommendation: slowMovingRecommendation(tier),
    });
  }

  results.sort((a, b) => b.stockValue - a.stockValue || a.productId - b.productId);

  logger.debug({ daysThreshold, count: results.length }, 'Slow-moving scan complete');
  return results;
}

// =============================================================================
// detectLowStockHighDemand
// =============================================================================

interface RecentSalesRow {
  id: number;
  sku: string;
  name: string;
  current_stock: number;
  qty_sold: number;
}

/**
 * In-stock products that would sell out within `maxDaysOfStock` at the rate
 * of the last `windowDays`. Least cover first.
 */
export function detectLowStockHighDemand(db: Database, options: LowCoverageOptions = {}): LowCoverageItem[] {
  const windowDays = requirePositiveDays('windowDays', options.windowDays ?? 7);
  const maxDaysOfStock = requirePositiveDays('maxDaysOfStock', options.maxDaysOfStock ?? 7);
  const now = options.now ?? Date.now();

  const rows = db.query<RecentSalesRow>(
    `SELECT p.id, p.sku, p.name, p.current_stock, SUM(soi.quantity) AS qty_sold
     FROM product p
     JOIN sale_order_item soi ON soi.product_id = p.id
     JOIN sale_order so ON soi.sale_order_id = so.id
     WHERE p.current_stock > 0 AND so.sale_date >= ? AND so.sale_date <= ? AND so.status = 'PAID'
     GROUP BY p.id`,
    [cutoff(now, windowDays), now],
  );

  const results: LowCoverageItem[] = [];
  for (const row of rows) {
    const dailyDemand = row.qty_sold / windowDays;
    const daysOfStock = row.current_stock / dailyDemand;
    if (daysOfStock >= maxDaysOfStock) continue;
    results.push({
      productId: row.id,
      sku: row.sku,
      name: row.name,
      currentStock: row.current_stock,
      quantitySold: row.qty_sold,
      dailyDemand: round2(dailyDemand),
      daysOfStock: round1(daysOfStock),
    });
  }

  results.sort((a, b) => a.daysOfStock - b.daysOfStock || a.productId - b.productId);
  return results;
}
