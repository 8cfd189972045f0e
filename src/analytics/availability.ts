/**
 * Availability detectors
 *
 * Two different failure modes:
 * - Recurring stockouts: the running total keeps hitting zero, so customers
 *   find nothing to buy.
 * - Operational collapse: stock is on hand and was recently received, yet
 *   sales fell far below their historical rate (stuck in the back room,
 *   not listed, not on the shelf).
 */

import { createLogger } from '../utils/logger.js';
import type { Database } from '../db/index.js';
import { getProduct, listProducts, sumPaidSales } from '../ledger/index.js';
import type { IssueSeverity } from '../types.js';
import {
  cutoff,
  daysBetween,
  requirePercentage,
  requirePositiveDays,
  round1,
  round2,
  safeDiv,
  severityRank,
  isoString,
} from './helpers.js';
import type {
  AvailabilityIssue,
  AvailabilityOptions,
  OperationalAvailabilityIssue,
  OperationalAvailabilityOptions,
} from './availability-types.js';

const logger = createLogger('analytics-availability');

/** Historical velocity below this is too thin to call a drop. */
const MIN_HISTORICAL_DAILY_SALES = 0.5;

/** A receipt older than this suggests the product is being phased out. */
const MAX_DAYS_SINCE_RECEIPT = 30;

// =============================================================================
// detectAvailabilityIssues
// =============================================================================

function availabilitySeverity(rate: number): { severity: IssueSeverity; recommendation: string } {
  if (rate < 80) {
    return {
      severity: 'CRITICAL',
      recommendation: 'URGENT: Review min/max stock levels and increase safety stock',
    };
  }
  if (rate < 90) {
    return {
      severity: 'HIGH',
      recommendation: 'IMPORTANT: Adjust reorder point and increase order frequency',
    };
  }
  return {
    severity: 'MEDIUM',
    recommendation: 'MONITOR: Minor availability issues, optimize reorder timing',
  };
}

/**
 * Products sold in the period whose stock reached zero during it. Each
 * stockout lasts until the next movement leaving stock above zero, or until
 * now when none exists.
 */
export function detectAvailabilityIssues(db: Database, options: AvailabilityOptions = {}): AvailabilityIssue[] {
  const periodDays = requirePositiveDays('periodDays', options.periodDays ?? 90);
  const now = options.now ?? Date.now();
  const since = cutoff(now, periodDays);

  const productIds = db.query<{ product_id: number }>(
    `SELECT DISTINCT soi.product_id
     FROM sale_order_item soi
     JOIN sale_order so ON soi.sale_order_id = so.id
     WHERE so.sale_date >= ? AND so.sale_date <= ? AND so.status = 'PAID'
     ORDER BY soi.product_id`,
    [since, now],
  );

  const results: AvailabilityIssue[] = [];
  for (const { product_id: productId } of productIds) {
    const product = getProduct(db, productId);
    if (!product) continue;

    const stockouts = db.query<{ id: number; movement_date: number }>(
      `SELECT id, movement_date FROM stock_movement
       WHERE product_id = ? AND stock_after = 0 AND movement_date >= ?
       ORDER BY movement_date, id`,
      [productId, since],
    );
    if (stockouts.length === 0) continue;

    let totalDaysOut = 0;
    for (const stockout of stockouts) {
      const restock = db.query<{ movement_date: number }>(
        `SELECT movement_date FROM stock_movement
         WHERE product_id = ? AND movement_date > ? AND stock_after > 0
         ORDER BY movement_date, id LIMIT 1`,
        [productId, stockout.movement_date],
      )[0];
      const endedAt = restock?.movement_date ?? now;
      totalDaysOut += daysBetween(stockout.movement_date, endedAt);
    }

    const availabilityRate = Math.max(0, safeDiv(periodDays - totalDaysOut, periodDays) * 100);
    const daysAvailable = periodDays - totalDaysOut;
    const { totalSold } = sumPaidSales(db, productId, since, now);
    // Average daily sales while in stock, times the days out
    const lostSales = daysAvailable > 0 ? (totalSold * totalDaysOut) / daysAvailable : 0;
    const { severity, recommendation } = availabilitySeverity(availabilityRate);

    results.push({
      productId,
      sku: product.sku,
      name: product.name,
      category: product.category ?? 'N/A',
      stockoutEvents: stockouts.length,
      totalDaysOut,
      availabilityRate: round1(availabilityRate),
      lostSalesCount: Math.floor(lostSales),
      currentStatus: product.currentStock > 0 ? 'IN_STOCK' : 'OUT_OF_STOCK',
      issueSeverity: severity,
      recommendation,
    });
  }

  results.sort(
    (a, b) =>
      severityRank(a.issueSeverity) - severityRank(b.issueSeverity) ||
      b.lostSalesCount - a.lostSalesCount ||
      a.productId - b.productId,
  );

  logger.debug({ periodDays, count: results.length }, 'Availability scan complete');
  return results;
}

// =============================================================================
// detectOperationalAvailabilityIssues
// =============================================================================

function operationalSeverity(dropPct: number): { severity: IssueSeverity; recommendation: string } {
  if (dropPct >= 90) {
    return {
      severity: 'CRITICAL',
      recommendation:
        'URGENT: Check if product is available on shelves/online. Likely stuck in depot or not restocked.',
    };
  }
  if (dropPct >= 80) {
    return {
      severity: 'HIGH',
      recommendation: 'IMPORTANT: Verify product visibility and accessibility to customers.',
    };
  }
  return {
    severity: 'MEDIUM',
    recommendation: 'MONITOR: Sales significantly below normal. Check merchandising and display.',
  };
}

/**
 * Active in-stock products whose sales over the last `recentDays` dropped by
 * at least `dropThresholdPct` against the `historicalDays` window before it,
 * limited to products received within the last 30 days.
 */
export function detectOperationalAvailabilityIssues(
  db: Database,
  options: OperationalAvailabilityOptions = {},
): OperationalAvailabilityIssue[] {
  const recentDays = requirePositiveDays('recentDays', options.recentDays ?? 14);
  const historicalDays = requirePositiveDays('historicalDays', options.historicalDays ?? 60);
  const dropThresholdPct = requirePercentage('dropThresholdPct', options.dropThresholdPct ?? 70);
  const now = options.now ?? Date.now();

  const recentStart = cutoff(now, recentDays);
  const historicalStart = cutoff(recentStart, historicalDays);

  const results: OperationalAvailabilityIssue[] = [];
  for (const product of listProducts(db, { activeOnly: true, inStockOnly: true })) {
    // Ends one millisecond before the recent window opens
    const historical = sumPaidSales(db, product.id, historicalStart, recentStart - 1);
    const historicalDaily = historical.totalSold / historicalDays;
    if (historicalDaily < MIN_HISTORICAL_DAILY_SALES) continue;

    const recent = sumPaidSales(db, product.id, recentStart, now);
    const recentDaily = recent.totalSold / recentDays;
    const dropPct = ((historicalDaily - recentDaily) / historicalDaily) * 100;
    if (dropPct < dropThresholdPct) continue;

    const receipt = db.query<{ received_date: number | null }>(
      `SELECT MAX(po.received_date) AS received_date
       FROM purchase_order po
       JOIN stock_movement sm ON sm.reference_id = po.id AND sm.movement_type = 'PURCHASE'
       WHERE sm.product_id = ? AND po.status = 'RECEIVED'`,
      [product.id],
    )[0];
    const receivedAt = receipt?.received_date ?? null;
    if (receivedAt === null) continue;

    const daysSinceReceived = daysBetween(receivedAt, now);
    if (daysSinceReceived > MAX_DAYS_SINCE_RECEIPT) continue;

    const expected = historicalDaily * recentDays;
    const lostSales = expected - recent.totalSold;
    const { severity, recommendation } = operationalSeverity(dropPct);

    results.push({
      productId: product.id,
      sku: product.sku,
      name: product.name,
      category: product.category ?? 'N/A',
      currentStock: product.currentStock,
      historicalDailySales: round2(historicalDaily),
      recentDailySales: round2(recentDaily),
      salesDropPercentage: round1(dropPct),
      expectedSalesRecent: round1(expected),
      actualSalesRecent: round1(recent.totalSold),
      lostSales: round1(lostSales),
      lastReceivedDate: isoString(receivedAt),
      daysSinceReceived,
      potentialLostRevenue: round2(lostSales * product.salePrice),
      issueSeverity: severity,
      recommendation,
    });
  }

  results.sort(
    (a, b) =>
      severityRank(a.issueSeverity) - severityRank(b.issueSeverity) ||
      b.potentialLostRevenue - a.potentialLostRevenue ||
      a.productId - b.productId,
  );

  logger.debug(
    { recentDays, historicalDays, dropThresholdPct, count: results.length },
    'Operational availability scan complete',
  );
  return results;
}
