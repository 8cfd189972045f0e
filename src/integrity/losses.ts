/**
 * Ledger Integrity & Loss Detection
 *
 * Reconciles each product's cached stock against the signed sum of its
 * movements, and separately lists acknowledged LOSS movements. A recorded
 * loss reconciles cleanly, so it only shows up in the second report.
 */

import { createLogger } from '../utils/logger.js';
import type { Database } from '../db/index.js';
import { listProducts } from '../ledger/index.js';
import { assertNever, type IssueSeverity } from '../types.js';
import {
  cutoff,
  daysBetween,
  isoString,
  requirePercentage,
  requirePositiveDays,
  round2,
  round3,
  severityRank,
  toIso,
} from '../analytics/helpers.js';
import type { ExplicitLoss, ExplicitLossOptions, LossDetectionOptions, StockDiscrepancy } from './losses-types.js';

const logger = createLogger('integrity');

export function discrepancySeverity(discrepancyPct: number): IssueSeverity {
  if (discrepancyPct > 20) return 'CRITICAL';
  if (discrepancyPct > 10) return 'HIGH';
  return 'MEDIUM';
}

function discrepancyRecommendation(severity: IssueSeverity): string {
  switch (severity) {
    case 'CRITICAL':
      return 'URGENT: Perform physical count and investigate immediately';
    case 'HIGH':
      return 'IMPORTANT: Schedule physical count and review security';
    case 'MEDIUM':
      return 'MONITOR: Review and correct inventory records';
    default:
      return assertNever(severity);
  }
}

interface LedgerTotalsRow {
  movement_count: number;
  expected_stock: number | null;
  loss_movements: number | null;
  last_movement: number | null;
}

/**
 * Active products whose cached stock drifted from their ledger by more
 * than `tolerancePct` of the expected stock. Products without movements are
 * skipped. Worst severity first, then largest loss value.
 */
export function detectStockLosses(db: Database, options: LossDetectionOptions = {}): StockDiscrepancy[] {
  const tolerancePct = requirePercentage('tolerancePct', options.tolerancePct ?? 5);

  const results: StockDiscrepancy[] = [];
  for (const product of listProducts(db, { activeOnly: true })) {
    const totals = db.query<LedgerTotalsRow>(
      `SELECT COUNT(*) AS movement_count,
              SUM(quantity) AS expected_stock,
              SUM(CASE WHEN movement_type = 'LOSS' THEN 1 ELSE 0 END) AS loss_movements,
              MAX(movement_date) AS last_movement
       FROM stock_movement WHERE product_id = ?`,
      [product.id],
    )[0];
    if (!totals || totals.movement_count === 0) continue;

    const expected = totals.expected_stock ?? 0;
    const discrepancy = expected - product.currentStock;
    const discrepancyPct = expected === 0 ? 0 : Math.abs((discrepancy / expected) * 100);
    if (discrepancyPct <= tolerancePct) continue;

    const severity = discrepancySeverity(discrepancyPct);
    results.push({
      productId: product.id,
      sku: product.sku,
      name: product.name,
      category: product.category ?? 'N/A',
      currentStock: product.currentStock,
      expectedStock: round3(expected),
      discrepancy: round3(discrepancy),
      discrepancyPercentage: round2(discrepancyPct),
      estimatedLossValue: round2(Math.abs(discrepancy * product.costPrice)),
      lastMovementDate: toIso(totals.last_movement),
      lossMovements: totals.loss_movements ?? 0,
      severity,
      recommendation: discrepancyRecommendation(severity),
    });
  }

  results.sort(
    (a, b) =>
      severityRank(a.severity) - severityRank(b.severity) ||
      b.estimatedLossValue - a.estimatedLossValue ||
      a.productId - b.productId,
  );

  if (results.length > 0) {
    logger.warn({ count: results.length, tolerancePct }, 'Stock discrepancies detected');
  }
  return results;
}

interface LossRow {
  id: number;
  product_id: number;
  quantity: number;
  unit_cost: number | null;
  movement_date: number;
  notes: string | null;
  sku: string;
  name: string;
  category: string | null;
}

/** LOSS movements in the period, most recent first. */
export function getExplicitLosses(db: Database, options: ExplicitLossOptions = {}): ExplicitLoss[] {
  const periodDays = requirePositiveDays('periodDays', options.periodDays ?? 90);
  const now = options.now ?? Date.now();

  const rows = db.query<LossRow>(
    `SELECT sm.id, sm.product_id, sm.quantity, sm.unit_cost, sm.movement_date, sm.notes,
            p.sku, p.name, p.category
     FROM stock_movement sm
     JOIN product p ON sm.product_id = p.id
     WHERE sm.movement_type = 'LOSS' AND sm.movement_date >= ?
     ORDER BY sm.movement_date DESC, sm.id DESC`,
    [cutoff(now, periodDays)],
  );

  return rows.map((row) => {
    const quantityLost = Math.abs(row.quantity);
    return {
      movementId: row.id,
      productId: row.product_id,
      sku: row.sku,
      productName: row.name,
      category: row.category ?? 'N/A',
      quantityLost,
      lossValue: round2(quantityLost * (row.unit_cost ?? 0)),
      lossDate: isoString(row.movement_date),
      notes: row.notes ?? 'No notes',
      daysAgo: daysBetween(row.movement_date, now),
    };
  });
}
