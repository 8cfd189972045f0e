/**
 * Demand Estimator
 *
 * Flat historical mean of units sold per day over a trailing window. No
 * smoothing, seasonality or outlier rejection: every forecast downstream
 * builds on this one number.
 */

import type { Database } from '../db/index.js';
import { sumPaidSales } from '../ledger/index.js';
import { cutoff, requirePositiveDays, safeDiv } from './helpers.js';

export interface DemandOptions {
  /** Trailing window in days (default: 90) */
  historyDays?: number;
  /** Count only PAID sales (default: true); off also counts PENDING ones */
  paidOnly?: boolean;
  now?: number;
}

export interface DemandEstimate {
  productId: number;
  historyDays: number;
  totalSold: number;
  avgDailySales: number;
  salesCount: number;
  lastSaleDate: Date | null;
  /** False when there were no sales: such products carry no forecastable risk */
  forecastable: boolean;
}

export function estimateDailyDemand(
  db: Database,
  productId: number,
  options: DemandOptions = {},
): DemandEstimate {
  const historyDays = requirePositiveDays('historyDays', options.historyDays ?? 90);
  const now = options.now ?? Date.now();

  const totals = sumPaidSales(db, productId, cutoff(now, historyDays), now, options.paidOnly ?? true);
  const avgDailySales = safeDiv(totals.totalSold, historyDays);

  return {
    productId,
    historyDays,
    totalSold: totals.totalSold,
    avgDailySales,
    salesCount: totals.salesCount,
    lastSaleDate: totals.lastSaleDate,
    forecastable: avgDailySales > 0,
  };
}
