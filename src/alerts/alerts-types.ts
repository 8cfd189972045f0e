/**
 * Stock Alert Types
 */

import type { Database } from '../db/index.js';
import type { IssueSeverity } from '../types.js';
import type { StockoutRisk } from '../analytics/stockout-risk-types.js';
import type { LowCoverageItem, SlowMovingItem, StockRupture } from '../analytics/stock-health-types.js';
import type { ExplicitLoss, StockDiscrepancy } from '../integrity/losses-types.js';
import type { PurchaseSuggestion } from '../purchasing/suggestions-types.js';

// =============================================================================
// DETECTORS
// =============================================================================

/**
 * The analyzers the aggregator fans in from. Each call receives the shared
 * clock; parameters are fixed by the binding.
 */
export interface AlertDetectors {
  stockoutRisks(db: Database, now: number): StockoutRisk[];
  ruptures(db: Database, now: number): StockRupture[];
  slowMoving(db: Database, now: number): SlowMovingItem[];
  stockLosses(db: Database, now: number): StockDiscrepancy[];
  lowCoverage(db: Database, now: number): LowCoverageItem[];
  explicitLosses(db: Database, now: number): ExplicitLoss[];
  purchaseSuggestions(db: Database, now: number): PurchaseSuggestion[];
}

// =============================================================================
// ALERTS
// =============================================================================

export type AlertType =
  | 'IMMINENT_STOCKOUT'
  | 'STOCK_RUPTURE'
  | 'STOCK_LOSS'
  | 'SLOW_MOVING'
  | 'LOW_STOCK_HIGH_DEMAND'
  | 'RECORDED_LOSSES'
  | 'PURCHASE_NEEDED';

export type HealthStatus = 'EXCELLENT' | 'GOOD' | 'FAIR' | 'POOR';

export interface Alert {
  type: AlertType;
  severity: IssueSeverity;
  /** Absent on alerts that summarize several products */
  productId?: number;
  productName?: string;
  message: string;
  detail: string;
  action: string;
}

export interface Recommendation {
  type: AlertType;
  message: string;
  detail: string;
  action: string;
}

export interface StockMetrics {
  totalProducts: number;
  productsWithStock: number;
  productsOutOfStock: number;
  totalStockValue: number;
  salesLast30Days: number;
  productsBelowMinStock: number;
  stockRupturesCount: number;
  slowMovingCount: number;
  purchaseRecommendations: number;
}

export interface AlertSummary {
  totalProducts: number;
  productsWithStock: number;
  totalStockValue: number;
  alertsCount: number;
}

export interface StockAlerts {
  generatedAt: string;
  healthScore: number;
  healthStatus: HealthStatus;
  summary: AlertSummary;
  criticalAlerts: Alert[];
  warnings: Alert[];
  recommendations: Recommendation[];
  metrics: StockMetrics;
}

export interface StockAlertOptions {
  now?: number;
  /** ISO 4217 code used in alert texts (default: USD) */
  currency?: string;
}
