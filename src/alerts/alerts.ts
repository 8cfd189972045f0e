/**
 * Stock Alert Aggregator
 *
 * Fans in the detectors into critical alerts, warnings and recommendations,
 * and derives a health score: 100 minus 15 per critical alert and 5 per
 * warning, floored at 0. Detection itself lives in the detectors.
 */

import { createLogger } from '../utils/logger.js';
import type { Database } from '../db/index.js';
import type { RiskLevel } from '../types.js';
import { analyzeSlowMovingStock, detectLowStockHighDemand, detectStockRupture } from '../analytics/stock-health.js';
import { detectImminentStockoutRisk } from '../analytics/stockout-risk.js';
import { detectStockLosses, getExplicitLosses } from '../integrity/losses.js';
import { suggestPurchaseOrders } from '../purchasing/suggestions.js';
import { cutoff, isoString, round2 } from '../analytics/helpers.js';
import { InvalidParameterError, errorMessage } from '../infra/errors.js';
import type { StockoutRisk } from '../analytics/stockout-risk-types.js';
import type {
  Alert,
  AlertDetectors,
  HealthStatus,
  Recommendation,
  StockAlertOptions,
  StockAlerts,
  StockMetrics,
} from './alerts-types.js';

const logger = createLogger('alerts');

export const CRITICAL_PENALTY = 15;
export const WARNING_PENALTY = 5;

/** Detectors bound to the parameters the dashboard reports on. */
export const defaultDetectors: AlertDetectors = {
  stockoutRisks: (db, now) => detectImminentStockoutRisk(db, { forecastDays: 30, minDaysThreshold: 7, now }),
  ruptures: (db, now) => detectStockRupture(db, { lookbackDays: 14, now }),
  slowMoving: (db, now) => analyzeSlowMovingStock(db, { daysThreshold: 60, now }),
  stockLosses: (db) => detectStockLosses(db, { tolerancePct: 5 }),
  lowCoverage: (db, now) => detectLowStockHighDemand(db, { windowDays: 7, maxDaysOfStock: 7, now }),
  explicitLosses: (db, now) => getExplicitLosses(db, { periodDays: 30, now }),
  purchaseSuggestions: (db, now) => suggestPurchaseOrders(db, { forecastDays: 30, now }),
};

// =============================================================================
// SCORING
// =============================================================================

export function healthScore(criticalCount: number, warningCount: number): number {
  return Math.max(0, 100 - criticalCount * CRITICAL_PENALTY - warningCount * WARNING_PENALTY);
}

export function healthStatus(score: number): HealthStatus {
  if (score >= 80) return 'EXCELLENT';
  if (score >= 60) return 'GOOD';
  if (score >= 40) return 'FAIR';
  return 'POOR';
}

// =============================================================================
// METRICS
// =============================================================================

interface InventoryTotalsRow {
  total_products: number;
  products_with_stock: number | null;
  total_stock_value: number | null;
  below_min: number | null;
}

function inventoryTotals(db: Database, now: number) {
  const totals = db.query<InventoryTotalsRow>(
    `SELECT COUNT(*) AS total_products,
            SUM(CASE WHEN current_stock > 0 THEN 1 ELSE 0 END) AS products_with_stock,
            SUM(current_stock * cost_price) AS total_stock_value,
            SUM(CASE WHEN min_stock > 0 AND current_stock < min_stock THEN 1 ELSE 0 END) AS below_min
     FROM product WHERE is_active = 1`,
  )[0];

  const sales = db.query<{ revenue: number | null }>(
    `SELECT SUM(soi.quantity * soi.unit_price) AS revenue
     FROM sale_order_item soi
     JOIN sale_order so ON soi.sale_order_id = so.id
     WHERE so.sale_date >= ? AND so.sale_date <= ? AND so.status = 'PAID'`,
    [cutoff(now, 30), now],
  )[0];

  const totalProducts = totals?.total_products ?? 0;
  const productsWithStock = totals?.products_with_stock ?? 0;
  return {
    totalProducts,
    productsWithStock,
    totalStockValue: round2(totals?.total_stock_value ?? 0),
    productsBelowMinStock: totals?.below_min ?? 0,
    salesLast30Days: round2(sales?.revenue ?? 0),
  };
}

// =============================================================================
// getStockAlerts
// =============================================================================

function currencyFormat(currency: string): Intl.NumberFormat {
  try {
    return new Intl.NumberFormat('en-US', { style: 'currency', currency });
  } catch (err) {
    throw new InvalidParameterError('currency', `not a currency code (${errorMessage(err)})`);
  }
}

function isUrgentRisk(risk: StockoutRisk): risk is StockoutRisk & { riskLevel: Exclude<RiskLevel, 'MEDIUM' | 'LOW'> } {
  return risk.riskLevel === 'CRITICAL' || risk.riskLevel === 'HIGH';
}

export function getStockAlerts(
  db: Database,
  detectors: AlertDetectors = defaultDetectors,
  options: StockAlertOptions = {},
): StockAlerts {
  const now = options.now ?? Date.now();
  const money = currencyFormat(options.currency ?? 'USD');

  const criticalAlerts: Alert[] = [];
  const warnings: Alert[] = [];
  const recommendations: Recommendation[] = [];

  const urgentRisks = detectors.stockoutRisks(db, now).filter(isUrgentRisk).slice(0, 5);
  for (const risk of urgentRisks) {
    criticalAlerts.push({
      type: 'IMMINENT_STOCKOUT',
      severity: risk.riskLevel,
      productId: risk.productId,
      productName: risk.name,
      message: `${risk.name} - Will run out in ${risk.daysUntilStockout.toFixed(1)} days`,
      detail: `Pending orders: ${risk.pendingOrders.isSufficient ? 'Sufficient' : 'Insufficient'}. Gap: ${risk.gapQuantity.toFixed(0)} units`,
      action: risk.recommendation,
    });
  }

  const ruptures = detectors.ruptures(db, now);
  for (const rupture of ruptures.slice(0, 5)) {
    criticalAlerts.push({
      type: 'STOCK_RUPTURE',
      severity: 'CRITICAL',
      productId: rupture.productId,
      productName: rupture.name,
      message: `${rupture.name} - Out of stock with recent demand (${rupture.recentSalesCount} sales)`,
      detail: `Lost revenue: ${money.format(rupture.lostRevenueEstimate)}`,
      action: 'Purchase immediately to avoid further losses',
    });
  }

  for (const loss of detectors.stockLosses(db, now).slice(0, 3)) {
    criticalAlerts.push({
      type: 'STOCK_LOSS',
      severity: loss.severity,
      productId: loss.productId,
      productName: loss.name,
      message: `${loss.name} - Stock discrepancy detected (${loss.discrepancyPercentage.toFixed(1)}%)`,
      detail: `Estimated loss value: ${money.format(loss.estimatedLossValue)}`,
      action: loss.recommendation,
    });
  }

  const slowMoving = detectors.slowMoving(db, now);
  for (const item of slowMoving.filter((s) => s.tier === 'URGENT').slice(0, 3)) {
    warnings.push({
      type: 'SLOW_MOVING',
      severity: 'HIGH',
      productId: item.productId,
      productName: item.name,
      message:
        item.daysWithoutSale === null
          ? `${item.name} - Never sold`
          : `${item.name} - No sales for ${item.daysWithoutSale} days`,
      detail: `Capital tied up: ${money.format(item.stockValue)}`,
      action: 'Apply discount/promotion or return to supplier',
    });
  }

  const alreadyAtRisk = new Set(urgentRisks.map((risk) => risk.productId));
  for (const item of detectors.lowCoverage(db, now)) {
    if (alreadyAtRisk.has(item.productId)) continue;
    warnings.push({
      type: 'LOW_STOCK_HIGH_DEMAND',
      severity: 'MEDIUM',
      productId: item.productId,
      productName: item.name,
      message: `${item.name} - Low stock for high-demand product`,
      detail: `Only ${item.daysOfStock.toFixed(1)} days of stock remaining (current: ${item.currentStock.toFixed(0)} units)`,
      action: 'Replenish stock urgently',
    });
  }

  const explicitLosses = detectors.explicitLosses(db, now);
  if (explicitLosses.length > 0) {
    const lostValue = explicitLosses.reduce((sum, loss) => sum + loss.lossValue, 0);
    warnings.push({
      type: 'RECORDED_LOSSES',
      severity: 'MEDIUM',
      message: `${explicitLosses.length} loss events recorded in last 30 days`,
      detail: `Total value lost: ${money.format(lostValue)}`,
      action: 'Review security and handling procedures',
    });
  }

  const suggestions = detectors.purchaseSuggestions(db, now);
  const highPriority = suggestions.filter((s) => s.priority === 'HIGH');
  if (highPriority.length > 0) {
    const orderValue = highPriority.reduce((sum, s) => sum + s.orderValue, 0);
    recommendations.push({
      type: 'PURCHASE_NEEDED',
      message: `${highPriority.length} products need urgent replenishment`,
      detail: `Total order value: ${money.format(orderValue)}`,
      action: 'Review and create purchase orders',
    });
  }

  const totals = inventoryTotals(db, now);
  const metrics: StockMetrics = {
    totalProducts: totals.totalProducts,
    productsWithStock: totals.productsWithStock,
    productsOutOfStock: totals.totalProducts - totals.productsWithStock,
    totalStockValue: totals.totalStockValue,
    salesLast30Days: totals.salesLast30Days,
    productsBelowMinStock: totals.productsBelowMinStock,
    stockRupturesCount: ruptures.length,
    slowMovingCount: slowMoving.length,
    purchaseRecommendations: suggestions.length,
  };

  const score = healthScore(criticalAlerts.length, warnings.length);
  logger.info(
    { critical: criticalAlerts.length, warnings: warnings.length, healthScore: score },
    'Stock alerts generated',
  );

  return {
    generatedAt: isoString(now),
    healthScore: score,
    healthStatus: healthStatus(score),
    summary: {
      totalProducts: totals.totalProducts,
      productsWithStock: totals.productsWithStock,
      totalStockValue: totals.totalStockValue,
      alertsCount: criticalAlerts.length + warnings.length,
    },
    criticalAlerts,
    warnings,
    recommendations,
    metrics,
  };
}
