import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { Database } from '../db/index';
import { getStockAlerts, healthScore, healthStatus } from './alerts';
import { handleAlertTool } from './alerts-index';
import type { AlertDetectors } from './alerts-types';
import type { StockoutRisk } from '../analytics/stockout-risk-types';
import type { LowCoverageItem, StockRupture } from '../analytics/stock-health-types';
import type { StockDiscrepancy } from '../integrity/losses-types';
import type { RiskLevel } from '../types';
import { recordLoss } from '../ledger/writer';
import { InvalidParameterError } from '../infra/errors';
import { NOW, addProduct, daysAgo, openTestDb, sell } from '../testing/fixtures';

// =============================================================================
// Fakes
// =============================================================================

const quiet: AlertDetectors = {
  stockoutRisks: () => [],
  ruptures: () => [],
  slowMoving: () => [],
  stockLosses: () => [],
  lowCoverage: () => [],
  explicitLosses: () => [],
  purchaseSuggestions: () => [],
};

function risk(productId: number, riskLevel: RiskLevel): StockoutRisk {
  return {
    productId,
    sku: `SKU-${productId}`,
    name: `Product ${productId}`,
    category: 'N/A',
    currentStock: 4,
    avgDailySales: 1,
    daysUntilStockout: 4,
    forecastedDemand: 30,
    pendingOrders: {
      count: 0,
      totalQuantity: 0,
      isSufficient: false,
      oldestOrderDays: null,
      isDelayed: false,
      orders: [],
    },
    gapQuantity: 26,
    riskLevel,
    recommendation: 'URGENT: Create purchase order immediately',
    potentialLostRevenue: 260,
    unitSalePrice: 10,
    unitCost: 6,
  };
}

function rupture(productId: number): StockRupture {
  return {
    productId,
    sku: `SKU-${productId}`,
    name: `Product ${productId}`,
    category: 'N/A',
    currentStock: 0,
    recentSalesCount: 3,
    lastSaleDate: null,
    totalQuantitySold: 6,
    estimatedDailyDemand: 0.43,
    daysOutOfStock: 2,
    lostRevenueEstimate: 8.57,
  };
}

function lowCover(productId: number): LowCoverageItem {
  return {
    productId,
    sku: `SKU-${productId}`,
    name: `Product ${productId}`,
    currentStock: 3,
    quantitySold: 7,
    dailyDemand: 1,
    daysOfStock: 3,
  };
}

function discrepancy(productId: number): StockDiscrepancy {
  return {
    productId,
    sku: `SKU-${productId}`,
    name: `Product ${productId}`,
    category: 'N/A',
    currentStock: 5,
    expectedStock: 10,
    discrepancy: 5,
    discrepancyPercentage: 50,
    estimatedLossValue: 30,
    lastMovementDate: null,
    lossMovements: 0,
    severity: 'CRITICAL',
    recommendation: 'URGENT: Perform physical count and investigate immediately',
  };
}

// =============================================================================
// Scoring
// =============================================================================

describe('health score', () => {
  it('deducts 15 per critical and 5 per warning, floored at zero', () => {
    expect(healthScore(0, 0)).toBe(100);
    expect(healthScore(2, 3)).toBe(55);
    expect(healthScore(7, 0)).toBe(0);
  });

  it('bands status at 80, 60 and 40', () => {
    expect(healthStatus(80)).toBe('EXCELLENT');
    expect(healthStatus(79)).toBe('GOOD');
    expect(healthStatus(60)).toBe('GOOD');
    expect(healthStatus(40)).toBe('FAIR');
    expect(healthStatus(39)).toBe('POOR');
  });
});

// =============================================================================
// getStockAlerts
// =============================================================================

describe('getStockAlerts', () => {
  let db: Database;

  beforeEach(async () => {
    db = await openTestDb();
  });

  afterEach(() => {
    db.close();
  });

  it('always returns every bucket, even on an empty ledger', () => {
    const alerts = getStockAlerts(db, undefined, { now: NOW });

    expect(alerts.generatedAt).toBe(new Date(NOW).toISOString());
    expect(alerts.healthScore).toBe(100);
    expect(alerts.healthStatus).toBe('EXCELLENT');
    expect(alerts.summary).toEqual({ totalProducts: 0, productsWithStock: 0, totalStockValue: 0, alertsCount: 0 });
    expect(alerts.criticalAlerts).toEqual([]);
    expect(alerts.warnings).toEqual([]);
    expect(alerts.recommendations).toEqual([]);
  });

  it('keeps only CRITICAL and HIGH risks and skips low cover already reported', () => {
    const detectors: AlertDetectors = {
      ...quiet,
      stockoutRisks: () => [risk(1, 'CRITICAL'), risk(2, 'HIGH'), risk(3, 'MEDIUM'), risk(4, 'LOW')],
      ruptures: () => [rupture(5)],
      lowCoverage: () => [lowCover(1), lowCover(6)],
    };

    const alerts = getStockAlerts(db, detectors, { now: NOW });

    expect(alerts.criticalAlerts.map((a) => [a.type, a.severity, a.productId])).toEqual([
      ['IMMINENT_STOCKOUT', 'CRITICAL', 1],
      ['IMMINENT_STOCKOUT', 'HIGH', 2],
      ['STOCK_RUPTURE', 'CRITICAL', 5],
    ]);
    expect(alerts.criticalAlerts[0]).toMatchObject({
      message: 'Product 1 - Will run out in 4.0 days',
      detail: 'Pending orders: Insufficient. Gap: 26 units',
    });
    expect(alerts.criticalAlerts[2]?.detail).toBe('Lost revenue: $8.57');
    expect(alerts.warnings).toEqual([
      {
        type: 'LOW_STOCK_HIGH_DEMAND',
        severity: 'MEDIUM',
        productId: 6,
        productName: 'Product 6',
        message: 'Product 6 - Low stock for high-demand product',
        detail: 'Only 3.0 days of stock remaining (current: 3 units)',
        action: 'Replenish stock urgently',
      },
    ]);
    expect(alerts.healthScore).toBe(50);
    expect(alerts.healthStatus).toBe('FAIR');
    expect(alerts.summary.alertsCount).toBe(4);
  });

  it('caps each detector and floors the score', () => {
    const ids = [1, 2, 3, 4, 5, 6, 7];
    const detectors: AlertDetectors = {
      ...quiet,
      ruptures: () => ids.map(rupture),
      stockLosses: () => ids.map(discrepancy),
    };

    const alerts = getStockAlerts(db, detectors, { now: NOW });

    expect(alerts.criticalAlerts.filter((a) => a.type === 'STOCK_RUPTURE')).toHaveLength(5);
    expect(alerts.criticalAlerts.filter((a) => a.type === 'STOCK_LOSS')).toHaveLength(3);
    expect(alerts.metrics.stockRupturesCount).toBe(7);
    expect(alerts.healthScore).toBe(0);
    expect(alerts.healthStatus).toBe('POOR');
  });

  it('formats amounts in the requested currency', () => {
    const alerts = getStockAlerts(db, { ...quiet, ruptures: () => [rupture(1)] }, { now: NOW, currency: 'EUR' });
    expect(alerts.criticalAlerts[0]?.detail).toBe('Lost revenue: €8.57');
  });

  it('rejects a malformed currency code', () => {
    expect(() => getStockAlerts(db, quiet, { now: NOW, currency: 'euros' })).toThrow(InvalidParameterError);
  });

  it('aggregates the real detectors over a ledger', () => {
    const beans = addProduct(db, { name: 'Espresso beans', initialStock: 10, minStock: 5 });
    for (const days of [9, 7, 5, 3, 1]) sell(db, beans.id, 2, daysAgo(days));
    const mugs = addProduct(db, { name: 'Mugs', initialStock: 50 });
    recordLoss(db, mugs.id, 2, { at: daysAgo(3) });

    const alerts = getStockAlerts(db, undefined, { now: NOW });

    expect(alerts.criticalAlerts).toEqual([
      {
        type: 'STOCK_RUPTURE',
        severity: 'CRITICAL',
        productId: beans.id,
        productName: 'Espresso beans',
        message: 'Espresso beans - Out of stock with recent demand (5 sales)',
        detail: 'Lost revenue: $7.14',
        action: 'Purchase immediately to avoid further losses',
      },
    ]);
    expect(alerts.warnings.map((w) => [w.type, w.message, w.detail])).toEqual([
      ['SLOW_MOVING', 'Mugs - Never sold', 'Capital tied up: $288.00'],
      ['RECORDED_LOSSES', '1 loss events recorded in last 30 days', 'Total value lost: $12.00'],
    ]);
    expect(alerts.recommendations).toEqual([]);
    expect(alerts.metrics).toEqual({
      totalProducts: 2,
      productsWithStock: 1,
      productsOutOfStock: 1,
      totalStockValue: 288,
      salesLast30Days: 100,
      productsBelowMinStock: 1,
      stockRupturesCount: 1,
      slowMovingCount: 1,
      purchaseRecommendations: 0,
    });
    expect(alerts.healthScore).toBe(75);
    expect(alerts.healthStatus).toBe('GOOD');
  });

  it('is exposed as a tool', () => {
    expect(handleAlertTool('get_stock_alerts', {}, db)).toMatchObject({ success: true, healthScore: 100 });
    expect(handleAlertTool('get_stock_alerts', { currency: 'x' }, db)).toEqual({
      error: expect.stringContaining('currency: not a currency code'),
    });
  });
});
