/**
 * Stockout Risk Forecaster
 *
 * Preventive counterpart of the rupture detector: projects when in-stock
 * products reach zero and checks whether pending purchase orders close the
 * gap. Products at or below zero stock never appear here.
 */

import { createLogger } from '../utils/logger.js';
import type { Database } from '../db/index.js';
import { getPendingPurchaseLines, listProducts } from '../ledger/index.js';
import type { RiskLevel } from '../types.js';
import { estimateDailyDemand } from './demand.js';
import {
  daysBetween,
  isoString,
  requirePositiveDays,
  riskRank,
  round1,
  round2,
} from './helpers.js';
import type {
  PendingCoverage,
  PendingOrderSummary,
  PendingOrderSummaryOptions,
  StockoutRisk,
  StockoutRiskOptions,
} from './stockout-risk-types.js';

const logger = createLogger('analytics-stockout-risk');

/** A pending order older than this is considered late. */
export const DELAYED_ORDER_DAYS = 7;

/** Days-to-zero at or below this is critical territory. */
const IMMINENT_DAYS = 3;

// =============================================================================
// PENDING COVERAGE
// =============================================================================

/**
 * Resolve every PENDING purchase line for a product and decide whether it
 * covers `forecastDemand - currentStock`.
 */
export function resolvePendingCoverage(
  db: Database,
  productId: number,
  forecastDemand: number,
  currentStock: number,
  now: number,
): PendingCoverage {
  const lines = getPendingPurchaseLines(db, productId);
  if (lines.length === 0) {
    return {
      count: 0,
      totalQuantity: 0,
      isSufficient: false,
      oldestOrderDays: null,
      isDelayed: false,
      orders: [],
    };
  }

  const totalQuantity = lines.reduce((sum, line) => sum + line.quantity, 0);
  const oldest = Math.min(...lines.map((line) => line.orderDate.getTime()));
  const oldestOrderDays = daysBetween(oldest, now);

  return {
    count: lines.length,
    totalQuantity,
    isSufficient: totalQuantity >= forecastDemand - currentStock,
    oldestOrderDays,
    isDelayed: oldestOrderDays > DELAYED_ORDER_DAYS,
    orders: lines.map((line) => ({
      orderId: line.purchaseOrderId,
      orderNumber: line.orderNumber,
      orderDate: isoString(line.orderDate),
      quantity: line.quantity,
      unitPrice: line.unitPrice,
    })),
  };
}

// =============================================================================
// CLASSIFICATION
// =============================================================================

/** First match wins. */
export function classifyStockoutRisk(daysUntilStockout: number, pending: PendingCoverage): RiskLevel {
  if (daysUntilStockout <= IMMINENT_DAYS && !pending.isSufficient) return 'CRITICAL';
  if (daysUntilStockout <= IMMINENT_DAYS || (pending.isDelayed && !pending.isSufficient)) return 'HIGH';
  if (!pending.isSufficient) return 'MEDIUM';
  return 'LOW';
}

function riskRecommendation(pending: PendingCoverage, gapQuantity: number): string {
  const gap = Math.trunc(gapQuantity);
  if (pending.count === 0) {
    return `URGENT: Create purchase order for at least ${gap} units immediately`;
  }
  if (!pending.isSufficient) {
    return `ORDER MORE: Pending orders insufficient. Need ${gap} additional units`;
  }
  if (pending.isDelayed) {
    return `FOLLOW UP: Pending order is ${pending.oldestOrderDays ?? 0} days old. Contact supplier`;
  }
  return 'MONITOR: Pending orders should cover demand';
}

// =============================================================================
// detectImminentStockoutRisk
// =============================================================================

/**
 * Active in-stock products that run out within `minDaysThreshold` days at
 * their historical rate. Most urgent first.
 */
export function detectImminentStockoutRisk(db: Database, options: StockoutRiskOptions = {}): StockoutRisk[] {
  const forecastDays = requirePositiveDays('forecastDays', options.forecastDays ?? 30);
  const historyDays = requirePositiveDays('historyDays', options.historyDays ?? 90);
  const minDaysThreshold = requirePositiveDays('minDaysThreshold', options.minDaysThreshold ?? 7);
  const now = options.now ?? Date.now();

  const atRisk: Array<{ risk: StockoutRisk; exactDays: number }> = [];
  for (const product of listProducts(db, { activeOnly: true, inStockOnly: true })) {
    const demand = estimateDailyDemand(db, product.id, { historyDays, now });
    if (!demand.forecastable) continue;

    const daysUntilStockout = product.currentStock / demand.avgDailySales;
    if (daysUntilStockout > minDaysThreshold) continue;

    const forecastedDemand = demand.avgDailySales * forecastDays;
    const pending = resolvePendingCoverage(db, product.id, forecastedDemand, product.currentStock, now);
    const gapQuantity = Math.max(0, forecastedDemand - (product.currentStock + pending.totalQuantity));
    const lossDays = Math.max(0, forecastDays - daysUntilStockout);

    const risk: StockoutRisk = {
      productId: product.id,
      sku: product.sku,
      name: product.name,
      category: product.category ?? 'N/A',
      currentStock: round2(product.currentStock),
      avgDailySales: round2(demand.avgDailySales),
      daysUntilStockout: round1(daysUntilStockout),
      forecastedDemand: round2(forecastedDemand),
      pendingOrders: pending,
      gapQuantity: round2(gapQuantity),
      riskLevel: classifyStockoutRisk(daysUntilStockout, pending),
      recommendation: riskRecommendation(pending, gapQuantity),
      potentialLostRevenue: round2(demand.avgDailySales * product.salePrice * lossDays),
      unitSalePrice: product.salePrice,
      unitCost: product.costPrice,
    };
    atRisk.push({ risk, exactDays: daysUntilStockout });
  }

  atRisk.sort(
    (a, b) =>
      riskRank(a.risk.riskLevel) - riskRank(b.risk.riskLevel) ||
      a.exactDays - b.exactDays ||
      a.risk.productId - b.risk.productId,
  );

  logger.debug({ forecastDays, historyDays, minDaysThreshold, count: atRisk.length }, 'Stockout risk scan complete');
  return atRisk.map((entry) => entry.risk);
}

// =============================================================================
// getPendingOrderSummary
// =============================================================================

interface PendingOrderRow {
  id: number;
  order_number: string;
  order_date: number;
  total_amount: number;
  supplier_name: string;
}

interface PendingItemRow {
  product_id: number;
  name: string;
  sku: string;
  quantity: number;
  unit_price: number;
}

/**
 * Every PENDING purchase order with its supplier and items, oldest first.
 * With `productId`, only orders containing that product (and only its lines).
 */
export function getPendingOrderSummary(
  db: Database,
  options: PendingOrderSummaryOptions = {},
): PendingOrderSummary[] {
  const now = options.now ?? Date.now();

  const orders = db.query<PendingOrderRow>(
    `SELECT po.id, po.order_number, po.order_date, po.total_amount, s.name AS supplier_name
     FROM purchase_order po
     JOIN supplier s ON po.supplier_id = s.id
     WHERE po.status = 'PENDING'
     ORDER BY po.order_date, po.id`,
  );

  const results: PendingOrderSummary[] = [];
  for (const po of orders) {
    const items = db.query<PendingItemRow>(
      `SELECT poi.product_id, p.name, p.sku, poi.quantity, poi.unit_price
       FROM purchase_order_item poi
       JOIN product p ON poi.product_id = p.id
       WHERE poi.purchase_order_id = ?
       ORDER BY poi.id`,
      [po.id],
    ).filter((item) => options.productId === undefined || item.product_id === options.productId);
    if (options.productId !== undefined && items.length === 0) continue;

    const daysPending = daysBetween(po.order_date, now);
    results.push({
      purchaseOrderId: po.id,
      orderNumber: po.order_number,
      supplierName: po.supplier_name,
      orderDate: isoString(po.order_date),
      daysPending,
      isDelayed: daysPending > DELAYED_ORDER_DAYS,
      products: items.map((item) => ({
        productId: item.product_id,
        productName: item.name,
        sku: item.sku,
        quantity: item.quantity,
        unitPrice: item.unit_price,
        subtotal: round2(item.quantity * item.unit_price),
      })),
      totalValue: round2(po.total_amount),
    });
  }

  // Stable sort keeps order_date/id order among equal ages
  results.sort((a, b) => b.daysPending - a.daysPending);
  return results;
}
