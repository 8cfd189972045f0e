/**
 * Purchase Recommendation Engine
 *
 * Sizes replenishment orders from forecast demand, stock on hand and pending
 * purchase orders, then consolidates them per supplier.
 */

import { createLogger } from '../utils/logger.js';
import type { Database } from '../db/index.js';
import { getLastSupplierForProduct, listProducts } from '../ledger/index.js';
import type { Priority } from '../types.js';
import { estimateDailyDemand } from '../analytics/demand.js';
import { resolvePendingCoverage } from '../analytics/stockout-risk.js';
import { priorityRank, requirePositiveDays, round2, roundHalfEven, toIso } from '../analytics/helpers.js';
import { InvalidParameterError } from '../infra/errors.js';
import type {
  PurchaseSuggestion,
  SuggestionOptions,
  SupplierGrouping,
  SupplierOrder,
  SupplierOrderLine,
} from './suggestions-types.js';

const logger = createLogger('purchasing');

/** Buffer applied on top of the raw shortfall. */
export const SAFETY_BUFFER = 1.2;

// =============================================================================
// ROUNDING
// =============================================================================

/**
 * Order-friendly quantity: nearest unit below 10, nearest 5 below 100,
 * nearest 10 from there on. Ties go to the even multiple. Never below 1.
 */
export function roundOrderQuantity(raw: number): number {
  let rounded: number;
  if (raw < 10) {
    rounded = roundHalfEven(raw);
  } else if (raw < 100) {
    rounded = roundHalfEven(raw / 5) * 5;
  } else {
    rounded = roundHalfEven(raw / 10) * 10;
  }
  return Math.max(1, rounded);
}

function suggestionPriority(daysUntilStockout: number, isSufficient: boolean): Priority {
  if (isSufficient) return 'LOW';
  if (daysUntilStockout <= 7) return 'HIGH';
  if (daysUntilStockout <= 14) return 'MEDIUM';
  return 'LOW';
}

// =============================================================================
// suggestPurchaseOrders
// =============================================================================

/**
 * One suggestion per active product whose forecast demand exceeds stock on
 * hand and whose buffered order is worth at least `minOrderValue`.
 * Sorted by priority, then order value descending.
 */
export function suggestPurchaseOrders(db: Database, options: SuggestionOptions = {}): PurchaseSuggestion[] {
  const forecastDays = requirePositiveDays('forecastDays', options.forecastDays ?? 30);
  const historyDays = requirePositiveDays('historyDays', options.historyDays ?? 90);
  const minOrderValue = options.minOrderValue ?? 100;
  if (!Number.isFinite(minOrderValue) || minOrderValue < 0) {
    throw new InvalidParameterError('minOrderValue', `must be >= 0 (got ${minOrderValue})`);
  }
  const now = options.now ?? Date.now();

  const suggestions: PurchaseSuggestion[] = [];
  for (const product of listProducts(db, { activeOnly: true })) {
    const demand = estimateDailyDemand(db, product.id, { historyDays, now });
    if (!demand.forecastable) continue;

    const forecastedDemand = demand.avgDailySales * forecastDays;
    const stockNeeded = forecastedDemand - product.currentStock;
    if (stockNeeded <= 0) continue;

    const suggestedQuantity = roundOrderQuantity(stockNeeded * SAFETY_BUFFER);
    const orderValue = suggestedQuantity * product.costPrice;
    if (orderValue < minOrderValue) continue;

    const daysUntilStockout = Math.trunc(product.currentStock / demand.avgDailySales);
    const pending = resolvePendingCoverage(db, product.id, forecastedDemand, product.currentStock, now);

    suggestions.push({
      productId: product.id,
      sku: product.sku,
      name: product.name,
      category: product.category ?? 'N/A',
      currentStock: product.currentStock,
      avgDailySales: round2(demand.avgDailySales),
      forecastedDemand: round2(forecastedDemand),
      stockNeeded: round2(stockNeeded),
      suggestedQuantity,
      unitCost: product.costPrice,
      orderValue: round2(orderValue),
      priority: suggestionPriority(daysUntilStockout, pending.isSufficient),
      lastSaleDate: toIso(demand.lastSaleDate),
      daysUntilStockout,
      pendingOrders: {
        hasPending: pending.count > 0,
        totalQuantity: pending.totalQuantity,
        orderCount: pending.count,
        isSufficient: pending.isSufficient,
      },
    });
  }

  suggestions.sort(
    (a, b) =>
      priorityRank(a.priority) - priorityRank(b.priority) ||
      b.orderValue - a.orderValue ||
      a.productId - b.productId,
  );

  logger.debug({ forecastDays, historyDays, minOrderValue, count: suggestions.length }, 'Purchase suggestions built');
  return suggestions;
}

// =============================================================================
// groupSuggestionsBySupplier
// =============================================================================

function toLine(suggestion: PurchaseSuggestion): SupplierOrderLine {
  return {
    productId: suggestion.productId,
    sku: suggestion.sku,
    name: suggestion.name,
    quantity: suggestion.suggestedQuantity,
    unitCost: suggestion.unitCost,
    orderValue: suggestion.orderValue,
    priority: suggestion.priority,
  };
}

/**
 * Consolidate suggestions into one order per supplier, using the supplier of
 * each product's most recent purchase order. Largest orders first. Products
 * never purchased land in `unassigned` so they stay visible.
 */
export function groupSuggestionsBySupplier(db: Database, options: SuggestionOptions = {}): SupplierGrouping {
  const suggestions = suggestPurchaseOrders(db, options);

  const groups = new Map<number, SupplierOrder>();
  const unassigned: SupplierOrderLine[] = [];

  for (const suggestion of suggestions) {
    const supplier = getLastSupplierForProduct(db, suggestion.productId);
    if (!supplier) {
      unassigned.push(toLine(suggestion));
      continue;
    }

    let group = groups.get(supplier.id);
    if (!group) {
      group = {
        supplierId: supplier.id,
        supplierName: supplier.name,
        productsCount: 0,
        products: [],
        totalOrderValue: 0,
        highPriorityItems: 0,
      };
      groups.set(supplier.id, group);
    }

    group.products.push(toLine(suggestion));
    group.productsCount = group.products.length;
    group.totalOrderValue = round2(group.totalOrderValue + suggestion.orderValue);
    if (suggestion.priority === 'HIGH') group.highPriorityItems += 1;
  }

  const suppliers = [...groups.values()].sort(
    (a, b) => b.totalOrderValue - a.totalOrderValue || a.supplierId - b.supplierId,
  );

  if (unassigned.length > 0) {
    logger.info({ count: unassigned.length }, 'Suggested products without purchase history');
  }

  return {
    suppliers,
    unassigned,
    unassignedValue: round2(unassigned.reduce((sum, line) => sum + line.orderValue, 0)),
  };
}
