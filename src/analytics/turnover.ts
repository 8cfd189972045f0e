/**
 * Turnover & Inventory Age
 *
 * - Purchase-to-sale time: days from each RECEIVED purchase to the first
 *   PAID sale of that product on or after the receipt.
 * - Age distribution: in-stock products bucketed by days since their last
 *   stock receipt, weighted by stock value.
 */

import { createLogger } from '../utils/logger.js';
import type { Database } from '../db/index.js';
import { getLastPurchaseDate, getProduct, listProducts } from '../ledger/index.js';
import { assertNever } from '../types.js';
import { cutoff, daysBetween, requirePositiveDays, round1, round2, safeDiv } from './helpers.js';
import { InvalidParameterError } from '../infra/errors.js';
import type {
  AgeBracket,
  InventoryAgeDistribution,
  OldestStock,
  PurchaseToSaleTime,
  TurnoverOptions,
  TurnoverRating,
} from './classification-types.js';

const logger = createLogger('analytics-turnover');

// =============================================================================
// analyzePurchaseToSaleTime
// =============================================================================

export function turnoverRating(avgDaysToSale: number): TurnoverRating {
  if (avgDaysToSale <= 7) return 'FAST';
  if (avgDaysToSale <= 21) return 'MEDIUM';
  return 'SLOW';
}

function turnoverRecommendation(rating: TurnoverRating): string {
  switch (rating) {
    case 'FAST':
      return 'Excellent turnover - maintain current inventory levels';
    case 'MEDIUM':
      return 'Good turnover - monitor for optimization opportunities';
    case 'SLOW':
      return 'Slow turnover - consider reducing order quantities or frequency';
    default:
      return assertNever(rating);
  }
}

interface ReceiptRow {
  product_id: number;
  received_date: number;
}

/**
 * Per product with RECEIVED purchases ordered in the period: min/avg/max
 * days to the next PAID sale. Products whose receipts never sold are left
 * out. Slowest first.
 */
export function analyzePurchaseToSaleTime(db: Database, options: TurnoverOptions = {}): PurchaseToSaleTime[] {
  const periodDays = requirePositiveDays('periodDays', options.periodDays ?? 90);
  const minPurchases = options.minPurchases ?? 1;
  if (!Number.isInteger(minPurchases) || minPurchases < 1) {
    throw new InvalidParameterError('minPurchases', `must be a whole number >= 1 (got ${minPurchases})`);
  }
  const now = options.now ?? Date.now();

  const receipts = db.query<ReceiptRow>(
    `SELECT poi.product_id, po.received_date
     FROM purchase_order po
     JOIN purchase_order_item poi ON poi.purchase_order_id = po.id
     WHERE po.status = 'RECEIVED'
       AND po.received_date IS NOT NULL
       AND po.order_date >= ?
     ORDER BY poi.product_id, po.received_date, po.id`,
    [cutoff(now, periodDays)],
  );

  const byProduct = new Map<number, number[]>();
  for (const receipt of receipts) {
    const dates = byProduct.get(receipt.product_id) ?? [];
    dates.push(receipt.received_date);
    byProduct.set(receipt.product_id, dates);
  }

  const results: PurchaseToSaleTime[] = [];
  for (const [productId, receivedDates] of byProduct) {
    if (receivedDates.length < minPurchases) continue;
    const product = getProduct(db, productId);
    if (!product) continue;

    const gaps: number[] = [];
    let unsold = 0;
    for (const receivedAt of receivedDates) {
      const firstSale = db.query<{ first: number | null }>(
        `SELECT MIN(so.sale_date) AS first
         FROM sale_order so
         JOIN sale_order_item soi ON soi.sale_order_id = so.id
         WHERE soi.product_id = ? AND so.status = 'PAID' AND so.sale_date >= ?`,
        [productId, receivedAt],
      )[0]?.first ?? null;

      if (firstSale === null) {
        unsold += 1;
      } else {
        gaps.push(daysBetween(receivedAt, firstSale));
      }
    }
    if (gaps.length === 0) continue;

    const avg = gaps.reduce((sum, gap) => sum + gap, 0) / gaps.length;
    const rating = turnoverRating(avg);
    results.push({
      productId,
      sku: product.sku,
      name: product.name,
      category: product.category ?? 'N/A',
      purchasesCount: receivedDates.length,
      avgDaysToSale: round1(avg),
      minDaysToSale: Math.min(...gaps),
      maxDaysToSale: Math.max(...gaps),
      stillUnsoldCount: unsold,
      currentStock: product.currentStock,
      rating,
      recommendation: turnoverRecommendation(rating),
    });
  }

  results.sort((a, b) => b.avgDaysToSale - a.avgDaysToSale || a.productId - b.productId);

  logger.debug({ periodDays, minPurchases, count: results.length }, 'Purchase-to-sale analysis complete');
  return results;
}

// =============================================================================
// getInventoryAgeDistribution
// =============================================================================

export const AGE_BRACKETS = [
  { name: '0-7 days', min: 0, max: 7 },
  { name: '8-14 days', min: 8, max: 14 },
  { name: '15-30 days', min: 15, max: 30 },
  { name: '31-60 days', min: 31, max: 60 },
  { name: '60+ days', min: 61, max: Number.POSITIVE_INFINITY },
] as const;

/**
 * In-stock products that were ever received, bucketed by whole days since
 * their latest PURCHASE movement.
 */
export function getInventoryAgeDistribution(db: Database, options: { now?: number } = {}): InventoryAgeDistribution {
  const now = options.now ?? Date.now();

  const aged: Array<{ ageDays: number; stockValue: number }> = [];
  let oldest: OldestStock | null = null;

  for (const product of listProducts(db, { inStockOnly: true })) {
    const lastReceipt = getLastPurchaseDate(db, product.id);
    if (lastReceipt === null) continue;

    const ageDays = Math.max(0, daysBetween(lastReceipt.getTime(), now));
    const stockValue = product.currentStock * product.costPrice;
    aged.push({ ageDays, stockValue });

    if (oldest === null || ageDays > oldest.ageDays) {
      oldest = {
        productId: product.id,
        name: product.name,
        sku: product.sku,
        ageDays,
        stock: product.currentStock,
        value: round2(stockValue),
      };
    }
  }

  const totalValue = aged.reduce((sum, item) => sum + item.stockValue, 0);

  const ageBrackets = AGE_BRACKETS.map((bracket): AgeBracket => {
    const members = aged.filter((item) => item.ageDays >= bracket.min && item.ageDays <= bracket.max);
    const value = members.reduce((sum, item) => sum + item.stockValue, 0);
    return {
      bracket: bracket.name,
      productsCount: members.length,
      totalValue: round2(value),
      percentage: round1(safeDiv(value * 100, totalValue)),
    };
  });

  return {
    ageBrackets,
    totalProducts: aged.length,
    totalValue: round2(totalValue),
    avgAgeDays: round1(safeDiv(aged.reduce((sum, item) => sum + item.ageDays, 0), aged.length)),
    oldestProduct: oldest,
  };
}
