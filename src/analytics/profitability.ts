/**
 * Profitability Analysis
 *
 * Gross profit, margin and ROI per product over PAID sales in a period,
 * costed at the product's current cost price.
 */

import { createLogger } from '../utils/logger.js';
import type { Database } from '../db/index.js';
import { aggregatePaidSalesByProduct } from '../ledger/index.js';
import { assertNever } from '../types.js';
import { periodStart, round1, round2, safeDiv } from './helpers.js';
import { InvalidParameterError } from '../infra/errors.js';
import type {
  PeriodOptions,
  ProductProfitability,
  ProfitabilityOptions,
  ProfitabilityRating,
  ProfitabilitySummary,
  ProfitHighlight,
} from './classification-types.js';

const logger = createLogger('analytics-profitability');

export function profitabilityRating(marginPct: number): ProfitabilityRating {
  if (marginPct >= 40) return 'HIGH';
  if (marginPct >= 25) return 'MEDIUM';
  if (marginPct >= 10) return 'LOW';
  return 'POOR';
}

function ratingRecommendation(rating: ProfitabilityRating): string {
  switch (rating) {
    case 'HIGH':
      return 'Excellent margins - maintain pricing and promote heavily';
    case 'MEDIUM':
      return 'Good margins - consider increasing volume through promotions';
    case 'LOW':
      return 'Low margins - review pricing or negotiate better supplier costs';
    case 'POOR':
      return 'Poor/negative margins - urgent review needed: increase price or discontinue';
    default:
      return assertNever(rating);
  }
}

/** Products with at least `minSales` units sold, most gross profit first. */
export function calculateProfitability(db: Database, options: ProfitabilityOptions = {}): ProductProfitability[] {
  const period = options.period ?? 'month';
  const minSales = options.minSales ?? 1;
  if (!Number.isFinite(minSales) || minSales < 0) {
    throw new InvalidParameterError('minSales', `must be >= 0 (got ${minSales})`);
  }
  const now = options.now ?? Date.now();

  const results = aggregatePaidSalesByProduct(db, periodStart(period, now), now)
    .filter((row) => row.totalQuantity >= minSales)
    .map((row): ProductProfitability => {
      const totalCost = row.totalQuantity * row.costPrice;
      const grossProfit = row.totalRevenue - totalCost;
      const marginPct = safeDiv(grossProfit * 100, row.totalRevenue);
      const rating = profitabilityRating(marginPct);

      return {
        productId: row.productId,
        sku: row.sku,
        name: row.name,
        category: row.category ?? 'N/A',
        totalRevenue: round2(row.totalRevenue),
        totalCost: round2(totalCost),
        grossProfit: round2(grossProfit),
        profitMarginPct: round1(marginPct),
        unitsSold: round2(row.totalQuantity),
        avgSalePrice: round2(row.avgUnitPrice),
        avgCostPrice: round2(row.costPrice),
        profitPerUnit: round2(safeDiv(grossProfit, row.totalQuantity)),
        roiPercentage: round1(safeDiv(grossProfit * 100, totalCost)),
        rating,
        recommendation: ratingRecommendation(rating),
      };
    });

  results.sort((a, b) => b.grossProfit - a.grossProfit || a.productId - b.productId);

  logger.debug({ period, minSales, count: results.length }, 'Profitability analysis complete');
  return results;
}

function highlight(item: ProductProfitability): ProfitHighlight {
  return {
    productId: item.productId,
    name: item.name,
    grossProfit: item.grossProfit,
    marginPct: item.profitMarginPct,
  };
}

export function getProfitabilitySummary(db: Database, options: PeriodOptions = {}): ProfitabilitySummary {
  const analysis = calculateProfitability(db, { period: options.period, minSales: 1, now: options.now });

  const totalRevenue = analysis.reduce((sum, item) => sum + item.totalRevenue, 0);
  const totalCost = analysis.reduce((sum, item) => sum + item.totalCost, 0);
  const totalProfit = analysis.reduce((sum, item) => sum + item.grossProfit, 0);
  const profitable = analysis.filter((item) => item.grossProfit > 0).length;

  const worstFirst = [...analysis].sort((a, b) => a.grossProfit - b.grossProfit || a.productId - b.productId);

  return {
    totalRevenue: round2(totalRevenue),
    totalCost: round2(totalCost),
    totalProfit: round2(totalProfit),
    overallMarginPct: round1(safeDiv(totalProfit * 100, totalRevenue)),
    productsAnalyzed: analysis.length,
    profitableProducts: profitable,
    unprofitableProducts: analysis.length - profitable,
    topProfitMakers: analysis.slice(0, 5).map(highlight),
    bottomPerformers: worstFirst.slice(0, 5).map(highlight),
  };
}
