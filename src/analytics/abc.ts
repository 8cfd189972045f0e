/**
 * ABC (Pareto) Classification
 *
 * Products with PAID sales in the period are ranked by a metric and walked
 * in order, accumulating their share of the total:
 * - A while the running share is <= 80%
 * - B while it is <= 95%
 * - C after that
 *
 * The top-ranked product is always A, even when it alone exceeds 80%.
 */

import { createLogger } from '../utils/logger.js';
import type { Database } from '../db/index.js';
import { aggregatePaidSalesByProduct, type ProductSalesRow } from '../ledger/index.js';
import { assertNever } from '../types.js';
import { periodStart, round1, round2, safeDiv } from './helpers.js';
import type {
  AbcAnalysis,
  AbcClass,
  AbcClassSummary,
  AbcItem,
  AbcMetric,
  AbcOptions,
  AbcStrategy,
} from './classification-types.js';

const logger = createLogger('analytics-abc');

export const CLASS_A_LIMIT = 80;
export const CLASS_B_LIMIT = 95;

// Absorbs float drift in the running total
const EPSILON = 1e-9;

export const ABC_STRATEGIES: readonly AbcStrategy[] = [
  {
    abcClass: 'A',
    strategy: 'High Priority Management',
    actions: [
      'Maintain optimal stock levels at all times',
      'Monitor closely and never allow stockouts',
      'Negotiate best prices with suppliers',
      'Consider volume discounts',
      'Fast reorder process',
    ],
  },
  {
    abcClass: 'B',
    strategy: 'Moderate Management',
    actions: [
      'Maintain adequate stock levels',
      'Regular monitoring',
      'Standard reorder procedures',
      'Balance cost vs. availability',
    ],
  },
  {
    abcClass: 'C',
    strategy: 'Minimal Management',
    actions: [
      'Order in larger batches less frequently',
      'Minimal safety stock',
      'Periodic review only',
      'Consider discontinuing poor performers',
    ],
  },
];

function metricValue(row: ProductSalesRow, metric: AbcMetric): number {
  switch (metric) {
    case 'revenue':
      return row.totalRevenue;
    case 'profit':
      return row.totalRevenue - row.totalQuantity * row.costPrice;
    case 'quantity':
      return row.totalQuantity;
    default:
      return assertNever(metric);
  }
}

export function abcClassFor(cumulativePct: number, rank: number): AbcClass {
  if (rank === 0 || cumulativePct <= CLASS_A_LIMIT + EPSILON) return 'A';
  if (cumulativePct <= CLASS_B_LIMIT + EPSILON) return 'B';
  return 'C';
}

function summarizeClass(items: AbcItem[], abcClass: AbcClass, totalProducts: number): AbcClassSummary {
  const members = items.filter((item) => item.abcClass === abcClass);
  return {
    count: members.length,
    percentageOfProducts: round1(safeDiv(members.length * 100, totalProducts)),
    totalValue: round2(members.reduce((sum, item) => sum + item.metricValue, 0)),
    percentageOfTotal: round1(members.reduce((sum, item) => sum + item.percentageOfTotal, 0)),
  };
}

export function getAbcAnalysis(db: Database, options: AbcOptions = {}): AbcAnalysis {
  const period = options.period ?? 'month';
  const metric = options.metric ?? 'revenue';
  const now = options.now ?? Date.now();

  const ranked = aggregatePaidSalesByProduct(db, periodStart(period, now), now)
    .map((row) => ({ row, value: metricValue(row, metric) }))
    .sort((a, b) => b.value - a.value || a.row.productId - b.row.productId);

  if (ranked.length === 0) {
    return { classification: [], summary: null, recommendations: [] };
  }

  const total = ranked.reduce((sum, entry) => sum + entry.value, 0);

  let cumulative = 0;
  const classification = ranked.map(({ row, value }, rank): AbcItem => {
    const share = total > 0 ? (value / total) * 100 : 0;
    cumulative += share;
    return {
      productId: row.productId,
      sku: row.sku,
      name: row.name,
      category: row.category ?? 'N/A',
      metricValue: round2(value),
      totalRevenue: round2(row.totalRevenue),
      totalQuantity: round2(row.totalQuantity),
      percentageOfTotal: round2(share),
      cumulativePercentage: round2(cumulative),
      abcClass: abcClassFor(cumulative, rank),
    };
  });

  const count = classification.length;
  logger.debug({ period, metric, count }, 'ABC classification complete');

  return {
    classification,
    summary: {
      totalProducts: count,
      totalMetricValue: round2(total),
      metricName: metric,
      classA: summarizeClass(classification, 'A', count),
      classB: summarizeClass(classification, 'B', count),
      classC: summarizeClass(classification, 'C', count),
    },
    recommendations: ABC_STRATEGIES.map((strategy) => ({ ...strategy, actions: [...strategy.actions] })),
  };
}
