/**
 * Sales Ranking
 */

import { createLogger } from '../utils/logger.js';
import type { Database } from '../db/index.js';
import { aggregatePaidSalesByProduct, type ProductSalesRow } from '../ledger/index.js';
import { assertNever, type AnalysisPeriod } from '../types.js';
import { periodDays, periodStart, round1, round2, safeDiv } from './helpers.js';
import { InvalidParameterError } from '../infra/errors.js';
import type {
  CategorySales,
  PeriodOptions,
  SalesMetric,
  StockStatus,
  TopSellingOptions,
  TopSellingProduct,
} from './classification-types.js';

const logger = createLogger('analytics-sales');

/** Span assumed for 'all' when turning totals into a daily rate. */
const ALL_TIME_RATE_DAYS = 180;

function salesMetric(row: ProductSalesRow, metric: SalesMetric): number {
  switch (metric) {
    case 'revenue':
      return row.totalRevenue;
    case 'quantity':
      return row.totalQuantity;
    case 'frequency':
      return row.salesCount;
    default:
      return assertNever(metric);
  }
}

function rateDays(period: AnalysisPeriod): number {
  return periodDays(period) ?? ALL_TIME_RATE_DAYS;
}

/** OUT at zero stock, LOW when stock covers less than a week at the period's rate. */
export function stockStatus(currentStock: number, weekDemand: number): StockStatus {
  if (currentStock <= 0) return 'OUT';
  if (currentStock < weekDemand) return 'LOW';
  return 'OK';
}

/**
 * Best sellers by revenue, units or number of orders. Shares are of the
 * returned top list, not of all sales.
 */
export function getTopSellingProducts(db: Database, options: TopSellingOptions = {}): TopSellingProduct[] {
  const period = options.period ?? 'month';
  const metric = options.metric ?? 'revenue';
  const limit = options.limit ?? 10;
  if (!Number.isInteger(limit) || limit < 1) {
    throw new InvalidParameterError('limit', `must be a whole number >= 1 (got ${limit})`);
  }
  const now = options.now ?? Date.now();

  const top = aggregatePaidSalesByProduct(db, periodStart(period, now), now)
    .sort((a, b) => salesMetric(b, metric) - salesMetric(a, metric) || a.productId - b.productId)
    .slice(0, limit);

  const total = top.reduce((sum, row) => sum + salesMetric(row, metric), 0);
  const days = rateDays(period);

  const results = top.map((row, index): TopSellingProduct => {
    const weekDemand = (row.totalQuantity / days) * 7;
    return {
      rank: index + 1,
      productId: row.productId,
      sku: row.sku,
      name: row.name,
      category: row.category ?? 'N/A',
      totalRevenue: round2(row.totalRevenue),
      totalQuantity: round2(row.totalQuantity),
      salesCount: row.salesCount,
      avgSaleValue: round2(safeDiv(row.totalRevenue, row.salesCount)),
      avgQuantityPerSale: round2(row.avgLineQuantity),
      currentStock: row.currentStock,
      stockStatus: stockStatus(row.currentStock, weekDemand),
      percentageOfTotal: round1(safeDiv(salesMetric(row, metric) * 100, total)),
    };
  });

  logger.debug({ period, metric, limit, count: results.length }, 'Top sellers ranked');
  return results;
}

interface CategoryRow {
  category: string | null;
  products_count: number;
  total_revenue: number;
  total_quantity: number;
  sales_count: number;
}

/** PAID sales grouped by product category, highest revenue first. */
export function getSalesByCategory(db: Database, options: PeriodOptions = {}): CategorySales[] {
  const period = options.period ?? 'month';
  const now = options.now ?? Date.now();

  const rows = db.query<CategoryRow>(
    `SELECT p.category,
            COUNT(DISTINCT p.id) AS products_count,
            SUM(soi.quantity * soi.unit_price) AS total_revenue,
            SUM(soi.quantity) AS total_quantity,
            COUNT(DISTINCT so.id) AS sales_count
     FROM product p
     JOIN sale_order_item soi ON soi.product_id = p.id
     JOIN sale_order so ON soi.sale_order_id = so.id
     WHERE so.sale_date >= ? AND so.sale_date <= ? AND so.status = 'PAID'
     GROUP BY p.category
     ORDER BY total_revenue DESC, p.category ASC`,
    [periodStart(period, now), now],
  );

  const totalRevenue = rows.reduce((sum, row) => sum + row.total_revenue, 0);

  return rows.map((row) => ({
    category: row.category ?? 'Uncategorized',
    productsCount: row.products_count,
    totalRevenue: round2(row.total_revenue),
    totalQuantity: round2(row.total_quantity),
    salesCount: row.sales_count,
    avgProductRevenue: round2(safeDiv(row.total_revenue, row.products_count)),
    percentageOfTotal: round1(safeDiv(row.total_revenue * 100, totalRevenue)),
  }));
}
