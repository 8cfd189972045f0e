/**
 * Classification Analytics Types
 *
 * ABC (Pareto) classes, profitability, purchase-to-sale turnover, inventory
 * age and sales ranking.
 */

import type { AnalysisPeriod } from '../types.js';

// =============================================================================
// ABC
// =============================================================================

export const ABC_METRICS = ['revenue', 'profit', 'quantity'] as const;
export type AbcMetric = (typeof ABC_METRICS)[number];

export type AbcClass = 'A' | 'B' | 'C';

export interface AbcItem {
  productId: number;
  sku: string;
  name: string;
  category: string;
  metricValue: number;
  totalRevenue: number;
  totalQuantity: number;
  percentageOfTotal: number;
  cumulativePercentage: number;
  abcClass: AbcClass;
}

export interface AbcClassSummary {
  count: number;
  percentageOfProducts: number;
  totalValue: number;
  percentageOfTotal: number;
}

export interface AbcSummary {
  totalProducts: number;
  totalMetricValue: number;
  metricName: AbcMetric;
  classA: AbcClassSummary;
  classB: AbcClassSummary;
  classC: AbcClassSummary;
}

export interface AbcStrategy {
  abcClass: AbcClass;
  strategy: string;
  actions: string[];
}

export interface AbcAnalysis {
  classification: AbcItem[];
  /** null when nothing sold in the period */
  summary: AbcSummary | null;
  recommendations: AbcStrategy[];
}

export interface AbcOptions {
  period?: AnalysisPeriod;
  metric?: AbcMetric;
  now?: number;
}

// =============================================================================
// PROFITABILITY
// =============================================================================

export type ProfitabilityRating = 'HIGH' | 'MEDIUM' | 'LOW' | 'POOR';

export interface ProductProfitability {
  productId: number;
  sku: string;
  name: string;
  category: string;
  totalRevenue: number;
  totalCost: number;
  grossProfit: number;
  profitMarginPct: number;
  unitsSold: number;
  avgSalePrice: number;
  avgCostPrice: number;
  profitPerUnit: number;
  roiPercentage: number;
  rating: ProfitabilityRating;
  recommendation: string;
}

export interface ProfitabilityOptions {
  period?: AnalysisPeriod;
  /** Minimum units sold for a product to be included */
  minSales?: number;
  now?: number;
}

export interface ProfitHighlight {
  productId: number;
  name: string;
  grossProfit: number;
  marginPct: number;
}

export interface ProfitabilitySummary {
  totalRevenue: number;
  totalCost: number;
  totalProfit: number;
  overallMarginPct: number;
  productsAnalyzed: number;
  profitableProducts: number;
  unprofitableProducts: number;
  topProfitMakers: ProfitHighlight[];
  bottomPerformers: ProfitHighlight[];
}

// =============================================================================
// TURNOVER & AGE
// =============================================================================

export type TurnoverRating = 'FAST' | 'MEDIUM' | 'SLOW';

export interface PurchaseToSaleTime {
  productId: number;
  sku: string;
  name: string;
  category: string;
  purchasesCount: number;
  avgDaysToSale: number;
  minDaysToSale: number;
  maxDaysToSale: number;
  /** Receipts with no PAID sale after them yet */
  stillUnsoldCount: number;
  currentStock: number;
  rating: TurnoverRating;
  recommendation: string;
}

export interface TurnoverOptions {
  periodDays?: number;
  minPurchases?: number;
  now?: number;
}

export interface AgeBracket {
  bracket: string;
  productsCount: number;
  totalValue: number;
  percentage: number;
}

export interface OldestStock {
  productId: number;
  name: string;
  sku: string;
  ageDays: number;
  stock: number;
  value: number;
}

export interface InventoryAgeDistribution {
  ageBrackets: AgeBracket[];
  totalProducts: number;
  totalValue: number;
  avgAgeDays: number;
  oldestProduct: OldestStock | null;
}

// =============================================================================
// SALES
// =============================================================================

export const SALES_METRICS = ['revenue', 'quantity', 'frequency'] as const;
export type SalesMetric = (typeof SALES_METRICS)[number];

export type StockStatus = 'OK' | 'LOW' | 'OUT';

export interface TopSellingProduct {
  rank: number;
  productId: number;
  sku: string;
  name: string;
  category: string;
  totalRevenue: number;
  totalQuantity: number;
  salesCount: number;
  avgSaleValue: number;
  avgQuantityPerSale: number;
  currentStock: number;
  stockStatus: StockStatus;
  percentageOfTotal: number;
}

export interface TopSellingOptions {
  period?: AnalysisPeriod;
  limit?: number;
  metric?: SalesMetric;
  now?: number;
}

export interface CategorySales {
  category: string;
  productsCount: number;
  totalRevenue: number;
  totalQuantity: number;
  salesCount: number;
  avgProductRevenue: number;
  percentageOfTotal: number;
}

export interface PeriodOptions {
  period?: AnalysisPeriod;
  now?: number;
}
