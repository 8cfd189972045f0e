/**
 * Classification Analytics - Tool Definitions & Handler
 */

import type { Database } from '../db/index.js';
import { ANALYSIS_PERIODS } from '../types.js';
import { getAbcAnalysis } from './abc.js';
import { calculateProfitability, getProfitabilitySummary } from './profitability.js';
import { analyzePurchaseToSaleTime, getInventoryAgeDistribution } from './turnover.js';
import { getSalesByCategory, getTopSellingProducts } from './sales.js';
import { ABC_METRICS, SALES_METRICS } from './classification-types.js';
import { optionalEnum, optionalInteger, withParameterErrors, type ToolInput } from '../agents/tool-input.js';

// =============================================================================
// TOOL DEFINITIONS
// =============================================================================

const periodProperty = {
  type: 'string' as const,
  enum: ANALYSIS_PERIODS,
  description: 'Period to analyze: week, month, quarter or all (default: month)',
};

export const classificationTools = [
  {
    name: 'abc_analysis',
    description: 'Classify products A/B/C by cumulative share of revenue, profit or units sold',
    input_schema: {
      type: 'object' as const,
      properties: {
        period: periodProperty,
        metric: {
          type: 'string' as const,
          enum: ABC_METRICS,
          description: 'Ranking metric (default: revenue)',
        },
      },
    },
  },
  {
    name: 'profitability_analysis',
    description: 'Gross profit, margin and ROI per product, most profitable first',
    input_schema: {
      type: 'object' as const,
      properties: {
        period: periodProperty,
        min_sales: { type: 'number' as const, description: 'Minimum units sold to include a product (default: 1)' },
      },
    },
  },
  {
    name: 'profitability_summary',
    description: 'Overall revenue, cost, margin and the top and bottom five products by profit',
    input_schema: {
      type: 'object' as const,
      properties: {
        period: periodProperty,
      },
    },
  },
  {
    name: 'purchase_to_sale_time',
    description: 'Days from stock receipt to the first sale after it, per product',
    input_schema: {
      type: 'object' as const,
      properties: {
        days_period: { type: 'number' as const, description: 'Days of purchase orders to analyze (default: 90)' },
        min_purchases: { type: 'number' as const, description: 'Minimum receipts per product (default: 1)' },
      },
    },
  },
  {
    name: 'inventory_age_distribution',
    description: 'Stock value bucketed by days since the last receipt',
    input_schema: {
      type: 'object' as const,
      properties: {},
    },
  },
  {
    name: 'top_selling_products',
    description: 'Best sellers by revenue, units or number of orders, with stock status',
    input_schema: {
      type: 'object' as const,
      properties: {
        period: periodProperty,
        limit: { type: 'number' as const, description: 'Number of products (default: 10)' },
        metric: {
          type: 'string' as const,
          enum: SALES_METRICS,
          description: 'Ranking metric (default: revenue)',
        },
      },
    },
  },
  {
    name: 'sales_by_category',
    description: 'Revenue and units sold per product category',
    input_schema: {
      type: 'object' as const,
      properties: {
        period: periodProperty,
      },
    },
  },
];

// =============================================================================
// TOOL HANDLER
// =============================================================================

export function handleClassificationTool(toolName: string, input: ToolInput, db: Database): unknown {
  switch (toolName) {
    case 'abc_analysis':
      return withParameterErrors(() => ({
        success: true,
        ...getAbcAnalysis(db, {
          period: optionalEnum(input, 'period', ANALYSIS_PERIODS),
          metric: optionalEnum(input, 'metric', ABC_METRICS),
        }),
      }));

    case 'profitability_analysis':
      return withParameterErrors(() => {
        const products = calculateProfitability(db, {
          period: optionalEnum(input, 'period', ANALYSIS_PERIODS),
          minSales: optionalInteger(input, 'min_sales'),
        });
        return { success: true, count: products.length, products };
      });

    case 'profitability_summary':
      return withParameterErrors(() => ({
        success: true,
        ...getProfitabilitySummary(db, { period: optionalEnum(input, 'period', ANALYSIS_PERIODS) }),
      }));

    case 'purchase_to_sale_time':
      return withParameterErrors(() => {
        const products = analyzePurchaseToSaleTime(db, {
          periodDays: optionalInteger(input, 'days_period'),
          minPurchases: optionalInteger(input, 'min_purchases'),
        });
        return { success: true, count: products.length, products };
      });

    case 'inventory_age_distribution':
      return { success: true, ...getInventoryAgeDistribution(db) };

    case 'top_selling_products':
      return withParameterErrors(() => {
        const products = getTopSellingProducts(db, {
          period: optionalEnum(input, 'period', ANALYSIS_PERIODS),
          limit: optionalInteger(input, 'limit'),
          metric: optionalEnum(input, 'metric', SALES_METRICS),
        });
        return { success: true, count: products.length, products };
      });

    case 'sales_by_category':
      return withParameterErrors(() => {
        const categories = getSalesByCategory(db, { period: optionalEnum(input, 'period', ANALYSIS_PERIODS) });
        return { success: true, count: categories.length, categories };
      });

    default:
      return { error: `Unknown classification tool: ${toolName}` };
  }
}
