/**
 * Stock Analytics - Tool Definitions & Handler
 *
 * Exports tool definitions and a handler function for demand estimation,
 * rupture and slow-moving detection, availability checks and stockout risk.
 */

import type { Database } from '../db/index.js';
import { getProduct } from '../ledger/index.js';
import { estimateDailyDemand } from './demand.js';
import { analyzeSlowMovingStock, detectStockRupture } from './stock-health.js';
import { detectAvailabilityIssues, detectOperationalAvailabilityIssues } from './availability.js';
import { detectImminentStockoutRisk, getPendingOrderSummary } from './stockout-risk.js';
import { round2, toIso } from './helpers.js';
import {
  optionalBoolean,
  optionalInteger,
  optionalNumber,
  withParameterErrors,
  type ToolInput,
} from '../agents/tool-input.js';

// =============================================================================
// TOOL DEFINITIONS
// =============================================================================

export const stockTools = [
  {
    name: 'estimate_daily_demand',
    description: 'Average daily units sold for a product over a trailing window',
    input_schema: {
      type: 'object' as const,
      properties: {
        product_id: { type: 'number' as const, description: 'Product ID' },
        days_history: { type: 'number' as const, description: 'Trailing window in days (default: 90)' },
        paid_only: { type: 'boolean' as const, description: 'Count only PAID sales (default: true)' },
      },
      required: ['product_id'] as const,
    },
  },
  {
    name: 'detect_stock_rupture',
    description: 'Products out of stock that still had PAID sales recently',
    input_schema: {
      type: 'object' as const,
      properties: {
        days_lookback: { type: 'number' as const, description: 'Days of recent sales to consider (default: 14)' },
      },
    },
  },
  {
    name: 'analyze_slow_moving_stock',
    description: 'Products in stock with no PAID sale for a number of days',
    input_schema: {
      type: 'object' as const,
      properties: {
        days_threshold: { type: 'number' as const, description: 'Minimum days without a sale (default: 30)' },
      },
    },
  },
  {
    name: 'detect_availability_issues',
    description: 'Products that spent part of the period out of stock, with estimated lost sales',
    input_schema: {
      type: 'object' as const,
      properties: {
        days_period: { type: 'number' as const, description: 'Days to analyze (default: 90)' },
      },
    },
  },
  {
    name: 'detect_operational_availability',
    description: 'Recently replenished products whose sales collapsed versus their history',
    input_schema: {
      type: 'object' as const,
      properties: {
        days_recent: { type: 'number' as const, description: 'Recent window in days (default: 14)' },
        days_historical: { type: 'number' as const, description: 'Historical window before it (default: 60)' },
        drop_threshold_pct: { type: 'number' as const, description: 'Minimum sales drop in % (default: 70)' },
      },
    },
  },
  {
    name: 'detect_stockout_risk',
    description: 'In-stock products projected to run out soon, accounting for pending purchase orders',
    input_schema: {
      type: 'object' as const,
      properties: {
        days_forecast: { type: 'number' as const, description: 'Days of demand to cover (default: 30)' },
        days_history: { type: 'number' as const, description: 'Days of sales history for the daily rate (default: 90)' },
        min_days_threshold: { type: 'number' as const, description: 'Report products with fewer days of cover (default: 7)' },
      },
    },
  },
  {
    name: 'get_pending_orders',
    description: 'Pending purchase orders with age and delay status',
    input_schema: {
      type: 'object' as const,
      properties: {
        product_id: { type: 'number' as const, description: 'Only orders containing this product' },
      },
    },
  },
];

// =============================================================================
// TOOL HANDLER
// =============================================================================

export function handleStockTool(toolName: string, input: ToolInput, db: Database): unknown {
  switch (toolName) {
    case 'estimate_daily_demand':
      return withParameterErrors(() => {
        const productId = optionalInteger(input, 'product_id');
        if (productId === undefined) return { error: 'product_id is required' };
        const product = getProduct(db, productId);
        if (!product) return { error: `Product ${productId} not found` };

        const demand = estimateDailyDemand(db, productId, {
          historyDays: optionalInteger(input, 'days_history'),
          paidOnly: optionalBoolean(input, 'paid_only'),
        });
        return {
          success: true,
          sku: product.sku,
          name: product.name,
          ...demand,
          avgDailySales: round2(demand.avgDailySales),
          lastSaleDate: toIso(demand.lastSaleDate),
        };
      });

    case 'detect_stock_rupture':
      return withParameterErrors(() => {
        const ruptures = detectStockRupture(db, { lookbackDays: optionalInteger(input, 'days_lookback') });
        return {
          success: true,
          count: ruptures.length,
          totalLostRevenue: round2(ruptures.reduce((sum, r) => sum + r.lostRevenueEstimate, 0)),
          ruptures,
        };
      });

    case 'analyze_slow_moving_stock':
      return withParameterErrors(() => {
        const items = analyzeSlowMovingStock(db, { daysThreshold: optionalInteger(input, 'days_threshold') });
        return {
          success: true,
          count: items.length,
          totalStockValue: round2(items.reduce((sum, item) => sum + item.stockValue, 0)),
          items,
        };
      });

    case 'detect_availability_issues':
      return withParameterErrors(() => {
        const issues = detectAvailabilityIssues(db, { periodDays: optionalInteger(input, 'days_period') });
        return { success: true, count: issues.length, issues };
      });

    case 'detect_operational_availability':
      return withParameterErrors(() => {
        const issues = detectOperationalAvailabilityIssues(db, {
          recentDays: optionalInteger(input, 'days_recent'),
          historicalDays: optionalInteger(input, 'days_historical'),
          dropThresholdPct: optionalNumber(input, 'drop_threshold_pct'),
        });
        return { success: true, count: issues.length, issues };
      });

    case 'detect_stockout_risk':
      return withParameterErrors(() => {
        const risks = detectImminentStockoutRisk(db, {
          forecastDays: optionalInteger(input, 'days_forecast'),
          historyDays: optionalInteger(input, 'days_history'),
          minDaysThreshold: optionalNumber(input, 'min_days_threshold'),
        });
        return { success: true, count: risks.length, risks };
      });

    case 'get_pending_orders':
      return withParameterErrors(() => {
        const orders = getPendingOrderSummary(db, { productId: optionalInteger(input, 'product_id') });
        return { success: true, count: orders.length, orders };
      });

    default:
      return { error: `Unknown stock tool: ${toolName}` };
  }
}
