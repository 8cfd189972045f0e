/**
 * Purchasing - Tool Definitions & Handler
 */

import type { Database } from '../db/index.js';
import { groupSuggestionsBySupplier, suggestPurchaseOrders } from './suggestions.js';
import type { SuggestionOptions } from './suggestions-types.js';
import { round2 } from '../analytics/helpers.js';
import { optionalInteger, optionalNumber, withParameterErrors, type ToolInput } from '../agents/tool-input.js';

// =============================================================================
// TOOL DEFINITIONS
// =============================================================================

const suggestionProperties = {
  days_forecast: { type: 'number' as const, description: 'Days of demand to cover (default: 30)' },
  days_history: { type: 'number' as const, description: 'Days of sales history for the daily rate (default: 90)' },
  min_order_value: { type: 'number' as const, description: 'Drop suggestions worth less than this (default: 100)' },
};

export const purchasingTools = [
  {
    name: 'suggest_purchase_order',
    description: 'Suggest replenishment quantities from forecast demand, stock and pending orders',
    input_schema: {
      type: 'object' as const,
      properties: suggestionProperties,
    },
  },
  {
    name: 'group_suggestions_by_supplier',
    description: 'Consolidate purchase suggestions into one order per most recent supplier',
    input_schema: {
      type: 'object' as const,
      properties: suggestionProperties,
    },
  },
];

// =============================================================================
// TOOL HANDLER
// =============================================================================

function readOptions(input: ToolInput): SuggestionOptions {
  return {
    forecastDays: optionalInteger(input, 'days_forecast'),
    historyDays: optionalInteger(input, 'days_history'),
    minOrderValue: optionalNumber(input, 'min_order_value'),
  };
}

export function handlePurchasingTool(toolName: string, input: ToolInput, db: Database): unknown {
  switch (toolName) {
    case 'suggest_purchase_order':
      return withParameterErrors(() => {
        const suggestions = suggestPurchaseOrders(db, readOptions(input));
        return {
          success: true,
          count: suggestions.length,
          totalValue: round2(suggestions.reduce((sum, s) => sum + s.orderValue, 0)),
          suggestions,
        };
      });

    case 'group_suggestions_by_supplier':
      return withParameterErrors(() => ({
        success: true,
        ...groupSuggestionsBySupplier(db, readOptions(input)),
      }));

    default:
      return { error: `Unknown purchasing tool: ${toolName}` };
  }
}
