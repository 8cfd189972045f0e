/**
 * Stock Alerts - Tool Definitions & Handler
 */

import type { Database } from '../db/index.js';
import { getStockAlerts } from './alerts.js';
import { optionalString, withParameterErrors, type ToolInput } from '../agents/tool-input.js';

// =============================================================================
// TOOL DEFINITIONS
// =============================================================================

export const alertTools = [
  {
    name: 'get_stock_alerts',
    description: 'Inventory health dashboard: critical alerts, warnings, recommendations and a 0-100 health score',
    input_schema: {
      type: 'object' as const,
      properties: {
        currency: { type: 'string' as const, description: 'ISO 4217 code for amounts in alert texts (default: USD)' },
      },
    },
  },
];

// =============================================================================
// TOOL HANDLER
// =============================================================================

export function handleAlertTool(toolName: string, input: ToolInput, db: Database): unknown {
  switch (toolName) {
    case 'get_stock_alerts':
      return withParameterErrors(() => ({
        success: true,
        ...getStockAlerts(db, undefined, { currency: optionalString(input, 'currency') }),
      }));

    default:
      return { error: `Unknown alert tool: ${toolName}` };
  }
}
