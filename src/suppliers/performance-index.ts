/**
 * Supplier Performance - Tool Definitions & Handler
 */

import type { Database } from '../db/index.js';
import { analyzeSupplierPerformance } from './performance.js';
import { SUPPLIER_METRICS } from './performance-types.js';
import { optionalEnum, optionalInteger, withParameterErrors, type ToolInput } from '../agents/tool-input.js';

// =============================================================================
// TOOL DEFINITIONS
// =============================================================================

export const supplierTools = [
  {
    name: 'analyze_supplier_performance',
    description: 'Score active suppliers on turnover, revenue and slow-moving stock of the products bought from them',
    input_schema: {
      type: 'object' as const,
      properties: {
        metric: {
          type: 'string' as const,
          enum: SUPPLIER_METRICS,
          description: 'Sort key: turnover_rate, revenue, slow_moving or score (default: score)',
        },
        days_period: { type: 'number' as const, description: 'Days to analyze (default: 90)' },
      },
    },
  },
];

// =============================================================================
// TOOL HANDLER
// =============================================================================

export function handleSupplierTool(toolName: string, input: ToolInput, db: Database): unknown {
  switch (toolName) {
    case 'analyze_supplier_performance':
      return withParameterErrors(() => {
        const suppliers = analyzeSupplierPerformance(db, {
          metric: optionalEnum(input, 'metric', SUPPLIER_METRICS),
          periodDays: optionalInteger(input, 'days_period'),
        });
        return { success: true, count: suppliers.length, suppliers };
      });

    default:
      return { error: `Unknown supplier tool: ${toolName}` };
  }
}
