/**
 * Loss Detection - Tool Definitions & Handler
 */

import type { Database } from '../db/index.js';
import { detectStockLosses, getExplicitLosses } from './losses.js';
import { round2 } from '../analytics/helpers.js';
import { optionalInteger, optionalNumber, withParameterErrors, type ToolInput } from '../agents/tool-input.js';

// =============================================================================
// TOOL DEFINITIONS
// =============================================================================

export const lossTools = [
  {
    name: 'detect_stock_losses',
    description: 'Reconcile stock on hand against the movement ledger and report discrepancies',
    input_schema: {
      type: 'object' as const,
      properties: {
        tolerance_pct: { type: 'number' as const, description: 'Ignore discrepancies up to this percentage (default: 5)' },
      },
    },
  },
  {
    name: 'get_explicit_losses',
    description: 'Recorded LOSS movements (breakage, theft, expiry) in a period',
    input_schema: {
      type: 'object' as const,
      properties: {
        days_period: { type: 'number' as const, description: 'Days to look back (default: 90)' },
      },
    },
  },
];

// =============================================================================
// TOOL HANDLER
// =============================================================================

export function handleLossTool(toolName: string, input: ToolInput, db: Database): unknown {
  switch (toolName) {
    case 'detect_stock_losses':
      return withParameterErrors(() => {
        const discrepancies = detectStockLosses(db, { tolerancePct: optionalNumber(input, 'tolerance_pct') });
        return {
          success: true,
          count: discrepancies.length,
          totalLossValue: round2(discrepancies.reduce((sum, d) => sum + d.estimatedLossValue, 0)),
          discrepancies,
        };
      });

    case 'get_explicit_losses':
      return withParameterErrors(() => {
        const losses = getExplicitLosses(db, { periodDays: optionalInteger(input, 'days_period') });
        return {
          success: true,
          count: losses.length,
          totalLossValue: round2(losses.reduce((sum, loss) => sum + loss.lossValue, 0)),
          losses,
        };
      });

    default:
      return { error: `Unknown loss tool: ${toolName}` };
  }
}
