#!/usr/bin/env node
/**
 * stock-insight CLI
 *
 * Commands:
 * - stock-insight migrate                 - Apply pending schema migrations
 * - stock-insight alerts                  - Inventory health dashboard
 * - stock-insight risk | rupture | slow-moving | suggest | abc | losses | suppliers
 * - stock-insight tool <name> [json]      - Run any analytics tool by name
 * - stock-insight tools [query]           - List or search tools
 *
 * Results are printed to stdout as JSON; logs go to stderr.
 */

// Silence pino before any logger is created
if (process.argv.includes('--quiet') || process.argv.includes('-q')) {
  process.env.LOG_LEVEL = 'silent';
}

import { Command, InvalidArgumentError, Option } from 'commander';
import { loadConfig, type Config } from '../utils/config.js';
import { logger } from '../utils/logger.js';
import { createDatabase, type Database } from '../db/index.js';
import { createMigrationRunner } from '../db/migrations.js';
import { executeTool } from '../agents/index.js';
import type { ToolInput } from '../agents/tool-input.js';
import { errorMessage } from '../infra/errors.js';
import { ANALYSIS_PERIODS } from '../types.js';
import { ABC_METRICS } from '../analytics/classification-types.js';
import { SUPPLIER_METRICS } from '../suppliers/performance-types.js';

const program = new Command();

program
  .name('stock-insight')
  .description('Inventory analytics over a stock movement ledger')
  .version('0.1.0')
  .option('-q, --quiet', 'Suppress log output');

// ============================================================================
// Helpers
// ============================================================================

function print(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseToolInput(json: string): ToolInput {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (err) {
    throw new InvalidArgumentError(`Tool input is not valid JSON: ${errorMessage(err)}`);
  }
  if (!isRecord(parsed)) {
    throw new InvalidArgumentError('Tool input must be a JSON object');
  }
  return parsed;
}

async function withDatabase<T>(fn: (db: Database, config: Config) => T): Promise<T> {
  const config = await loadConfig();
  const db = await createDatabase({ path: config.dbPath });
  try {
    return fn(db, config);
  } finally {
    db.close();
  }
}

/** Run a tool, print its result, and flag `{ error }` results in the exit code. */
async function runTool(toolName: string, buildInput: (config: Config) => ToolInput): Promise<void> {
  const result = await withDatabase((db, config) => executeTool(toolName, buildInput(config), db));
  print(result);
  if (isRecord(result) && typeof result.error === 'string') {
    process.exitCode = 1;
  }
}

// ============================================================================
// migrate - Apply pending migrations
// ============================================================================
program
  .command('migrate')
  .description('Create or upgrade the ledger schema')
  .action(async () => {
    const config = await loadConfig();
    const db = await createDatabase({ path: config.dbPath, migrate: false });
    try {
      const runner = createMigrationRunner(db);
      const pending = runner.getPendingMigrations();
      runner.migrate();
      print({
        database: config.dbPath,
        applied: pending.map((m) => ({ version: m.version, name: m.name })),
        version: runner.getCurrentVersion(),
      });
    } finally {
      db.close();
    }
  });

// ============================================================================
// alerts - Health dashboard
// ============================================================================
program
  .command('alerts')
  .description('Critical alerts, warnings and recommendations with a 0-100 health score')
  .option('--currency <code>', 'ISO 4217 code for amounts in alert texts')
  .action(async (options: { currency?: string }) => {
    await runTool('get_stock_alerts', (config) => ({ currency: options.currency ?? config.currency }));
  });

// ============================================================================
// Stock detectors
// ============================================================================
program
  .command('risk')
  .description('In-stock products projected to run out soon')
  .option('--forecast-days <n>', 'Days of demand to cover')
  .option('--history-days <n>', 'Days of sales history for the daily rate')
  .option('--min-days <n>', 'Report products with fewer days of cover')
  .action(async (options: { forecastDays?: string; historyDays?: string; minDays?: string }) => {
    await runTool('detect_stockout_risk', (config) => ({
      days_forecast: options.forecastDays ?? config.analysis.forecastDays,
      days_history: options.historyDays ?? config.analysis.historyDays,
      min_days_threshold: options.minDays ?? config.analysis.minDaysThreshold,
    }));
  });

program
  .command('rupture')
  .description('Out-of-stock products that still had recent demand')
  .option('--lookback-days <n>', 'Days of recent sales to consider')
  .action(async (options: { lookbackDays?: string }) => {
    await runTool('detect_stock_rupture', (config) => ({
      days_lookback: options.lookbackDays ?? config.analysis.ruptureLookbackDays,
    }));
  });

program
  .command('slow-moving')
  .description('In-stock products without a recent sale')
  .option('--days <n>', 'Minimum days without a sale')
  .action(async (options: { days?: string }) => {
    await runTool('analyze_slow_moving_stock', (config) => ({
      days_threshold: options.days ?? config.analysis.slowMovingDays,
    }));
  });

// ============================================================================
// suggest - Purchase recommendations
// ============================================================================
program
  .command('suggest')
  .description('Replenishment suggestions, optionally grouped into one order per supplier')
  .option('--forecast-days <n>', 'Days of demand to cover')
  .option('--history-days <n>', 'Days of sales history for the daily rate')
  .option('--min-order-value <amount>', 'Minimum order value per supplier when grouping')
  .option('--by-supplier', 'Group suggestions by most recent supplier')
  .action(
    async (options: { forecastDays?: string; historyDays?: string; minOrderValue?: string; bySupplier?: boolean }) => {
      const toolName = options.bySupplier ? 'group_suggestions_by_supplier' : 'suggest_purchase_order';
      await runTool(toolName, (config) => ({
        days_forecast: options.forecastDays ?? config.analysis.forecastDays,
        days_history: options.historyDays ?? config.analysis.historyDays,
        min_order_value: options.minOrderValue ?? config.analysis.minOrderValue,
      }));
    },
  );

// ============================================================================
// abc - Pareto classification
// ============================================================================
program
  .command('abc')
  .description('Classify products A/B/C by cumulative contribution')
  .addOption(new Option('--period <period>', 'Sales window').choices(ANALYSIS_PERIODS))
  .addOption(new Option('--metric <metric>', 'Ranking metric').choices(ABC_METRICS))
  .action(async (options: { period?: string; metric?: string }) => {
    await runTool('abc_analysis', () => ({ period: options.period, metric: options.metric }));
  });

// ============================================================================
// losses - Ledger reconciliation
// ============================================================================
program
  .command('losses')
  .description('Stock discrepancies against the movement ledger, or recorded losses with --explicit')
  .option('--tolerance <pct>', 'Ignore discrepancies up to this percentage')
  .option('--explicit', 'List recorded LOSS movements instead')
  .option('--days <n>', 'Days to look back for recorded losses', '90')
  .action(async (options: { tolerance?: string; explicit?: boolean; days: string }) => {
    if (options.explicit) {
      await runTool('get_explicit_losses', () => ({ days_period: options.days }));
      return;
    }
    await runTool('detect_stock_losses', (config) => ({
      tolerance_pct: options.tolerance ?? config.analysis.lossTolerancePct,
    }));
  });

// ============================================================================
// suppliers - Supplier scoring
// ============================================================================
program
  .command('suppliers')
  .description('Score active suppliers by how their products sell')
  .addOption(new Option('--metric <metric>', 'Sort key').choices(SUPPLIER_METRICS))
  .option('--days <n>', 'Days to analyze')
  .action(async (options: { metric?: string; days?: string }) => {
    await runTool('analyze_supplier_performance', (config) => ({
      metric: options.metric,
      days_period: options.days ?? config.analysis.supplierPeriodDays,
    }));
  });

// ============================================================================
// tool / tools - Generic access
// ============================================================================
program
  .command('tool')
  .description('Run an analytics tool by name with a JSON object of inputs')
  .argument('<name>', 'Tool name, e.g. detect_stockout_risk')
  .argument('[json]', 'Tool input as a JSON object', parseToolInput, {})
  .action(async (name: string, input: ToolInput) => {
    await runTool(name, () => input);
  });

program
  .command('tools')
  .description('List available tools, or search them by keyword')
  .argument('[query]', 'Keywords to match')
  .option('--category <category>', 'Only tools in this category')
  .action(async (query: string | undefined, options: { category?: string }) => {
    await runTool('tool_search', () => ({ query, category: options.category, limit: 100 }));
  });

program.parseAsync().catch((err: unknown) => {
  logger.error({ err }, 'Command failed');
  console.error(`stock-insight: ${errorMessage(err)}`);
  process.exitCode = 1;
});
