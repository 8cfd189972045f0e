/**
 * Configuration loading for stock-insight
 *
 * Environment comes from ~/.stock-insight/.env (then CWD .env) and is
 * validated with zod. Analysis defaults can be overridden from
 * ~/.stock-insight/stock-insight.json.
 */

import { readFileSync, existsSync } from 'fs';
import { homedir } from 'os';
import { join, resolve } from 'path';
import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';
import { createLogger } from './logger.js';

const logger = createLogger('config');

dotenvConfig({ path: join(homedir(), '.stock-insight', '.env') });
dotenvConfig(); // CWD fallback (won't override existing vars)

// =============================================================================
// SCHEMAS
// =============================================================================

const envSchema = z.object({
  stateDir: z.string().optional(),
  dbPath: z.string().optional(),
  configPath: z.string().optional(),
  logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  currency: z.string().length(3).default('USD'),
});

const positiveInt = z.coerce.number().int().positive();
const percentage = z.coerce.number().min(0).max(100);

export const analysisDefaultsSchema = z.object({
  ruptureLookbackDays: positiveInt.default(14),
  slowMovingDays: positiveInt.default(30),
  historyDays: positiveInt.default(90),
  forecastDays: positiveInt.default(30),
  minDaysThreshold: positiveInt.default(7),
  minOrderValue: z.coerce.number().min(0).default(100),
  lossTolerancePct: percentage.default(5),
  availabilityPeriodDays: positiveInt.default(90),
  operationalRecentDays: positiveInt.default(14),
  operationalHistoricalDays: positiveInt.default(60),
  operationalDropPct: percentage.default(70),
  supplierPeriodDays: positiveInt.default(90),
});

export type AnalysisDefaults = z.infer<typeof analysisDefaultsSchema>;

const fileConfigSchema = z.object({
  analysis: analysisDefaultsSchema.partial().optional(),
});

export interface Config {
  stateDir: string;
  dbPath: string;
  logLevel: string;
  currency: string;
  analysis: AnalysisDefaults;
}

// =============================================================================
// PATHS
// =============================================================================

function resolveUserPath(input: string): string {
  const trimmed = input.trim();
  if (!trimmed) return trimmed;
  if (trimmed.startsWith('~')) {
    return resolve(trimmed.replace(/^~(?=$|[\\/])/, homedir()));
  }
  return resolve(trimmed);
}

export function resolveStateDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.STOCK_INSIGHT_STATE_DIR?.trim();
  if (override) return resolveUserPath(override);
  return join(homedir(), '.stock-insight');
}

function resolveConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.STOCK_INSIGHT_CONFIG_PATH?.trim();
  if (override) return resolveUserPath(override);
  return join(resolveStateDir(env), 'stock-insight.json');
}

export function resolveDbPath(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.STOCK_INSIGHT_DB_PATH?.trim();
  if (override === ':memory:') return override;
  if (override) return resolveUserPath(override);
  return join(resolveStateDir(env), 'stock-insight.db');
}

// =============================================================================
// MERGING
// =============================================================================

/**
 * Substitute environment variables in config values.
 * Supports ${VAR_NAME} syntax.
 */
function substituteEnvVars(obj: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof obj === 'string') {
    return obj.replace(/\$\{([A-Z_][A-Z0-9_]*)\}/g, (_, varName: string) => env[varName] ?? '');
  }
  if (Array.isArray(obj)) {
    return obj.map((item) => substituteEnvVars(item, env));
  }
  if (obj && typeof obj === 'object') {
    const DANGEROUS_KEYS = new Set(['__proto__', 'constructor', 'prototype']);
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      if (DANGEROUS_KEYS.has(key)) continue;
      result[key] = substituteEnvVars(value, env);
    }
    return result;
  }
  return obj;
}

function readFileConfig(configPath: string, env: NodeJS.ProcessEnv): z.infer<typeof fileConfigSchema> {
  if (!existsSync(configPath)) return {};

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (err) {
    logger.error({ configPath, err }, 'Failed to parse config file');
    return {};
  }

  const parsed = fileConfigSchema.safeParse(substituteEnvVars(raw, env));
  if (!parsed.success) {
    logger.error({ configPath, issues: parsed.error.issues }, 'Invalid config file, using defaults');
    return {};
  }
  return parsed.data;
}

/**
 * Load configuration from environment and the optional JSON file.
 */
export async function loadConfig(
  customPath?: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<Config> {
  const envConfig = envSchema.parse({
    stateDir: env.STOCK_INSIGHT_STATE_DIR,
    dbPath: env.STOCK_INSIGHT_DB_PATH,
    configPath: env.STOCK_INSIGHT_CONFIG_PATH,
    logLevel: env.LOG_LEVEL || undefined,
    currency: env.STOCK_INSIGHT_CURRENCY || undefined,
  });

  const fileConfig = readFileConfig(customPath ?? resolveConfigPath(env), env);

  return {
    stateDir: resolveStateDir(env),
    dbPath: resolveDbPath(env),
    logLevel: envConfig.logLevel,
    currency: envConfig.currency,
    analysis: analysisDefaultsSchema.parse(fileConfig.analysis ?? {}),
  };
}

export function defaultAnalysisSettings(): AnalysisDefaults {
  return analysisDefaultsSchema.parse({});
}
