/**
 * Shared numeric and date helpers for the analyzers.
 */

import { InvalidParameterError } from '../infra/errors.js';
import {
  assertNever,
  type AnalysisPeriod,
  type IssueSeverity,
  type Priority,
  type RiskLevel,
} from '../types.js';

export const MS_PER_DAY = 24 * 60 * 60 * 1000;

export function round1(n: number): number {
  return Math.round(n * 10) / 10;
}

export function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

export function round3(n: number): number {
  return Math.round(n * 1000) / 1000;
}

/** Nearest integer, exact halves going to the even neighbour. */
export function roundHalfEven(n: number): number {
  const floor = Math.floor(n);
  const fraction = n - floor;
  if (fraction > 0.5) return floor + 1;
  if (fraction < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}

export function safeDiv(numerator: number, denominator: number, fallback = 0): number {
  if (!Number.isFinite(denominator) || denominator === 0) return fallback;
  const result = numerator / denominator;
  return Number.isFinite(result) ? result : fallback;
}

/** Whole days between two instants, truncated toward zero. */
export function daysBetween(from: number, to: number): number {
  return Math.trunc((to - from) / MS_PER_DAY);
}

/** Instant `days` days before `now`. */
export function cutoff(now: number, days: number): number {
  return now - days * MS_PER_DAY;
}

/** Day span of an analysis period; null for the unbounded 'all'. */
export function periodDays(period: AnalysisPeriod): number | null {
  switch (period) {
    case 'week':
      return 7;
    case 'month':
      return 30;
    case 'quarter':
      return 90;
    case 'all':
      return null;
    default:
      return assertNever(period);
  }
}

/** Lower bound (epoch ms) of an analysis period; 0 for 'all'. */
export function periodStart(period: AnalysisPeriod, now: number): number {
  const days = periodDays(period);
  return days === null ? 0 : cutoff(now, days);
}

export function requirePositiveDays(parameter: string, value: number): number {
  if (!Number.isInteger(value) || value <= 0) {
    throw new InvalidParameterError(parameter, `must be a positive whole number of days (got ${value})`);
  }
  return value;
}

export function requirePercentage(parameter: string, value: number): number {
  if (!Number.isFinite(value) || value < 0 || value > 100) {
    throw new InvalidParameterError(parameter, `must be between 0 and 100 (got ${value})`);
  }
  return value;
}

export function isoString(value: Date | number): string {
  return new Date(value).toISOString();
}

export function toIso(value: Date | number | null): string | null {
  return value === null ? null : isoString(value);
}

// =============================================================================
// ORDERINGS
// =============================================================================

export function severityRank(severity: IssueSeverity): number {
  switch (severity) {
    case 'CRITICAL':
      return 0;
    case 'HIGH':
      return 1;
    case 'MEDIUM':
      return 2;
    default:
      return assertNever(severity);
  }
}

export function riskRank(level: RiskLevel): number {
  switch (level) {
    case 'CRITICAL':
      return 0;
    case 'HIGH':
      return 1;
    case 'MEDIUM':
      return 2;
    case 'LOW':
      return 3;
    default:
      return assertNever(level);
  }
}

export function priorityRank(priority: Priority): number {
  switch (priority) {
    case 'HIGH':
      return 0;
    case 'MEDIUM':
      return 1;
    case 'LOW':
      return 2;
    default:
      return assertNever(priority);
  }
}
