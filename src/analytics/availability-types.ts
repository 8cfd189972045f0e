/**
 * Availability Analysis Types
 */

import type { IssueSeverity } from '../types.js';

export type AvailabilityStatus = 'IN_STOCK' | 'OUT_OF_STOCK';

export interface AvailabilityIssue {
  productId: number;
  sku: string;
  name: string;
  category: string;
  stockoutEvents: number;
  totalDaysOut: number;
  availabilityRate: number;    // % of the period the product was available
  lostSalesCount: number;      // whole units
  currentStatus: AvailabilityStatus;
  issueSeverity: IssueSeverity;
  recommendation: string;
}

export interface AvailabilityOptions {
  periodDays?: number;
  now?: number;
}

export interface OperationalAvailabilityIssue {
  productId: number;
  sku: string;
  name: string;
  category: string;
  currentStock: number;
  historicalDailySales: number;
  recentDailySales: number;
  salesDropPercentage: number;
  expectedSalesRecent: number;
  actualSalesRecent: number;
  lostSales: number;
  lastReceivedDate: string;
  daysSinceReceived: number;
  potentialLostRevenue: number;
  issueSeverity: IssueSeverity;
  recommendation: string;
}

export interface OperationalAvailabilityOptions {
  recentDays?: number;
  historicalDays?: number;
  dropThresholdPct?: number;
  now?: number;
}
