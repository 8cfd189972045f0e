/**
 * Stock Rupture & Slow-Moving Stock Types
 */

// =============================================================================
// RUPTURE
// =============================================================================

export interface StockRupture {
  productId: number;
  sku: string;
  name: string;
  category: string;
  currentStock: number;
  recentSalesCount: number;
  lastSaleDate: string | null;
  totalQuantitySold: number;
  estimatedDailyDemand: number;
  daysOutOfStock: number;
  lostRevenueEstimate: number;
}

export interface RuptureOptions {
  lookbackDays?: number;
  now?: number;
}

// =============================================================================
// SLOW-MOVING
// =============================================================================

export type SlowMovingTier = 'URGENT' | 'IMPORTANT' | 'MONITOR';

export interface SlowMovingItem {
  productId: number;
  sku: string;
  name: string;
  category: string;
  currentStock: number;
  stockValue: number;
  lastSaleDate: string | null;
  /** null when the product never sold */
  daysWithoutSale: number | null;
  lastPurchaseDate: string | null;
  tier: SlowMovingTier;
  recommendation: string;
}

export interface SlowMovingOptions {
  daysThreshold?: number;
  now?: number;
}

// =============================================================================
// LOW COVER
// =============================================================================

export interface LowCoverageItem {
  productId: number;
  sku: string;
  name: string;
  currentStock: number;
  quantitySold: number;
  dailyDemand: number;
  daysOfStock: number;
}

export interface LowCoverageOptions {
  /** Days of recent PAID sales that set the rate (default: 7) */
  windowDays?: number;
  /** Report products with less cover than this (default: 7) */
  maxDaysOfStock?: number;
  now?: number;
}
