/**
 * Stockout Risk Types
 */

import type { RiskLevel } from '../types.js';

// =============================================================================
// PENDING REPLENISHMENT
// =============================================================================

export interface PendingOrderLine {
  orderId: number;
  orderNumber: string;
  orderDate: string;
  quantity: number;
  unitPrice: number;
}

export interface PendingCoverage {
  count: number;
  totalQuantity: number;
  /** Pending quantity covers forecast demand minus stock on hand; false when nothing is pending */
  isSufficient: boolean;
  oldestOrderDays: number | null;
  /** Oldest pending order is more than 7 days old */
  isDelayed: boolean;
  orders: PendingOrderLine[];
}

// =============================================================================
// RISK
// =============================================================================

export interface StockoutRisk {
  productId: number;
  sku: string;
  name: string;
  category: string;
  currentStock: number;
  avgDailySales: number;
  daysUntilStockout: number;
  forecastedDemand: number;
  pendingOrders: PendingCoverage;
  gapQuantity: number;
  riskLevel: RiskLevel;
  recommendation: string;
  potentialLostRevenue: number;
  unitSalePrice: number;
  unitCost: number;
}

export interface StockoutRiskOptions {
  forecastDays?: number;
  historyDays?: number;
  minDaysThreshold?: number;
  now?: number;
}

// =============================================================================
// PENDING ORDER SUMMARY
// =============================================================================

export interface PendingOrderProduct {
  productId: number;
  productName: string;
  sku: string;
  quantity: number;
  unitPrice: number;
  subtotal: number;
}

export interface PendingOrderSummary {
  purchaseOrderId: number;
  orderNumber: string;
  supplierName: string;
  orderDate: string;
  daysPending: number;
  isDelayed: boolean;
  products: PendingOrderProduct[];
  totalValue: number;
}

export interface PendingOrderSummaryOptions {
  productId?: number;
  now?: number;
}
