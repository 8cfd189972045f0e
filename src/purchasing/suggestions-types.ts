/**
 * Purchase Suggestion Types
 */

import type { Priority } from '../types.js';

export interface PendingOrderStatus {
  hasPending: boolean;
  totalQuantity: number;
  orderCount: number;
  isSufficient: boolean;
}

export interface PurchaseSuggestion {
  productId: number;
  sku: string;
  name: string;
  category: string;
  currentStock: number;
  avgDailySales: number;
  forecastedDemand: number;
  stockNeeded: number;
  suggestedQuantity: number;
  unitCost: number;
  orderValue: number;
  priority: Priority;
  lastSaleDate: string | null;
  /** Whole days of cover left at the historical rate */
  daysUntilStockout: number;
  pendingOrders: PendingOrderStatus;
}

export interface SuggestionOptions {
  forecastDays?: number;
  historyDays?: number;
  minOrderValue?: number;
  now?: number;
}

// =============================================================================
// SUPPLIER GROUPING
// =============================================================================

export interface SupplierOrderLine {
  productId: number;
  sku: string;
  name: string;
  quantity: number;
  unitCost: number;
  orderValue: number;
  priority: Priority;
}

export interface SupplierOrder {
  supplierId: number;
  supplierName: string;
  productsCount: number;
  products: SupplierOrderLine[];
  totalOrderValue: number;
  highPriorityItems: number;
}

export interface SupplierGrouping {
  suppliers: SupplierOrder[];
  /** Suggested products that were never purchased from anyone */
  unassigned: SupplierOrderLine[];
  unassignedValue: number;
}
