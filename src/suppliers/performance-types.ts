/**
 * Supplier Performance Types
 */

export const SUPPLIER_METRICS = ['turnover_rate', 'revenue', 'slow_moving', 'score'] as const;
export type SupplierMetric = (typeof SUPPLIER_METRICS)[number];

export type SupplierRating = 'Excellent' | 'Good' | 'Fair' | 'Poor';

export interface SupplierPerformance {
  supplierId: number;
  supplierName: string;
  taxId: string;
  productsSupplied: number;
  /** Spend on non-cancelled orders placed in the period */
  totalPurchased: number;
  /** PAID revenue of the supplied products in the period */
  totalRevenue: number;
  /** Units per day, averaged over supplied products that sold */
  avgTurnoverRate: number;
  productsInStock: number;
  slowMovingProducts: number;
  slowMovingPercentage: number;
  performanceScore: number;
  rating: SupplierRating;
}

export interface SupplierPerformanceOptions {
  /** Sort key (default: score) */
  metric?: SupplierMetric;
  periodDays?: number;
  now?: number;
}
