/**
 * Loss Detection Types
 */

import type { IssueSeverity } from '../types.js';

export interface StockDiscrepancy {
  productId: number;
  sku: string;
  name: string;
  category: string;
  currentStock: number;
  /** Signed sum of every movement of the product */
  expectedStock: number;
  /** expected - actual; positive means units are missing */
  discrepancy: number;
  discrepancyPercentage: number;
  estimatedLossValue: number;
  lastMovementDate: string | null;
  lossMovements: number;
  severity: IssueSeverity;
  recommendation: string;
}

export interface LossDetectionOptions {
  /** Discrepancies at or below this percentage are not reported (default: 5) */
  tolerancePct?: number;
}

export interface ExplicitLoss {
  movementId: number;
  productId: number;
  sku: string;
  productName: string;
  category: string;
  quantityLost: number;
  lossValue: number;
  lossDate: string;
  notes: string;
  daysAgo: number;
}

export interface ExplicitLossOptions {
  periodDays?: number;
  now?: number;
}
