/**
 * Core ledger types shared across the engine.
 *
 * Every status-like field is a closed union; consumers switch on them
 * exhaustively so that a new state fails to compile until it is handled.
 */

// =============================================================================
// ENUMS
// =============================================================================

export const MOVEMENT_TYPES = ['PURCHASE', 'SALE', 'ADJUSTMENT', 'RETURN', 'LOSS'] as const;
export type MovementType = (typeof MOVEMENT_TYPES)[number];

export const PURCHASE_ORDER_STATUSES = ['PENDING', 'RECEIVED', 'CANCELLED'] as const;
export type PurchaseOrderStatus = (typeof PURCHASE_ORDER_STATUSES)[number];

export const SALE_ORDER_STATUSES = ['PENDING', 'PAID', 'CANCELLED'] as const;
export type SaleOrderStatus = (typeof SALE_ORDER_STATUSES)[number];

export const ANALYSIS_PERIODS = ['week', 'month', 'quarter', 'all'] as const;
export type AnalysisPeriod = (typeof ANALYSIS_PERIODS)[number];

/** Risk of running out before replenishment arrives. */
export type RiskLevel = 'CRITICAL' | 'HIGH' | 'MEDIUM' | 'LOW';

/** Severity used by detectors that only report actual problems. */
export type IssueSeverity = 'CRITICAL' | 'HIGH' | 'MEDIUM';

export type Priority = 'HIGH' | 'MEDIUM' | 'LOW';

// =============================================================================
// ENTITIES
// =============================================================================

export interface Product {
  id: number;
  sku: string;
  gtin: string | null;
  name: string;
  category: string | null;
  brand: string | null;
  salePrice: number;
  costPrice: number;
  /** Denormalized running total of the product's stock movements */
  currentStock: number;
  minStock: number;
  isActive: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export interface Supplier {
  id: number;
  name: string;
  taxId: string;
  email: string | null;
  phone: string | null;
  address: string | null;
  city: string | null;
  state: string | null;
  isActive: boolean;
  createdAt: Date;
}

export interface PurchaseOrderItem {
  id: number;
  purchaseOrderId: number;
  productId: number;
  quantity: number;
  unitPrice: number;
}

export interface PurchaseOrder {
  id: number;
  orderNumber: string;
  supplierId: number;
  orderDate: Date;
  receivedDate: Date | null;
  totalAmount: number;
  status: PurchaseOrderStatus;
  notes: string | null;
  items: PurchaseOrderItem[];
}

export interface SaleOrderItem {
  id: number;
  saleOrderId: number;
  productId: number;
  quantity: number;
  unitPrice: number;
}

export interface SaleOrder {
  id: number;
  orderNumber: string;
  saleDate: Date;
  totalAmount: number;
  status: SaleOrderStatus;
  notes: string | null;
  items: SaleOrderItem[];
}

export interface StockMovement {
  id: number;
  productId: number;
  movementType: MovementType;
  /** Purchase or sale order that produced the movement, when there is one */
  referenceId: number | null;
  /** Signed: positive is inbound, negative is outbound */
  quantity: number;
  unitCost: number | null;
  stockBefore: number;
  stockAfter: number;
  movementDate: Date;
  notes: string | null;
}

// =============================================================================
// GUARDS
// =============================================================================

function isOneOf<T extends string>(values: readonly T[], value: unknown): value is T {
  return typeof value === 'string' && (values as readonly string[]).includes(value);
}

export function isMovementType(value: unknown): value is MovementType {
  return isOneOf(MOVEMENT_TYPES, value);
}

export function isPurchaseOrderStatus(value: unknown): value is PurchaseOrderStatus {
  return isOneOf(PURCHASE_ORDER_STATUSES, value);
}

export function isSaleOrderStatus(value: unknown): value is SaleOrderStatus {
  return isOneOf(SALE_ORDER_STATUSES, value);
}

export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${String(value)}`);
}
