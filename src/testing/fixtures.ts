/**
 * Ledger fixtures for tests: an in-memory database and terse builders that
 * go through the real ledger writer.
 */

import { createDatabase, MEMORY_PATH, type Database } from '../db/index.js';
import {
  createProduct,
  createPurchaseOrder,
  createSupplier,
  receivePurchaseOrder,
  recordSale,
  type CreateProductInput,
  type CreateSupplierInput,
} from '../ledger/writer.js';
import type { Product, PurchaseOrder, SaleOrder, Supplier } from '../types.js';
import { MS_PER_DAY } from '../analytics/helpers.js';

/** Fixed clock shared by every scenario. */
export const NOW = Date.UTC(2024, 5, 15, 12, 0, 0);

export function daysAgo(days: number): Date {
  return new Date(NOW - days * MS_PER_DAY);
}

export function openTestDb(): Promise<Database> {
  return createDatabase({ path: MEMORY_PATH });
}

let sequence = 0;

function next(prefix: string): string {
  sequence += 1;
  return `${prefix}-${sequence}`;
}

export function addProduct(db: Database, overrides: Partial<CreateProductInput> = {}): Product {
  return createProduct(db, {
    sku: next('SKU'),
    name: 'Test product',
    salePrice: 10,
    costPrice: 6,
    at: daysAgo(365),
    ...overrides,
  });
}

export function addSupplier(db: Database, overrides: Partial<CreateSupplierInput> = {}): Supplier {
  return createSupplier(db, {
    name: 'Test supplier',
    taxId: next('TAX'),
    at: daysAgo(365),
    ...overrides,
  });
}

/** One PAID sale of a single line. */
export function sell(
  db: Database,
  productId: number,
  quantity: number,
  at: Date,
  unitPrice = 10,
): SaleOrder {
  return recordSale(db, {
    orderNumber: next('SO'),
    saleDate: at,
    items: [{ productId, quantity, unitPrice }],
  });
}

/** A PENDING purchase order of a single line. */
export function order(
  db: Database,
  supplierId: number,
  productId: number,
  quantity: number,
  orderDate: Date,
  unitPrice = 6,
): PurchaseOrder {
  return createPurchaseOrder(db, {
    orderNumber: next('PO'),
    supplierId,
    orderDate,
    items: [{ productId, quantity, unitPrice }],
  });
}

/** A purchase order placed and received on the same instant. */
export function receive(
  db: Database,
  supplierId: number,
  productId: number,
  quantity: number,
  at: Date,
  unitPrice = 6,
): PurchaseOrder {
  const po = order(db, supplierId, productId, quantity, at, unitPrice);
  return receivePurchaseOrder(db, po.id, at);
}
