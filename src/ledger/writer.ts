/**
 * Ledger Writer - the only code path that changes stock.
 *
 * Each write appends StockMovement rows and moves product.current_stock in
 * the same transaction, so `stock_after = stock_before + quantity` and
 * `current_stock = stock_after` hold after every commit.
 */

import type { Database } from '../db/index.js';
import { createLogger } from '../utils/logger.js';
import { LedgerWriteError } from '../infra/errors.js';
import {
  assertNever,
  type MovementType,
  type Product,
  type PurchaseOrder,
  type SaleOrder,
  type StockMovement,
  type Supplier,
} from '../types.js';
import { getProduct, getPurchaseOrder, getSaleOrder, getSupplier } from './index.js';

const logger = createLogger('ledger');

// =============================================================================
// INPUT TYPES
// =============================================================================

export interface CreateProductInput {
  sku: string;
  name: string;
  gtin?: string;
  category?: string;
  brand?: string;
  salePrice: number;
  costPrice: number;
  minStock?: number;
  isActive?: boolean;
  /** Opening balance, posted as an ADJUSTMENT movement */
  initialStock?: number;
  at?: Date;
}

export interface CreateSupplierInput {
  name: string;
  taxId: string;
  email?: string;
  phone?: string;
  address?: string;
  city?: string;
  state?: string;
  isActive?: boolean;
  at?: Date;
}

export interface OrderLineInput {
  productId: number;
  quantity: number;
  unitPrice: number;
}

export interface CreatePurchaseOrderInput {
  orderNumber: string;
  supplierId: number;
  orderDate?: Date;
  items: OrderLineInput[];
  notes?: string;
}

export interface RecordSaleInput {
  orderNumber: string;
  saleDate?: Date;
  /** PENDING sales post no movement until paid (default: PAID) */
  status?: 'PENDING' | 'PAID';
  items: OrderLineInput[];
  notes?: string;
}

export interface MovementOptions {
  at?: Date;
  notes?: string;
  referenceId?: number;
  unitCost?: number;
}

interface PostMovementInput {
  productId: number;
  type: MovementType;
  quantity: number;
  unitCost: number | null;
  referenceId: number | null;
  at: number;
  notes: string | null;
}

// =============================================================================
// HELPERS
// =============================================================================

function checkSign(type: MovementType, quantity: number, productId: number): void {
  if (!Number.isFinite(quantity) || quantity === 0) {
    throw new LedgerWriteError(`${type} movement needs a non-zero quantity`, 'product', productId);
  }
  switch (type) {
    case 'PURCHASE':
    case 'RETURN':
      if (quantity < 0) {
        throw new LedgerWriteError(`${type} movement must be inbound`, 'product', productId);
      }
      return;
    case 'SALE':
    case 'LOSS':
      if (quantity > 0) {
        throw new LedgerWriteError(`${type} movement must be outbound`, 'product', productId);
      }
      return;
    case 'ADJUSTMENT':
      return;
    default:
      assertNever(type);
  }
}

function checkLines(items: OrderLineInput[], entity: string): void {
  if (items.length === 0) {
    throw new LedgerWriteError('Order needs at least one item', entity);
  }
  for (const item of items) {
    if (!Number.isFinite(item.quantity) || item.quantity <= 0) {
      throw new LedgerWriteError(`Item quantity must be positive (got ${item.quantity})`, entity);
    }
    if (!Number.isFinite(item.unitPrice) || item.unitPrice < 0) {
      throw new LedgerWriteError(`Item unit price must be >= 0 (got ${item.unitPrice})`, entity);
    }
  }
}

function orderTotal(items: OrderLineInput[]): number {
  return Math.round(items.reduce((sum, item) => sum + item.quantity * item.unitPrice, 0) * 100) / 100;
}

function requireProduct(db: Database, productId: number): Product {
  const product = getProduct(db, productId);
  if (!product) {
    throw new LedgerWriteError(`Unknown product ${productId}`, 'product', productId);
  }
  return product;
}

/**
 * Append one movement and move the product's cached stock with it.
 * Callers run this inside a transaction.
 */
function postMovement(db: Database, input: PostMovementInput): StockMovement {
  checkSign(input.type, input.quantity, input.productId);
  const product = requireProduct(db, input.productId);

  const stockBefore = product.currentStock;
  const stockAfter = stockBefore + input.quantity;

  const { lastInsertRowid } = db.run(
    `INSERT INTO stock_movement
       (product_id, movement_type, reference_id, quantity, unit_cost, stock_before, stock_after, movement_date, notes)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
    [
      input.productId,
      input.type,
      input.referenceId,
      input.quantity,
      input.unitCost,
      stockBefore,
      stockAfter,
      input.at,
      input.notes,
    ],
  );
  db.run('UPDATE product SET current_stock = ?, updated_at = ? WHERE id = ?', [
    stockAfter,
    Date.now(),
    input.productId,
  ]);

  return {
    id: lastInsertRowid,
    productId: input.productId,
    movementType: input.type,
    referenceId: input.referenceId,
    quantity: input.quantity,
    unitCost: input.unitCost,
    stockBefore,
    stockAfter,
    movementDate: new Date(input.at),
    notes: input.notes,
  };
}

function reload<T>(value: T | undefined, entity: string, id: number): T {
  if (value === undefined) {
    throw new LedgerWriteError(`${entity} ${id} vanished during write`, entity, id);
  }
  return value;
}

// =============================================================================
// MASTER DATA
// =============================================================================

export function createProduct(db: Database, input: CreateProductInput): Product {
  if (input.salePrice < 0 || input.costPrice < 0) {
    throw new LedgerWriteError(`Prices must be >= 0 for ${input.sku}`, 'product');
  }
  const at = (input.at ?? new Date()).getTime();

  const id = db.transaction(() => {
    const { lastInsertRowid } = db.run(
      `INSERT INTO product
         (sku, gtin, name, category, brand, sale_price, cost_price, current_stock, min_stock, is_active, created_at, updated_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, 0, ?, ?, ?, ?)`,
      [
        input.sku,
        input.gtin ?? null,
        input.name,
        input.category ?? null,
        input.brand ?? null,
        input.salePrice,
        input.costPrice,
        input.minStock ?? 0,
        input.isActive === false ? 0 : 1,
        at,
        at,
      ],
    );

    if (input.initialStock !== undefined && input.initialStock !== 0) {
      postMovement(db, {
        productId: lastInsertRowid,
        type: 'ADJUSTMENT',
        quantity: input.initialStock,
        unitCost: input.costPrice,
        referenceId: null,
        at,
        notes: 'Opening balance',
      });
    }
    return lastInsertRowid;
  });

  logger.info({ productId: id, sku: input.sku }, 'Product created');
  return reload(getProduct(db, id), 'product', id);
}

export function createSupplier(db: Database, input: CreateSupplierInput): Supplier {
  const { lastInsertRowid } = db.run(
    `INSERT INTO supplier (name, tax_id, email, phone, address, city, state, is_active, created_at)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
    [
      input.name,
      input.taxId,
      input.email ?? null,
      input.phone ?? null,
      input.address ?? null,
      input.city ?? null,
      input.state ?? null,
      input.isActive === false ? 0 : 1,
      (input.at ?? new Date()).getTime(),
    ],
  );
  logger.info({ supplierId: lastInsertRowid, name: input.name }, 'Supplier created');
  return reload(getSupplier(db, lastInsertRowid), 'supplier', lastInsertRowid);
}

// =============================================================================
// PURCHASE ORDERS
// =============================================================================

export function createPurchaseOrder(db: Database, input: CreatePurchaseOrderInput): PurchaseOrder {
  checkLines(input.items, 'purchase_order');
  if (!getSupplier(db, input.supplierId)) {
    throw new LedgerWriteError(`Unknown supplier ${input.supplierId}`, 'supplier', input.supplierId);
  }
  const orderDate = (input.orderDate ?? new Date()).getTime();
  const now = Date.now();

  const id = db.transaction(() => {
    const { lastInsertRowid } = db.run(
      `INSERT INTO purchase_order
         (order_number, supplier_id, order_date, received_date, total_amount, status, notes, created_at, updated_at)
       VALUES (?, ?, ?, NULL, ?, 'PENDING', ?, ?, ?)`,
      [input.orderNumber, input.supplierId, orderDate, orderTotal(input.items), input.notes ?? null, now, now],
    );
    for (const item of input.items) {
      requireProduct(db, item.productId);
      db.run(
        'INSERT INTO purchase_order_item (purchase_order_id, product_id, quantity, unit_price) VALUES (?, ?, ?, ?)',
        [lastInsertRowid, item.productId, item.quantity, item.unitPrice],
      );
    }
    return lastInsertRowid;
  });

  logger.info({ purchaseOrderId: id, orderNumber: input.orderNumber }, 'Purchase order created');
  return reload(getPurchaseOrder(db, id), 'purchase_order', id);
}

function requirePendingPurchase(db: Database, id: number): PurchaseOrder {
  const order = getPurchaseOrder(db, id);
  if (!order) {
    throw new LedgerWriteError(`Unknown purchase order ${id}`, 'purchase_order', id);
  }
  if (order.status !== 'PENDING') {
    throw new LedgerWriteError(
      `Purchase order ${order.orderNumber} is ${order.status}, only PENDING orders transition`,
      'purchase_order',
      id,
    );
  }
  return order;
}

/** PENDING -> RECEIVED, posting one PURCHASE movement per item. */
export function receivePurchaseOrder(db: Database, id: number, receivedAt: Date = new Date()): PurchaseOrder {
  const at = receivedAt.getTime();

  db.transaction(() => {
    const order = requirePendingPurchase(db, id);
    db.run(
      "UPDATE purchase_order SET status = 'RECEIVED', received_date = ?, updated_at = ? WHERE id = ?",
      [at, Date.now(), id],
    );
    for (const item of order.items) {
      postMovement(db, {
        productId: item.productId,
        type: 'PURCHASE',
        quantity: item.quantity,
        unitCost: item.unitPrice,
        referenceId: id,
        at,
        notes: `Received ${order.orderNumber}`,
      });
    }
  });

  logger.info({ purchaseOrderId: id }, 'Purchase order received');
  return reload(getPurchaseOrder(db, id), 'purchase_order', id);
}

/** PENDING -> CANCELLED. No stock effect. */
export function cancelPurchaseOrder(db: Database, id: number): PurchaseOrder {
  db.transaction(() => {
    requirePendingPurchase(db, id);
    db.run("UPDATE purchase_order SET status = 'CANCELLED', updated_at = ? WHERE id = ?", [Date.now(), id]);
  });
  logger.info({ purchaseOrderId: id }, 'Purchase order cancelled');
  return reload(getPurchaseOrder(db, id), 'purchase_order', id);
}

// =============================================================================
// SALES
// =============================================================================

function postSaleMovements(db: Database, order: SaleOrder, at: number): void {
  for (const item of order.items) {
    const product = requireProduct(db, item.productId);
    postMovement(db, {
      productId: item.productId,
      type: 'SALE',
      quantity: -item.quantity,
      unitCost: product.costPrice,
      referenceId: order.id,
      at,
      notes: `Sale ${order.orderNumber}`,
    });
  }
}

export function recordSale(db: Database, input: RecordSaleInput): SaleOrder {
  checkLines(input.items, 'sale_order');
  const saleDate = (input.saleDate ?? new Date()).getTime();
  const status = input.status ?? 'PAID';
  const now = Date.now();

  const id = db.transaction(() => {
    const { lastInsertRowid } = db.run(
      `INSERT INTO sale_order (order_number, sale_date, total_amount, status, notes, created_at, updated_at)
       VALUES (?, ?, ?, ?, ?, ?, ?)`,
      [input.orderNumber, saleDate, orderTotal(input.items), status, input.notes ?? null, now, now],
    );
    for (const item of input.items) {
      requireProduct(db, item.productId);
      db.run(
        'INSERT INTO sale_order_item (sale_order_id, product_id, quantity, unit_price) VALUES (?, ?, ?, ?)',
        [lastInsertRowid, item.productId, item.quantity, item.unitPrice],
      );
    }
    if (status === 'PAID') {
      postSaleMovements(db, reload(getSaleOrder(db, lastInsertRowid), 'sale_order', lastInsertRowid), saleDate);
    }
    return lastInsertRowid;
  });

  logger.info({ saleOrderId: id, orderNumber: input.orderNumber, status }, 'Sale recorded');
  return reload(getSaleOrder(db, id), 'sale_order', id);
}

/** PENDING -> PAID, posting the SALE movements. */
export function markSalePaid(db: Database, id: number, paidAt: Date = new Date()): SaleOrder {
  db.transaction(() => {
    const order = getSaleOrder(db, id);
    if (!order) throw new LedgerWriteError(`Unknown sale order ${id}`, 'sale_order', id);
    if (order.status !== 'PENDING') {
      throw new LedgerWriteError(`Sale ${order.orderNumber} is ${order.status}, expected PENDING`, 'sale_order', id);
    }
    db.run("UPDATE sale_order SET status = 'PAID', updated_at = ? WHERE id = ?", [Date.now(), id]);
    postSaleMovements(db, order, paidAt.getTime());
  });
  logger.info({ saleOrderId: id }, 'Sale paid');
  return reload(getSaleOrder(db, id), 'sale_order', id);
}

/**
 * Cancel a sale. A PAID sale posts RETURN movements that restore its stock;
 * a PENDING one only changes status.
 */
export function cancelSale(db: Database, id: number, at: Date = new Date()): SaleOrder {
  db.transaction(() => {
    const order = getSaleOrder(db, id);
    if (!order) throw new LedgerWriteError(`Unknown sale order ${id}`, 'sale_order', id);

    switch (order.status) {
      case 'CANCELLED':
        throw new LedgerWriteError(`Sale ${order.orderNumber} is already cancelled`, 'sale_order', id);
      case 'PENDING':
        break;
      case 'PAID':
        for (const item of order.items) {
          const product = requireProduct(db, item.productId);
          postMovement(db, {
            productId: item.productId,
            type: 'RETURN',
            quantity: item.quantity,
            unitCost: product.costPrice,
            referenceId: id,
            at: at.getTime(),
            notes: `Cancelled ${order.orderNumber}`,
          });
        }
        break;
      default:
        assertNever(order.status);
    }
    db.run("UPDATE sale_order SET status = 'CANCELLED', updated_at = ? WHERE id = ?", [Date.now(), id]);
  });
  logger.info({ saleOrderId: id }, 'Sale cancelled');
  return reload(getSaleOrder(db, id), 'sale_order', id);
}

// =============================================================================
// STANDALONE MOVEMENTS
// =============================================================================

function postStandalone(
  db: Database,
  productId: number,
  type: MovementType,
  quantity: number,
  options: MovementOptions,
): StockMovement {
  const movement = db.transaction(() => {
    const product = requireProduct(db, productId);
    return postMovement(db, {
      productId,
      type,
      quantity,
      unitCost: options.unitCost ?? product.costPrice,
      referenceId: options.referenceId ?? null,
      at: (options.at ?? new Date()).getTime(),
      notes: options.notes ?? null,
    });
  });
  logger.info({ productId, type, quantity, stockAfter: movement.stockAfter }, 'Movement posted');
  return movement;
}

/** Signed correction after a physical count. */
export function recordAdjustment(
  db: Database,
  productId: number,
  delta: number,
  options: MovementOptions = {},
): StockMovement {
  return postStandalone(db, productId, 'ADJUSTMENT', delta, options);
}

/** Acknowledged loss (breakage, theft, expiry). `quantity` is the positive amount lost. */
export function recordLoss(
  db: Database,
  productId: number,
  quantity: number,
  options: MovementOptions = {},
): StockMovement {
  if (quantity <= 0) {
    throw new LedgerWriteError(`Loss quantity must be positive (got ${quantity})`, 'product', productId);
  }
  return postStandalone(db, productId, 'LOSS', -quantity, options);
}

export function recordReturn(
  db: Database,
  productId: number,
  quantity: number,
  options: MovementOptions = {},
): StockMovement {
  return postStandalone(db, productId, 'RETURN', quantity, options);
}
