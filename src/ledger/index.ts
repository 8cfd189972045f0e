/**
 * Ledger Accessor - read-only queries over products, suppliers, orders and
 * the stock-movement ledger.
 */

import type { Database } from '../db/index.js';
import {
  isMovementType,
  isPurchaseOrderStatus,
  isSaleOrderStatus,
  type MovementType,
  type Product,
  type PurchaseOrder,
  type PurchaseOrderItem,
  type PurchaseOrderStatus,
  type SaleOrder,
  type SaleOrderItem,
  type SaleOrderStatus,
  type StockMovement,
  type Supplier,
} from '../types.js';
import { DataAccessError } from '../infra/errors.js';

// =============================================================================
// ROW SHAPES
// =============================================================================

export interface ProductRow {
  id: number;
  sku: string;
  gtin: string | null;
  name: string;
  category: string | null;
  brand: string | null;
  sale_price: number;
  cost_price: number;
  current_stock: number;
  min_stock: number;
  is_active: number;
  created_at: number;
  updated_at: number;
}

interface SupplierRow {
  id: number;
  name: string;
  tax_id: string;
  email: string | null;
  phone: string | null;
  address: string | null;
  city: string | null;
  state: string | null;
  is_active: number;
  created_at: number;
}

interface PurchaseOrderRow {
  id: number;
  order_number: string;
  supplier_id: number;
  order_date: number;
  received_date: number | null;
  total_amount: number;
  status: string;
  notes: string | null;
}

interface SaleOrderRow {
  id: number;
  order_number: string;
  sale_date: number;
  total_amount: number;
  status: string;
  notes: string | null;
}

interface OrderItemRow {
  id: number;
  order_id: number;
  product_id: number;
  quantity: number;
  unit_price: number;
}

interface MovementRow {
  id: number;
  product_id: number;
  movement_type: string;
  reference_id: number | null;
  quantity: number;
  unit_cost: number | null;
  stock_before: number;
  stock_after: number;
  movement_date: number;
  notes: string | null;
}

// =============================================================================
// PARSERS
// =============================================================================

export function parseProduct(row: ProductRow): Product {
  return {
    id: row.id,
    sku: row.sku,
    gtin: row.gtin,
    name: row.name,
    category: row.category,
    brand: row.brand,
    salePrice: row.sale_price,
    costPrice: row.cost_price,
    currentStock: row.current_stock,
    minStock: row.min_stock,
    isActive: row.is_active === 1,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

function parseSupplier(row: SupplierRow): Supplier {
  return {
    id: row.id,
    name: row.name,
    taxId: row.tax_id,
    email: row.email,
    phone: row.phone,
    address: row.address,
    city: row.city,
    state: row.state,
    isActive: row.is_active === 1,
    createdAt: new Date(row.created_at),
  };
}

function parsePurchaseStatus(value: string): PurchaseOrderStatus {
  if (!isPurchaseOrderStatus(value)) {
    throw new DataAccessError(`Unknown purchase order status "${value}"`, 'purchase_order.status');
  }
  return value;
}

function parseSaleStatus(value: string): SaleOrderStatus {
  if (!isSaleOrderStatus(value)) {
    throw new DataAccessError(`Unknown sale order status "${value}"`, 'sale_order.status');
  }
  return value;
}

function parseMovementType(value: string): MovementType {
  if (!isMovementType(value)) {
    throw new DataAccessError(`Unknown movement type "${value}"`, 'stock_movement.movement_type');
  }
  return value;
}

function parseMovement(row: MovementRow): StockMovement {
  return {
    id: row.id,
    productId: row.product_id,
    movementType: parseMovementType(row.movement_type),
    referenceId: row.reference_id,
    quantity: row.quantity,
    unitCost: row.unit_cost,
    stockBefore: row.stock_before,
    stockAfter: row.stock_after,
    movementDate: new Date(row.movement_date),
    notes: row.notes,
  };
}

// =============================================================================
// PRODUCTS & SUPPLIERS
// =============================================================================

export function getProduct(db: Database, id: number): Product | undefined {
  const rows = db.query<ProductRow>('SELECT * FROM product WHERE id = ?', [id]);
  return rows[0] ? parseProduct(rows[0]) : undefined;
}

export function getProductBySku(db: Database, sku: string): Product | undefined {
  const rows = db.query<ProductRow>('SELECT * FROM product WHERE sku = ?', [sku]);
  return rows[0] ? parseProduct(rows[0]) : undefined;
}

export interface ListProductsOptions {
  activeOnly?: boolean;
  inStockOnly?: boolean;
}

export function listProducts(db: Database, options: ListProductsOptions = {}): Product[] {
  const conditions: string[] = [];
  if (options.activeOnly) conditions.push('is_active = 1');
  if (options.inStockOnly) conditions.push('current_stock > 0');
  const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
  return db.query<ProductRow>(`SELECT * FROM product ${where} ORDER BY id`).map(parseProduct);
}

export function getSupplier(db: Database, id: number): Supplier | undefined {
  const rows = db.query<SupplierRow>('SELECT * FROM supplier WHERE id = ?', [id]);
  return rows[0] ? parseSupplier(rows[0]) : undefined;
}

export function listSuppliers(db: Database, activeOnly = true): Supplier[] {
  const sql = activeOnly
    ? 'SELECT * FROM supplier WHERE is_active = 1 ORDER BY id'
    : 'SELECT * FROM supplier ORDER BY id';
  return db.query<SupplierRow>(sql).map(parseSupplier);
}

// =============================================================================
// ORDERS
// =============================================================================

export function getPurchaseOrder(db: Database, id: number): PurchaseOrder | undefined {
  const rows = db.query<PurchaseOrderRow>('SELECT * FROM purchase_order WHERE id = ?', [id]);
  const row = rows[0];
  if (!row) return undefined;

  const items = db.query<OrderItemRow>(
    `SELECT id, purchase_order_id AS order_id, product_id, quantity, unit_price
     FROM purchase_order_item WHERE purchase_order_id = ? ORDER BY id`,
    [id],
  ).map((item): PurchaseOrderItem => ({
    id: item.id,
    purchaseOrderId: item.order_id,
    productId: item.product_id,
    quantity: item.quantity,
    unitPrice: item.unit_price,
  }));

  return {
    id: row.id,
    orderNumber: row.order_number,
    supplierId: row.supplier_id,
    orderDate: new Date(row.order_date),
    receivedDate: row.received_date === null ? null : new Date(row.received_date),
    totalAmount: row.total_amount,
    status: parsePurchaseStatus(row.status),
    notes: row.notes,
    items,
  };
}

export function getSaleOrder(db: Database, id: number): SaleOrder | undefined {
  const rows = db.query<SaleOrderRow>('SELECT * FROM sale_order WHERE id = ?', [id]);
  const row = rows[0];
  if (!row) return undefined;

  const items = db.query<OrderItemRow>(
    `SELECT id, sale_order_id AS order_id, product_id, quantity, unit_price
     FROM sale_order_item WHERE sale_order_id = ? ORDER BY id`,
    [id],
  ).map((item): SaleOrderItem => ({
    id: item.id,
    saleOrderId: item.order_id,
    productId: item.product_id,
    quantity: item.quantity,
    unitPrice: item.unit_price,
  }));

  return {
    id: row.id,
    orderNumber: row.order_number,
    saleDate: new Date(row.sale_date),
    totalAmount: row.total_amount,
    status: parseSaleStatus(row.status),
    notes: row.notes,
    items,
  };
}

export interface PendingPurchaseLine {
  purchaseOrderId: number;
  orderNumber: string;
  orderDate: Date;
  quantity: number;
  unitPrice: number;
}

/** Items of PENDING purchase orders that reference the product. */
export function getPendingPurchaseLines(db: Database, productId: number): PendingPurchaseLine[] {
  return db.query<{
    id: number;
    order_number: string;
    order_date: number;
    quantity: number;
    unit_price: number;
  }>(
    `SELECT po.id, po.order_number, po.order_date, poi.quantity, poi.unit_price
     FROM purchase_order po
     JOIN purchase_order_item poi ON poi.purchase_order_id = po.id
     WHERE poi.product_id = ? AND po.status = 'PENDING'
     ORDER BY po.order_date, po.id`,
    [productId],
  ).map((row) => ({
    purchaseOrderId: row.id,
    orderNumber: row.order_number,
    orderDate: new Date(row.order_date),
    quantity: row.quantity,
    unitPrice: row.unit_price,
  }));
}

/**
 * Supplier of the most recent non-cancelled purchase order that references
 * the product. Ties on order date go to the higher order id.
 */
export function getLastSupplierForProduct(
  db: Database,
  productId: number,
): { id: number; name: string } | undefined {
  const rows = db.query<{ id: number; name: string }>(
    `SELECT s.id, s.name
     FROM supplier s
     JOIN purchase_order po ON po.supplier_id = s.id
     JOIN purchase_order_item poi ON poi.purchase_order_id = po.id
     WHERE poi.product_id = ? AND po.status != 'CANCELLED'
     ORDER BY po.order_date DESC, po.id DESC
     LIMIT 1`,
    [productId],
  );
  return rows[0];
}

// =============================================================================
// LEDGER
// =============================================================================

/** Full movement history of a product in chronological order. */
export function getMovements(db: Database, productId: number): StockMovement[] {
  return db.query<MovementRow>(
    'SELECT * FROM stock_movement WHERE product_id = ? ORDER BY movement_date, id',
    [productId],
  ).map(parseMovement);
}

function getLastMovementDate(
  db: Database,
  productId: number,
  movementType?: MovementType,
): Date | null {
  const rows = movementType
    ? db.query<{ last: number | null }>(
        'SELECT MAX(movement_date) AS last FROM stock_movement WHERE product_id = ? AND movement_type = ?',
        [productId, movementType],
      )
    : db.query<{ last: number | null }>(
        'SELECT MAX(movement_date) AS last FROM stock_movement WHERE product_id = ?',
        [productId],
      );
  const last = rows[0]?.last ?? null;
  return last === null ? null : new Date(last);
}

/** Date of the most recent PURCHASE movement (stock receipt). */
export function getLastPurchaseDate(db: Database, productId: number): Date | null {
  return getLastMovementDate(db, productId, 'PURCHASE');
}

/** Latest PAID sale of the product, optionally ignoring sales after `asOf`. */
export function getLastPaidSaleDate(db: Database, productId: number, asOf?: number): Date | null {
  const rows = asOf === undefined
    ? db.query<{ last: number | null }>(
        `SELECT MAX(so.sale_date) AS last
         FROM sale_order so
         JOIN sale_order_item soi ON soi.sale_order_id = so.id
         WHERE soi.product_id = ? AND so.status = 'PAID'`,
        [productId],
      )
    : db.query<{ last: number | null }>(
        `SELECT MAX(so.sale_date) AS last
         FROM sale_order so
         JOIN sale_order_item soi ON soi.sale_order_id = so.id
         WHERE soi.product_id = ? AND so.status = 'PAID' AND so.sale_date <= ?`,
        [productId, asOf],
      );
  const last = rows[0]?.last ?? null;
  return last === null ? null : new Date(last);
}

export interface SalesTotals {
  totalSold: number;
  totalRevenue: number;
  salesCount: number;
  lastSaleDate: Date | null;
}

/**
 * Sum of sale items for a product with sale_date in [from, to].
 * `to` defaults to unbounded. With `paidOnly` off, PENDING sales count too.
 */
export function sumPaidSales(
  db: Database,
  productId: number,
  from: number,
  to: number | null = null,
  paidOnly = true,
): SalesTotals {
  const conditions = ['soi.product_id = ?', 'so.sale_date >= ?'];
  const params: Array<number | string> = [productId, from];
  if (to !== null) {
    conditions.push('so.sale_date <= ?');
    params.push(to);
  }
  if (paidOnly) {
    conditions.push("so.status = 'PAID'");
  } else {
    conditions.push("so.status != 'CANCELLED'");
  }

  const row = db.query<{
    total_sold: number | null;
    total_revenue: number | null;
    sales_count: number;
    last_sale: number | null;
  }>(
    `SELECT SUM(soi.quantity) AS total_sold,
            SUM(soi.quantity * soi.unit_price) AS total_revenue,
            COUNT(DISTINCT so.id) AS sales_count,
            MAX(so.sale_date) AS last_sale
     FROM sale_order_item soi
     JOIN sale_order so ON soi.sale_order_id = so.id
     WHERE ${conditions.join(' AND ')}`,
    params,
  )[0];

  return {
    totalSold: row?.total_sold ?? 0,
    totalRevenue: row?.total_revenue ?? 0,
    salesCount: row?.sales_count ?? 0,
    lastSaleDate: row?.last_sale == null ? null : new Date(row.last_sale),
  };
}

/** PAID sales of one product within a period, with its catalogue fields. */
export interface ProductSalesRow {
  productId: number;
  sku: string;
  name: string;
  category: string | null;
  costPrice: number;
  salePrice: number;
  currentStock: number;
  totalRevenue: number;
  totalQuantity: number;
  salesCount: number;
  /** Mean of line unit prices, unweighted */
  avgUnitPrice: number;
  /** Mean of line quantities */
  avgLineQuantity: number;
}

/** Every product with at least one PAID sale dated within [from, to]. */
export function aggregatePaidSalesByProduct(db: Database, from: number, to: number): ProductSalesRow[] {
  const rows = db.query<{
    id: number;
    sku: string;
    name: string;
    category: string | null;
    cost_price: number;
    sale_price: number;
    current_stock: number;
    total_revenue: number;
    total_quantity: number;
    sales_count: number;
    avg_unit_price: number;
    avg_line_quantity: number;
  }>(
    `SELECT p.id, p.sku, p.name, p.category, p.cost_price, p.sale_price, p.current_stock,
            SUM(soi.quantity * soi.unit_price) AS total_revenue,
            SUM(soi.quantity) AS total_quantity,
            COUNT(DISTINCT so.id) AS sales_count,
            AVG(soi.unit_price) AS avg_unit_price,
            AVG(soi.quantity) AS avg_line_quantity
     FROM product p
     JOIN sale_order_item soi ON soi.product_id = p.id
     JOIN sale_order so ON soi.sale_order_id = so.id
     WHERE so.sale_date >= ? AND so.sale_date <= ? AND so.status = 'PAID'
     GROUP BY p.id
     ORDER BY p.id`,
    [from, to],
  );

  return rows.map((row) => ({
    productId: row.id,
    sku: row.sku,
    name: row.name,
    category: row.category,
    costPrice: row.cost_price,
    salePrice: row.sale_price,
    currentStock: row.current_stock,
    totalRevenue: row.total_revenue,
    totalQuantity: row.total_quantity,
    salesCount: row.sales_count,
    avgUnitPrice: row.avg_unit_price,
    avgLineQuantity: row.avg_line_quantity,
  }));
}
