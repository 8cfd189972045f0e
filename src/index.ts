/**
 * stock-insight - inventory analytics over a stock movement ledger
 *
 * Library entry point. The CLI lives in ./cli.
 */

export * from './types.js';
export { DataAccessError, LedgerWriteError, InvalidParameterError, errorMessage } from './infra/errors.js';
export { loadConfig, defaultAnalysisSettings, type Config, type AnalysisDefaults } from './utils/config.js';
export { createLogger, type Logger } from './utils/logger.js';

// Store
export { createDatabase, MEMORY_PATH, type Database, type CreateDatabaseOptions } from './db/index.js';
export { createMigrationRunner, getMigrations, type Migration, type MigrationRunner } from './db/migrations.js';

// Ledger
export {
  getProduct,
  getProductBySku,
  listProducts,
  getSupplier,
  listSuppliers,
  getPurchaseOrder,
  getSaleOrder,
  getMovements,
  sumPaidSales,
} from './ledger/index.js';
export {
  createProduct,
  createSupplier,
  createPurchaseOrder,
  receivePurchaseOrder,
  cancelPurchaseOrder,
  recordSale,
  markSalePaid,
  cancelSale,
  recordAdjustment,
  recordLoss,
  recordReturn,
  type CreateProductInput,
  type CreateSupplierInput,
  type CreatePurchaseOrderInput,
  type RecordSaleInput,
} from './ledger/writer.js';

// Analytics
export { estimateDailyDemand, type DemandEstimate, type DemandOptions } from './analytics/demand.js';
export { detectStockRupture, analyzeSlowMovingStock, detectLowStockHighDemand } from './analytics/stock-health.js';
export { detectAvailabilityIssues, detectOperationalAvailabilityIssues } from './analytics/availability.js';
export { detectImminentStockoutRisk, getPendingOrderSummary } from './analytics/stockout-risk.js';
export { getAbcAnalysis } from './analytics/abc.js';
export { calculateProfitability, getProfitabilitySummary } from './analytics/profitability.js';
export { analyzePurchaseToSaleTime, getInventoryAgeDistribution } from './analytics/turnover.js';
export { getTopSellingProducts, getSalesByCategory } from './analytics/sales.js';
export * from './analytics/stock-health-types.js';
export * from './analytics/availability-types.js';
export * from './analytics/stockout-risk-types.js';
export * from './analytics/classification-types.js';

// Purchasing, integrity, suppliers, alerts
export { suggestPurchaseOrders, groupSuggestionsBySupplier } from './purchasing/suggestions.js';
export * from './purchasing/suggestions-types.js';
export { detectStockLosses, getExplicitLosses } from './integrity/losses.js';
export * from './integrity/losses-types.js';
export { analyzeSupplierPerformance } from './suppliers/performance.js';
export * from './suppliers/performance-types.js';
export { getStockAlerts, defaultDetectors } from './alerts/alerts.js';
export * from './alerts/alerts-types.js';

// Tools
export { executeTool, listTools, createToolCatalog } from './agents/index.js';
export { ToolRegistry, type RegistryTool, type ToolMetadata } from './agents/tool-registry.js';
export type { ToolInput, ToolError } from './agents/tool-input.js';
