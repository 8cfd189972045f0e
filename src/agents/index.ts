/**
 * Tool Dispatch
 *
 * Registers every area's tool definitions and routes a call by name to the
 * handler that owns it. Chat, CLI and dashboard callers all go through
 * `executeTool`, so they see the same `{ success, ... }` / `{ error }` shapes.
 */

import { createLogger } from '../utils/logger.js';
import type { Database } from '../db/index.js';
import { ToolRegistry, type RegistryTool } from './tool-registry.js';
import { optionalInteger, optionalString, withParameterErrors, type ToolInput } from './tool-input.js';
import { stockTools, handleStockTool } from '../analytics/stock-index.js';
import { classificationTools, handleClassificationTool } from '../analytics/classification-index.js';
import { purchasingTools, handlePurchasingTool } from '../purchasing/suggestions-index.js';
import { lossTools, handleLossTool } from '../integrity/losses-index.js';
import { supplierTools, handleSupplierTool } from '../suppliers/performance-index.js';
import { alertTools, handleAlertTool } from '../alerts/alerts-index.js';

const logger = createLogger('agents');

type ToolHandler = (toolName: string, input: ToolInput, db: Database) => unknown;

interface ToolGroup {
  category: string;
  tools: readonly RegistryTool[];
  handle: ToolHandler;
}

// =============================================================================
// META TOOL
// =============================================================================

const metaTools = [
  {
    name: 'tool_search',
    description: 'Find analytics tools by keyword or category',
    input_schema: {
      type: 'object' as const,
      properties: {
        query: { type: 'string' as const, description: 'Keywords matched against tool names and descriptions' },
        category: {
          type: 'string' as const,
          description: 'stock, classification, purchasing, integrity, suppliers or alerts',
        },
        limit: { type: 'number' as const, description: 'Maximum results (default: 20)' },
      },
    },
  },
];

function searchTools(registry: ToolRegistry, input: ToolInput): unknown {
  return withParameterErrors(() => {
    const query = optionalString(input, 'query');
    const category = optionalString(input, 'category');
    const limit = optionalInteger(input, 'limit') ?? 20;

    let results: RegistryTool[];
    if (query) {
      const wanted = category?.toLowerCase();
      results = registry
        .searchByText(query)
        .filter((t) => wanted === undefined || registry.metadata(t.name)?.category === wanted);
    } else {
      results = category ? registry.searchByCategory(category) : registry.list();
    }

    return {
      success: true,
      total: results.length,
      tools: results.slice(0, Math.max(limit, 0)).map((t) => ({
        name: t.name,
        description: t.description,
        category: registry.metadata(t.name)?.category ?? 'general',
      })),
    };
  });
}

// =============================================================================
// REGISTRY
// =============================================================================

const TOOL_GROUPS: readonly ToolGroup[] = [
  { category: 'stock', tools: stockTools, handle: handleStockTool },
  { category: 'classification', tools: classificationTools, handle: handleClassificationTool },
  { category: 'purchasing', tools: purchasingTools, handle: handlePurchasingTool },
  { category: 'integrity', tools: lossTools, handle: handleLossTool },
  { category: 'suppliers', tools: supplierTools, handle: handleSupplierTool },
  { category: 'alerts', tools: alertTools, handle: handleAlertTool },
];

export interface ToolCatalog {
  registry: ToolRegistry;
  handlers: Map<string, ToolHandler>;
}

export function createToolCatalog(): ToolCatalog {
  const registry = new ToolRegistry();
  const handlers = new Map<string, ToolHandler>();

  for (const group of TOOL_GROUPS) {
    registry.registerAll(group.tools, group.category);
    for (const tool of group.tools) {
      handlers.set(tool.name, group.handle);
    }
  }
  registry.registerAll(metaTools, 'meta');
  handlers.set('tool_search', (_name, input) => searchTools(registry, input));

  logger.debug({ total: registry.size(), categories: registry.getAvailableCategories() }, 'Tool registry initialized');
  return { registry, handlers };
}

let defaultCatalog: ToolCatalog | undefined;

function catalog(): ToolCatalog {
  defaultCatalog ??= createToolCatalog();
  return defaultCatalog;
}

/** Every tool definition, meta tool included. */
export function listTools(): RegistryTool[] {
  return catalog().registry.list();
}

/**
 * Runs a tool by name. Parameter problems come back as `{ error }`; store
 * failures are logged and rethrown.
 */
export function executeTool(toolName: string, input: ToolInput, db: Database): unknown {
  const handler = catalog().handlers.get(toolName);
  if (!handler) {
    return { error: `Unknown tool: ${toolName}` };
  }

  logger.debug({ tool: toolName }, 'Executing tool');
  try {
    return handler(toolName, input, db);
  } catch (err) {
    logger.error({ tool: toolName, err }, 'Tool execution error');
    throw err;
  }
}

export { ToolRegistry, inferToolMetadata } from './tool-registry.js';
export type { RegistryTool, ToolMetadata } from './tool-registry.js';
export type { ToolInput, ToolError } from './tool-input.js';
