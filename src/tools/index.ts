/**
 * @fileoverview Tools module public exports.
 *
 * @module campus-guide/tools
 */

export {
  ToolRegistry,
  DEFAULT_REGISTRY_CONFIG,
  type ToolRegistryConfig,
  type ToolRegistryEvents,
} from './tool-registry.js';
export { createDatabaseQueryTool, notFoundMessage } from './database-query.js';
export { createWebSearchTool } from './web-search.js';
