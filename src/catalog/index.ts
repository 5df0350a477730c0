/**
 * @fileoverview Catalog module public exports.
 *
 * @module campus-guide/catalog
 */

export {
  SqliteCatalogStore,
  seedCatalog,
  extractKeywords,
  CATALOG_SCHEMA_URL,
  CATALOG_TABLES,
  DEFAULT_MAX_RESULTS,
  type CatalogStoreOptions,
  type CatalogTable,
  type SeedSummary,
} from './catalog-store.js';
export {
  CatalogDataSchema,
  DEFAULT_CATALOG_DATA_PATH,
  loadCatalogData,
  parseCatalogData,
  type CatalogData,
  type CourseEntry,
  type DeadlineEntry,
  type FaqEntry,
  type ProgramEntry,
  type ResourceEntry,
} from './catalog-data.js';
export { extractCourseCode } from './course-code.js';
