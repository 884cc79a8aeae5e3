/**
 * Querywise - Schema Catalog Module
 */

export { SchemaCatalog, cosineSimilarity, keywordSearch, significantTokens } from './catalog.js';
export { CatalogSnapshot, renderEntry, renderSchema } from './snapshot.js';
export { loadCatalogFile } from './loader.js';

export type {
  CatalogStats,
  ColumnEntry,
  DatabaseInfo,
  ReloadResult,
  RetrievalResult,
  RetrievalStrategy,
  SchemaEntry,
} from './types.js';
