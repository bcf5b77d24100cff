// ============================================================================
// @mxqlint/catalog - Public API
// ============================================================================

export { CategoryCatalog, DEFAULT_LANGUAGE, INDEX_FILE, languageOf, productOf } from './catalog.js';
export type { SearchResult } from './catalog.js';
export {
  categoryIndexSchema,
  categoryMetaSchema,
  fieldMetaSchema,
  tagMetaSchema,
} from './schema.js';
export type { CategoryIndex, CategoryIndexEntry, CategoryMeta } from './schema.js';
