// src/i18n/index.ts

export type { PluralOptions, Translator } from './types.js';
export { MessageCatalog } from './message-catalog.js';
export {
  applyCatalog,
  BUILTIN_CATALOG_PATH,
  catalogSchema,
  loadBuiltinCatalog,
  loadCatalogFile,
  parseCatalog,
} from './catalog-loader.js';
export type { Catalog } from './catalog-loader.js';
