export { loadCatalog } from './loader.js';
export { CatalogError, isCatalogError } from './errors.js';
export type { CatalogErrorCode } from './errors.js';
export { CATALOG_FILES } from './schema.js';
export type { NameAvailabilityFile } from './schema.js';
