/**
 * Rule catalog barrel export
 */

export * from './types.js';
export { normalizeText } from './normalize.js';
export {
  parseRuleCatalog,
  loadDefaultCatalog,
  loadCatalogFile,
  resolveCatalog,
  findRule,
} from './catalog-loader.js';
