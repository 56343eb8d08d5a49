export { loadCatalog, parseCatalogYaml, defaultCatalogPath } from './loader.js';
export { buildSteps, renderCommand, resolveCommand, type BuildStepsOptions } from './build.js';
export { catalogSchema } from './types.js';
export type { Catalog, CatalogStep, CatalogCommand } from './types.js';
