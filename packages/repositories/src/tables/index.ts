// Reference table loading
// CSV sources, filesystem access and path configuration.

export type { TableReader, TablePaths } from './types.js';
export { createFilesystemReader, createInMemoryReader } from './fs.js';
export {
  resolveTablePaths,
  DEFAULT_TABLE_PATHS,
  CWV_COEFFICIENTS_ENV,
  EMISSIVITIES_ENV,
} from './config.js';
export {
  loadCoefficientTable,
  loadEmissivityTable,
  loadDefaultProviders,
  type LoadProvidersOptions,
  type LoadedProviders,
} from './load.js';
