// Table path configuration
//
// The bundled CSV files ship in the package's data/ directory. Either path
// can be overridden through the environment.

import { fileURLToPath } from 'node:url';
import type { TablePaths } from './types.js';

export const CWV_COEFFICIENTS_ENV = 'THERMALWIN_CWV_COEFFICIENTS';
export const EMISSIVITIES_ENV = 'THERMALWIN_EMISSIVITIES';

export const DEFAULT_TABLE_PATHS: TablePaths = {
  coefficients: fileURLToPath(new URL('../../data/cwv-coefficients.csv', import.meta.url)),
  emissivities: fileURLToPath(new URL('../../data/emissivities.csv', import.meta.url)),
};

/**
 * Resolve table locations, preferring non-empty environment overrides.
 */
export function resolveTablePaths(
  env: Record<string, string | undefined> = process.env
): TablePaths {
  return {
    coefficients: env[CWV_COEFFICIENTS_ENV] || DEFAULT_TABLE_PATHS.coefficients,
    emissivities: env[EMISSIVITIES_ENV] || DEFAULT_TABLE_PATHS.emissivities,
  };
}
