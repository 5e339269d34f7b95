// In-memory provider implementations
//
// Providers are built from already-decoded tables: synthetic ones in tests,
// or the result of the CSV loaders. Tables are validated and frozen on
// construction, so every estimator sharing a provider sees the same data.

import {
  toBounds,
  validateCoefficientTable,
  validateEmissivityTable,
  type CoefficientTable,
  type CwvSubrange,
  type EmissivityEntry,
  type EmissivityPair,
  type EmissivityTable,
} from '@thermalwin/protocol';
import type { CoefficientProvider, EmissivityProvider } from '../interfaces/index.js';
import { InvalidTableError } from '../errors.js';

/**
 * Create a coefficient provider over a decoded table.
 *
 * @throws InvalidTableError if the table fails validation
 */
export function createInMemoryCoefficientProvider(table: unknown): CoefficientProvider {
  const result = validateCoefficientTable(table);
  if (!result.valid) {
    throw new InvalidTableError('coefficient', result.errors);
  }

  const subranges: CoefficientTable = Object.freeze(result.table.map((s) => Object.freeze({ ...s })));
  const byKey = new Map<string, CwvSubrange>(subranges.map((s) => [s.key, s]));

  return {
    getColumnWaterVapourTable(): CoefficientTable {
      return subranges;
    },

    getSubrange(key: string): CwvSubrange | null {
      return byKey.get(key) ?? null;
    },

    listSubranges() {
      return subranges.map(toBounds);
    },
  };
}

/**
 * Create an emissivity provider over a decoded table.
 *
 * @throws InvalidTableError if the table fails validation
 */
export function createInMemoryEmissivityProvider(table: unknown): EmissivityProvider {
  const result = validateEmissivityTable(table);
  if (!result.valid) {
    throw new InvalidTableError('emissivity', result.errors);
  }

  const entries: EmissivityTable = Object.freeze(result.table.map((e) => Object.freeze({ ...e })));
  const byClass = new Map<string, EmissivityEntry>(entries.map((e) => [e.landCover, e]));

  return {
    getEmissivities(landCover: string): EmissivityPair | null {
      const entry = byClass.get(landCover);
      if (!entry) {
        return null;
      }
      return { b10: entry.b10, b11: entry.b11 };
    },

    listLandCoverClasses() {
      return entries.map((e) => e.landCover);
    },
  };
}
