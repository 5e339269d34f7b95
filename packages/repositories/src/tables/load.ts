// Table loaders - read CSV reference tables into providers
//
// Reading happens once, up front; the providers built from the result are
// synchronous and shared read-only by every estimator.

import {
  CoefficientCsvRowSchema,
  COEFFICIENT_CSV_COLUMNS,
  CsvParseError,
  EmissivityCsvRowSchema,
  EMISSIVITY_CSV_COLUMNS,
  missingColumns,
  parseCsv,
  toTableValidationErrors,
  type CoefficientTable,
  type CsvDocument,
  type CwvSubrange,
  type EmissivityEntry,
  type EmissivityTable,
} from '@thermalwin/protocol';
import type { CoefficientProvider, EmissivityProvider } from '../interfaces/index.js';
import {
  createInMemoryCoefficientProvider,
  createInMemoryEmissivityProvider,
} from '../in-memory/index.js';
import { TableLoadError, TableParseError } from '../errors.js';
import { createFilesystemReader } from './fs.js';
import { resolveTablePaths } from './config.js';
import type { TablePaths, TableReader } from './types.js';

/**
 * Read and split a CSV table, checking that the required columns exist.
 */
async function readCsvTable(
  reader: TableReader,
  path: string,
  columns: readonly string[]
): Promise<CsvDocument> {
  let content: string;
  try {
    content = await reader.readFile(path);
  } catch (error) {
    throw new TableLoadError(path, error instanceof Error ? error : undefined);
  }

  let doc: CsvDocument;
  try {
    doc = parseCsv(content);
  } catch (error) {
    if (error instanceof CsvParseError) {
      throw new TableParseError(path, error.line, error.reason);
    }
    throw error;
  }

  const missing = missingColumns(doc.header, columns);
  if (missing.length > 0) {
    throw new TableParseError(path, doc.headerLine, `missing columns: ${missing.join(', ')}`);
  }

  return doc;
}

/**
 * Load a coefficient table from CSV text.
 *
 * @param reader - Source of the file
 * @param path - Path of the CSV file
 * @returns Decoded subranges in file order
 * @throws TableLoadError if the file cannot be read
 * @throws TableParseError if a row is malformed
 */
export async function loadCoefficientTable(
  reader: TableReader,
  path: string
): Promise<CoefficientTable> {
  const doc = await readCsvTable(reader, path, COEFFICIENT_CSV_COLUMNS);
  const subranges: CwvSubrange[] = [];

  for (const record of doc.records) {
    const parsed = CoefficientCsvRowSchema.safeParse(record.fields);
    if (!parsed.success) {
      throw new TableParseError(path, record.line, describeRowErrors(parsed.error));
    }
    subranges.push(parsed.data);
  }

  return subranges;
}

/**
 * Load an emissivity table from CSV text.
 *
 * @throws TableLoadError if the file cannot be read
 * @throws TableParseError if a row is malformed
 */
export async function loadEmissivityTable(
  reader: TableReader,
  path: string
): Promise<EmissivityTable> {
  const doc = await readCsvTable(reader, path, EMISSIVITY_CSV_COLUMNS);
  const entries: EmissivityEntry[] = [];

  for (const record of doc.records) {
    const parsed = EmissivityCsvRowSchema.safeParse(record.fields);
    if (!parsed.success) {
      throw new TableParseError(path, record.line, describeRowErrors(parsed.error));
    }
    entries.push(parsed.data);
  }

  return entries;
}

function describeRowErrors(error: Parameters<typeof toTableValidationErrors>[1]): string {
  return toTableValidationErrors('row', error)
    .map((e) => `${e.path}: ${e.message}`)
    .join('; ');
}

/**
 * Options for loading the default providers
 */
export type LoadProvidersOptions = {
  /** Source of the files (defaults to the local filesystem) */
  reader?: TableReader;

  /** Explicit table locations (defaults to resolveTablePaths(env)) */
  paths?: TablePaths;

  /** Environment consulted for path overrides (defaults to process.env) */
  env?: Record<string, string | undefined>;
};

export type LoadedProviders = {
  coefficients: CoefficientProvider;
  emissivities: EmissivityProvider;
};

/**
 * Load both reference tables and wrap them in providers.
 *
 * @throws TableLoadError, TableParseError or InvalidTableError
 */
export async function loadDefaultProviders(
  options: LoadProvidersOptions = {}
): Promise<LoadedProviders> {
  const reader = options.reader ?? createFilesystemReader();
  const paths = options.paths ?? resolveTablePaths(options.env);

  const [coefficientTable, emissivityTable] = await Promise.all([
    loadCoefficientTable(reader, paths.coefficients),
    loadEmissivityTable(reader, paths.emissivities),
  ]);

  return {
    coefficients: createInMemoryCoefficientProvider(coefficientTable),
    emissivities: createInMemoryEmissivityProvider(emissivityTable),
  };
}
