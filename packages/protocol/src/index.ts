// @thermalwin/protocol
// Shared types, schemas and table helpers for split-window LST estimation

export * from './types/index.js';

export {
  CwvSubrangeSchema,
  EmissivitySchema,
  EmissivityEntrySchema,
  CoefficientCsvRowSchema,
  EmissivityCsvRowSchema,
  COEFFICIENT_CSV_COLUMNS,
  EMISSIVITY_CSV_COLUMNS,
  validateCoefficientTable,
  validateEmissivityTable,
  formatIssuePath,
  toTableValidationErrors,
  type TableValidationError,
  type TableValidationErrorCode,
  type TableValidationResult,
} from './validation/tables.js';

export {
  parseCsv,
  missingColumns,
  CsvParseError,
  type CsvDocument,
  type CsvRecord,
} from './tables/csv.js';
