// Table Validation
//
// Zod schemas for decoded coefficient and emissivity tables, plus the
// row schemas that turn raw CSV records into typed entries.
// Only the shape is checked here; overlapping subranges are legal.

import { z } from 'zod';
import type { CoefficientTable, CwvSubrange } from '../types/coefficients.js';
import type { EmissivityEntry, EmissivityTable } from '../types/emissivity.js';

// --- Entry schemas ---

const coefficient = z.number().finite();

export const CwvSubrangeSchema = z.object({
  key: z.string().trim().min(1),
  low: z.number().finite(),
  high: z.number().finite(),
  b0: coefficient,
  b1: coefficient,
  b2: coefficient,
  b3: coefficient,
  b4: coefficient,
  b5: coefficient,
  b6: coefficient,
  b7: coefficient,
  rmse: z.number().finite().nonnegative(),
});

/**
 * A single band emissivity, in (0, 1].
 */
export const EmissivitySchema = z.number().gt(0).lte(1);

export const EmissivityEntrySchema = z.object({
  landCover: z.string().trim().min(1),
  b10: EmissivitySchema,
  b11: EmissivitySchema,
});

// --- CSV row schemas ---

/**
 * A non-empty CSV field holding a finite number.
 */
const numericField = z.string().trim().min(1, 'Empty value').pipe(z.coerce.number().finite());

export const CoefficientCsvRowSchema = z
  .object({
    subrange: z.string().trim().min(1),
    low: numericField,
    high: numericField,
    b0: numericField,
    b1: numericField,
    b2: numericField,
    b3: numericField,
    b4: numericField,
    b5: numericField,
    b6: numericField,
    b7: numericField,
    rmse: numericField,
  })
  .transform(
    ({ subrange, ...rest }): CwvSubrange => ({
      key: subrange,
      ...rest,
    })
  );

export const EmissivityCsvRowSchema = z
  .object({
    land_cover: z.string().trim().min(1),
    b10: numericField.pipe(EmissivitySchema),
    b11: numericField.pipe(EmissivitySchema),
  })
  .transform(
    (row): EmissivityEntry => ({
      landCover: row.land_cover,
      b10: row.b10,
      b11: row.b11,
    })
  );

export const COEFFICIENT_CSV_COLUMNS = [
  'subrange',
  'low',
  'high',
  'b0',
  'b1',
  'b2',
  'b3',
  'b4',
  'b5',
  'b6',
  'b7',
  'rmse',
] as const;

export const EMISSIVITY_CSV_COLUMNS = ['land_cover', 'b10', 'b11'] as const;

// --- Table validation ---

/**
 * Validation error codes
 */
export type TableValidationErrorCode =
  | 'INVALID_TYPE'
  | 'INVALID_VALUE'
  | 'MISSING_FIELD'
  | 'DUPLICATE_KEY'
  | 'EMPTY_TABLE';

/**
 * A validation error (table cannot be used)
 */
export type TableValidationError = {
  path: string;
  message: string;
  code: TableValidationErrorCode;
};

/**
 * Result of validating a table. On success the parsed table is returned.
 */
export type TableValidationResult<T> =
  | { valid: true; table: T; errors: [] }
  | { valid: false; errors: TableValidationError[] };

/**
 * Render a zod issue path as "table[2].b4".
 */
export function formatIssuePath(root: string, path: ReadonlyArray<string | number>): string {
  return path.reduce<string>(
    (acc, segment) => (typeof segment === 'number' ? `${acc}[${segment}]` : `${acc}.${segment}`),
    root
  );
}

/**
 * Convert zod issues into table validation errors.
 */
export function toTableValidationErrors(root: string, error: z.ZodError): TableValidationError[] {
  return error.issues.map((issue) => ({
    path: formatIssuePath(root, issue.path),
    message: issue.message,
    code: issueCode(issue),
  }));
}

function issueCode(issue: z.ZodIssue): TableValidationErrorCode {
  if (issue.code === 'invalid_type') {
    return issue.received === 'undefined' ? 'MISSING_FIELD' : 'INVALID_TYPE';
  }
  return 'INVALID_VALUE';
}

function findDuplicates(keys: readonly string[]): string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const key of keys) {
    if (seen.has(key)) {
      duplicates.add(key);
    }
    seen.add(key);
  }
  return [...duplicates];
}

/**
 * Validate a decoded coefficient table.
 *
 * Checks each subrange's shape and that keys are unique. Subranges are
 * allowed to overlap; resolution decides what to do with several matches.
 */
export function validateCoefficientTable(table: unknown): TableValidationResult<CoefficientTable> {
  const parsed = z.array(CwvSubrangeSchema).safeParse(table);
  if (!parsed.success) {
    return { valid: false, errors: toTableValidationErrors('table', parsed.error) };
  }

  if (parsed.data.length === 0) {
    return {
      valid: false,
      errors: [{ path: 'table', message: 'Coefficient table has no subranges', code: 'EMPTY_TABLE' }],
    };
  }

  const duplicates = findDuplicates(parsed.data.map((s) => s.key));
  if (duplicates.length > 0) {
    return {
      valid: false,
      errors: duplicates.map((key) => ({
        path: 'table',
        message: `Duplicate subrange key: ${key}`,
        code: 'DUPLICATE_KEY' as const,
      })),
    };
  }

  return { valid: true, table: parsed.data, errors: [] };
}

/**
 * Validate a decoded emissivity table. Land cover labels must be unique.
 */
export function validateEmissivityTable(table: unknown): TableValidationResult<EmissivityTable> {
  const parsed = z.array(EmissivityEntrySchema).safeParse(table);
  if (!parsed.success) {
    return { valid: false, errors: toTableValidationErrors('table', parsed.error) };
  }

  if (parsed.data.length === 0) {
    return {
      valid: false,
      errors: [{ path: 'table', message: 'Emissivity table has no entries', code: 'EMPTY_TABLE' }],
    };
  }

  const duplicates = findDuplicates(parsed.data.map((e) => e.landCover));
  if (duplicates.length > 0) {
    return {
      valid: false,
      errors: duplicates.map((landCover) => ({
        path: 'table',
        message: `Duplicate land cover class: ${landCover}`,
        code: 'DUPLICATE_KEY' as const,
      })),
    };
  }

  return { valid: true, table: parsed.data, errors: [] };
}
