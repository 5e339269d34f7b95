// CSV helpers
// Used for the bundled coefficient and emissivity tables.
//
// The format is deliberately small: comma separated, no quoting, first
// non-empty line is the header, "#" starts a comment line.

/**
 * Error raised when CSV text cannot be split into records
 */
export class CsvParseError extends Error {
  readonly line: number;
  readonly reason: string;

  constructor(line: number, reason: string) {
    super(`Failed to parse CSV at line ${line}: ${reason}`);
    this.name = 'CsvParseError';
    this.line = line;
    this.reason = reason;
  }
}

/**
 * One data row, keyed by header column
 */
export type CsvRecord = {
  /** 1-based line number in the source text */
  line: number;
  fields: Record<string, string>;
};

export type CsvDocument = {
  header: string[];
  /** 1-based line number of the header row */
  headerLine: number;
  records: CsvRecord[];
};

function splitFields(line: string): string[] {
  return line.split(',').map((field) => field.trim());
}

/**
 * Parse CSV text into a header and keyed records.
 *
 * @throws CsvParseError if the header is missing, repeats a column, or a row
 *   has a different number of fields than the header
 */
export function parseCsv(content: string): CsvDocument {
  const lines = content.split(/\r?\n/);
  let header: string[] | undefined;
  let headerLine = 0;
  const records: CsvRecord[] = [];

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    if (!line || line.startsWith('#')) continue;

    const fields = splitFields(line);

    if (!header) {
      const duplicate = fields.find((name, index) => fields.indexOf(name) !== index);
      if (duplicate !== undefined) {
        throw new CsvParseError(i + 1, `duplicate column "${duplicate}"`);
      }
      if (fields.some((name) => name === '')) {
        throw new CsvParseError(i + 1, 'empty column name');
      }
      header = fields;
      headerLine = i + 1;
      continue;
    }

    if (fields.length !== header.length) {
      throw new CsvParseError(
        i + 1,
        `expected ${header.length} fields but found ${fields.length}`
      );
    }

    const record: Record<string, string> = {};
    header.forEach((name, index) => {
      record[name] = fields[index];
    });
    records.push({ line: i + 1, fields: record });
  }

  if (!header) {
    throw new CsvParseError(lines.length, 'missing header row');
  }

  return { header, headerLine, records };
}

/**
 * Check that every required column is present in a header.
 *
 * @returns the missing column names, in the order given
 */
export function missingColumns(header: readonly string[], required: readonly string[]): string[] {
  return required.filter((column) => !header.includes(column));
}
