/**
 * Delimited Table Reader
 *
 * Loads a whole CSV or TSV file into memory: first row is the header,
 * blank lines are skipped and short rows are padded with missing cells.
 * A row with more fields than the header rejects the file. Cells matching
 * a missing-value token are stored as null.
 *
 * @module core/table-reader
 */

import { readFile } from 'node:fs/promises';
import Papa from 'papaparse';
import { TableLoadError } from './errors.js';

/**
 * Cell spellings read as a missing value (exact match, case-sensitive)
 */
export const MISSING_VALUE_TOKENS: ReadonlySet<string> = new Set([
  '',
  '#N/A',
  '#N/A N/A',
  '#NA',
  '-1.#IND',
  '-1.#QNAN',
  '-NaN',
  '-nan',
  '1.#IND',
  '1.#QNAN',
  '<NA>',
  'N/A',
  'NA',
  'NULL',
  'NaN',
  'None',
  'n/a',
  'nan',
  'null',
]);

export type Cell = string | null;

export interface DelimitedTable {
  /** Header names as written; duplicates are kept */
  readonly columns: readonly string[];
  /** One entry per data row, each exactly `columns.length` cells long */
  readonly rows: readonly (readonly Cell[])[];
}

export function toCell(value: string | undefined): Cell {
  if (value === undefined || MISSING_VALUE_TOKENS.has(value)) {
    return null;
  }
  return value;
}

/**
 * Position of the first column with the given name, or -1
 *
 * An empty header cell names no column.
 */
export function columnIndex(table: DelimitedTable, name: string): number {
  if (name === '') return -1;
  return table.columns.indexOf(name);
}

/**
 * Parse delimited text into a table
 *
 * @throws TableLoadError when the text has no header row, a quoted
 *   field is never closed or a row is wider than the header
 */
export function parseDelimitedText(
  text: string,
  delimiter: string,
  source = '<text>'
): DelimitedTable {
  const parsed = Papa.parse<string[]>(text, {
    delimiter,
    header: false,
    skipEmptyLines: true,
  });

  const quoteError = parsed.errors.find((error) => error.type === 'Quotes');
  if (quoteError) {
    throw new TableLoadError(
      `Malformed quoting at row ${quoteError.row ?? '?'}: ${quoteError.message}`,
      source
    );
  }

  const [header, ...body] = parsed.data;
  if (!header) {
    throw new TableLoadError('No columns to parse from file', source);
  }

  const rows = body.map((fields, index) => {
    if (fields.length > header.length) {
      // Records are counted from 1, header included; blank lines are not counted
      throw new TableLoadError(
        `Expected ${header.length} fields in record ${index + 2}, saw ${fields.length}`,
        source
      );
    }
    return header.map((_, column) => toCell(fields[column]));
  });

  return { columns: header, rows };
}

/**
 * Read a UTF-8 delimited file into a table
 *
 * @throws TableLoadError on parse failures; fs errors propagate unchanged
 */
export async function readDelimitedFile(
  filePath: string,
  delimiter: string
): Promise<DelimitedTable> {
  const bytes = await readFile(filePath);
  let text: string;
  try {
    // fatal: reject invalid UTF-8 instead of substituting U+FFFD
    text = new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  } catch (error) {
    throw new TableLoadError(
      `File is not valid UTF-8: ${error instanceof Error ? error.message : String(error)}`,
      filePath
    );
  }
  return parseDelimitedText(text, delimiter, filePath);
}
