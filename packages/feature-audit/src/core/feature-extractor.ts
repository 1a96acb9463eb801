/**
 * Critical Feature Extractor
 *
 * Reads the reference table and keeps the rows classified as Critical.
 * Columns are addressed by position: the reference sheet has no stable
 * header names.
 *
 * @module core/feature-extractor
 */

import { ReferenceTableError } from './errors.js';
import { readDelimitedFile, type Cell } from './table-reader.js';
import type { CriticalFeatureSet } from './types.js';
import { describeError, logger as defaultLogger, type Logger } from './utils/logger.js';

/**
 * Positional layout of the reference table
 */
export const REFERENCE_COLUMNS = {
  rawName: 0,
  classification: 3,
  canonicalName: 10,
} as const;

export const CRITICAL_LABEL = 'Critical';

const MIN_REFERENCE_COLUMNS = REFERENCE_COLUMNS.canonicalName + 1;

export function emptyFeatureSet(): CriticalFeatureSet {
  return { rawFeatures: [], mappedFeatures: [], mapping: new Map() };
}

const NUMERIC_LITERAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const BOOLEAN_LITERALS: ReadonlySet<string> = new Set([
  'True',
  'False',
  'TRUE',
  'FALSE',
  'true',
  'false',
]);

function isPresent(cell: Cell | undefined): cell is string {
  return typeof cell === 'string' && cell.trim().length > 0;
}

/**
 * Whether every value in a column reads as a number, or every value as a
 * boolean
 *
 * Such a column holds no feature names: its cells count as absent. An
 * all-missing column is not typed.
 */
export function isTypedColumn(rows: readonly (readonly Cell[])[], column: number): boolean {
  const values: string[] = [];
  for (const row of rows) {
    const cell = row[column];
    if (typeof cell === 'string') values.push(cell.trim());
  }
  if (values.length === 0) return false;
  return (
    values.every((value) => NUMERIC_LITERAL.test(value)) ||
    values.every((value) => BOOLEAN_LITERALS.has(value))
  );
}

/**
 * Build the feature set from already-loaded reference rows
 */
export function collectCriticalFeatures(
  rows: readonly (readonly Cell[])[]
): CriticalFeatureSet {
  const rawFeatures: string[] = [];
  const mapping = new Map<string, string>();
  const rawNamesTyped = isTypedColumn(rows, REFERENCE_COLUMNS.rawName);
  const overridesTyped = isTypedColumn(rows, REFERENCE_COLUMNS.canonicalName);

  for (const row of rows) {
    if (row[REFERENCE_COLUMNS.classification] !== CRITICAL_LABEL) continue;

    const rawName = rawNamesTyped ? null : row[REFERENCE_COLUMNS.rawName];
    if (!isPresent(rawName)) continue;

    const override = overridesTyped ? null : row[REFERENCE_COLUMNS.canonicalName];
    rawFeatures.push(rawName);
    // Later rows win, first occurrence keeps its position
    mapping.set(rawName, isPresent(override) ? override : rawName);
  }

  const mappedFeatures = [...new Set(mapping.values())];
  return { rawFeatures, mappedFeatures, mapping };
}

/**
 * Extract critical features from the reference CSV
 *
 * Never throws: read or layout failures are logged and yield an empty set.
 */
export async function extractCriticalFeatures(
  referencePath: string,
  log: Logger = defaultLogger
): Promise<CriticalFeatureSet> {
  log.info(`Extracting critical features from ${referencePath}...`);

  try {
    const table = await readDelimitedFile(referencePath, ',');
    if (table.columns.length < MIN_REFERENCE_COLUMNS) {
      throw new ReferenceTableError(
        `Reference table has ${table.columns.length} columns, expected at least ${MIN_REFERENCE_COLUMNS}`,
        referencePath
      );
    }

    const features = collectCriticalFeatures(table.rows);
    log.info(
      `Successfully extracted ${features.rawFeatures.length} original critical features`
    );
    log.info(
      `Successfully mapped to ${features.mappedFeatures.length} unique critical features`
    );
    return features;
  } catch (error) {
    log.error('Error extracting critical features', {
      path: referencePath,
      error: describeError(error),
    });
    return emptyFeatureSet();
  }
}
