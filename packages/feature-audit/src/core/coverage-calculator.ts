/**
 * Coverage Calculator
 *
 * Loads each catalogued data file and measures, per column, the share of
 * rows holding a value.
 *
 * @module core/coverage-calculator
 */

import { join } from 'node:path';
import { columnIndex, readDelimitedFile, type DelimitedTable } from './table-reader.js';
import type {
  Catalog,
  CoverageEntry,
  CoverageResult,
  CriticalCoverageEntry,
} from './types.js';
import { describeError, logger as defaultLogger, type Logger } from './utils/logger.js';

export interface ColumnCoverage {
  readonly coverage: number;
  readonly nonMissingCount: number;
  readonly totalCount: number;
}

/**
 * Coverage of one column, or null when the table has no such column
 *
 * A repeated column name resolves to its first occurrence.
 */
export function measureColumn(table: DelimitedTable, column: string): ColumnCoverage | null {
  const index = columnIndex(table, column);
  if (index === -1) return null;

  const totalCount = table.rows.length;
  let nonMissingCount = 0;
  for (const row of table.rows) {
    if (row[index] !== null) nonMissingCount += 1;
  }

  return {
    coverage: totalCount > 0 ? nonMissingCount / totalCount : 0,
    nonMissingCount,
    totalCount,
  };
}

/**
 * Compute coverage for every catalog column of every data file
 *
 * Files that fail to load are logged and skipped.
 */
export async function calculateCoverage(
  dataDir: string,
  catalog: Catalog,
  mappedFeatures: readonly string[],
  log: Logger = defaultLogger
): Promise<CoverageResult> {
  log.info('Calculating feature coverage...');

  const critical = new Set(mappedFeatures);
  const coverage = new Map<string, Map<string, CoverageEntry>>();
  const criticalCoverage = new Map<string, Map<string, CriticalCoverageEntry>>();

  for (const [fileName, columns] of catalog) {
    let table: DelimitedTable;
    try {
      table = await readDelimitedFile(join(dataDir, fileName), '\t');
    } catch (error) {
      log.error(`Error calculating coverage for file ${fileName}`, {
        error: describeError(error),
      });
      continue;
    }

    for (const column of columns) {
      let byFile = coverage.get(column);
      if (!byFile) {
        byFile = new Map();
        coverage.set(column, byFile);
      }

      const measured = measureColumn(table, column);
      if (!measured) continue;

      const isCritical = critical.has(column);
      byFile.set(fileName, { coverage: measured.coverage, isCritical });

      if (isCritical) {
        let criticalByFile = criticalCoverage.get(column);
        if (!criticalByFile) {
          criticalByFile = new Map();
          criticalCoverage.set(column, criticalByFile);
        }
        criticalByFile.set(fileName, measured);
      }
    }
  }

  log.info('Feature coverage calculation completed');
  return { coverage, criticalCoverage };
}
