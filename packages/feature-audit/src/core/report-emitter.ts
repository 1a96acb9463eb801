/**
 * Report Emitter
 *
 * Serializes an audit result into six flat CSV reports and renders the
 * console summary.
 *
 * @module core/report-emitter
 */

import { join } from 'node:path';
import type { AuditResult, AuditSummary } from './types.js';
import { atomicWriteFile } from './utils/atomic-write.js';
import { formatCsv, formatPercent, type CsvValue } from './utils/csv.js';
import { describeError, logger as defaultLogger, type Logger } from './utils/logger.js';

// ============================================================================
// Types
// ============================================================================

export const REPORT_FILE_NAMES = {
  criticalFeatures: 'critical_features.csv',
  nodesFeatures: 'nodes_features.csv',
  featureExistence: 'feature_existence.csv',
  featureCoverage: 'feature_coverage.csv',
  missingCriticalFeatures: 'missing_critical_features.csv',
  criticalFeaturesCoverage: 'critical_features_coverage.csv',
} as const;

export type ReportName = keyof typeof REPORT_FILE_NAMES;

export interface ReportFile {
  readonly name: ReportName;
  readonly fileName: string;
  readonly content: string;
}

export interface ReportWriteResult {
  readonly written: readonly string[];
  readonly failed: readonly string[];
}

export const DEFAULT_COVERAGE_THRESHOLD = 0.8;

const SUMMARY_RULE = '='.repeat(80);

// ============================================================================
// Report Rendering
// ============================================================================

function* criticalFeatureRows(result: AuditResult): Generator<CsvValue[]> {
  for (const [raw, mapped] of result.features.mapping) {
    yield [raw, mapped];
  }
}

function* catalogRows(result: AuditResult): Generator<CsvValue[]> {
  for (const [fileName, columns] of result.catalog) {
    for (const column of columns) {
      yield [fileName, column];
    }
  }
}

function* existenceRows(result: AuditResult): Generator<CsvValue[]> {
  for (const [feature, record] of result.existence.records) {
    yield [feature, record.exists ? 'y' : 'n', record.files.join(', ')];
  }
}

function* coverageRows(result: AuditResult): Generator<CsvValue[]> {
  for (const [feature, byFile] of result.coverage.coverage) {
    for (const [fileName, entry] of byFile) {
      yield [feature, fileName, formatPercent(entry.coverage), entry.isCritical ? 'Yes' : 'No'];
    }
  }
}

function* missingRows(result: AuditResult): Generator<CsvValue[]> {
  for (const feature of result.existence.missing) {
    yield [feature];
  }
}

function* criticalCoverageRows(result: AuditResult): Generator<CsvValue[]> {
  for (const [feature, byFile] of result.coverage.criticalCoverage) {
    for (const [fileName, entry] of byFile) {
      yield [
        feature,
        fileName,
        formatPercent(entry.coverage),
        entry.nonMissingCount,
        entry.totalCount,
      ];
    }
  }
}

/**
 * Render every report in memory, in write order
 */
export function renderReports(result: AuditResult): ReportFile[] {
  const report = (
    name: ReportName,
    header: readonly string[],
    rows: Iterable<readonly CsvValue[]>
  ): ReportFile => ({
    name,
    fileName: REPORT_FILE_NAMES[name],
    content: formatCsv(header, rows),
  });

  return [
    report(
      'criticalFeatures',
      ['Original Feature Name', 'Mapped Feature Name'],
      criticalFeatureRows(result)
    ),
    report('nodesFeatures', ['File Name', 'Feature Name'], catalogRows(result)),
    report('featureExistence', ['Feature Name', 'Exists', 'Files'], existenceRows(result)),
    report(
      'featureCoverage',
      ['Feature Name', 'File Name', 'Coverage', 'Is Critical Feature'],
      coverageRows(result)
    ),
    report('missingCriticalFeatures', ['Missing Critical Feature'], missingRows(result)),
    report(
      'criticalFeaturesCoverage',
      ['Critical Feature', 'File Name', 'Coverage', 'Non-Null Count', 'Total Count'],
      criticalCoverageRows(result)
    ),
  ];
}

/**
 * Write every report into `outputDir`
 *
 * A failed report is logged and the remaining ones are still written.
 */
export async function writeReports(
  result: AuditResult,
  outputDir: string,
  log: Logger = defaultLogger
): Promise<ReportWriteResult> {
  log.info('Generating analysis reports...');
  const written: string[] = [];
  const failed: string[] = [];

  for (const file of renderReports(result)) {
    const filePath = join(outputDir, file.fileName);
    try {
      await atomicWriteFile(filePath, file.content);
      written.push(filePath);
      log.debug(`Wrote ${file.fileName}`);
    } catch (error) {
      failed.push(filePath);
      log.error(`Error writing report ${file.fileName}`, {
        path: filePath,
        error: describeError(error),
      });
    }
  }

  log.info(`Analysis reports generated in ${outputDir}`, {
    written: written.length,
    failed: failed.length,
  });
  return { written, failed };
}

// ============================================================================
// Summary
// ============================================================================

/**
 * Count the figures shown in the console summary
 *
 * A critical feature meets the threshold when its mean coverage over the
 * files containing it is at least `threshold`.
 */
export function summarizeAudit(
  result: AuditResult,
  threshold: number = DEFAULT_COVERAGE_THRESHOLD
): AuditSummary {
  let featuresMeetingThreshold = 0;
  for (const byFile of result.coverage.criticalCoverage.values()) {
    let total = 0;
    for (const entry of byFile.values()) {
      total += entry.coverage;
    }
    const average = byFile.size > 0 ? total / byFile.size : 0;
    if (average >= threshold) featuresMeetingThreshold += 1;
  }

  const distinctColumns = new Set<string>();
  for (const columns of result.catalog.values()) {
    for (const column of columns) distinctColumns.add(column);
  }

  return {
    rawFeatureCount: result.features.rawFeatures.length,
    mappedFeatureCount: result.features.mappedFeatures.length,
    distinctColumnCount: distinctColumns.size,
    missingFeatureCount: result.existence.missing.length,
    existingFeatureCount: result.existence.existing.length,
    threshold,
    featuresMeetingThreshold,
  };
}

/**
 * Render the fixed-format console summary
 */
export function formatSummary(summary: AuditSummary): string {
  return [
    '',
    SUMMARY_RULE,
    'DATA FEATURE ANALYSIS SUMMARY',
    SUMMARY_RULE,
    `1. Original critical features extracted: ${summary.rawFeatureCount}`,
    `2. Unique mapped critical features: ${summary.mappedFeatureCount}`,
    `3. Total features in data files: ${summary.distinctColumnCount}`,
    `4. Critical features missing from data: ${summary.missingFeatureCount}`,
    `5. Critical features present in data: ${summary.existingFeatureCount}`,
    `6. Critical features with coverage >= ${formatPercent(summary.threshold)}: ${summary.featuresMeetingThreshold}`,
    SUMMARY_RULE,
    '',
  ].join('\n');
}
