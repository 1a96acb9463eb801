/**
 * Feature Audit Core
 *
 * @module core
 */

export * from './types.js';
export * from './errors.js';
export {
  MISSING_VALUE_TOKENS,
  parseDelimitedText,
  readDelimitedFile,
  type Cell,
  type DelimitedTable,
} from './table-reader.js';
export {
  CRITICAL_LABEL,
  REFERENCE_COLUMNS,
  collectCriticalFeatures,
  extractCriticalFeatures,
} from './feature-extractor.js';
export { DATA_FILE_EXTENSION, scanCatalog } from './catalog-scanner.js';
export { matchFeatureExistence } from './existence-matcher.js';
export { calculateCoverage, measureColumn } from './coverage-calculator.js';
export {
  DEFAULT_COVERAGE_THRESHOLD,
  REPORT_FILE_NAMES,
  formatSummary,
  renderReports,
  summarizeAudit,
  writeReports,
  type ReportFile,
  type ReportName,
  type ReportWriteResult,
} from './report-emitter.js';
export { FeatureAuditService, type FeatureAuditOptions } from './feature-audit-service.js';
export type { Logger, LogLevel, LogMetadata } from './utils/logger.js';
