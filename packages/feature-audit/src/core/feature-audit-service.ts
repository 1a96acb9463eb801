/**
 * FeatureAuditService - Entry point for a coverage audit run
 *
 * Runs the pipeline in order: extract critical features, scan the data
 * catalog, match existence, calculate coverage. Each step degrades to an
 * empty result on failure, so `run()` resolves for any input.
 *
 * @example
 * ```typescript
 * const audit = new FeatureAuditService({
 *   criticalDataPath: 'critical_data_v2.csv',
 *   dataDir: 'data',
 * });
 *
 * const result = await audit.run();
 * await audit.writeReports(result, 'reports');
 * console.log(formatSummary(audit.summarize(result)));
 * ```
 */

import { scanCatalog } from './catalog-scanner.js';
import { calculateCoverage } from './coverage-calculator.js';
import { matchFeatureExistence } from './existence-matcher.js';
import { extractCriticalFeatures } from './feature-extractor.js';
import {
  DEFAULT_COVERAGE_THRESHOLD,
  summarizeAudit,
  writeReports,
  type ReportWriteResult,
} from './report-emitter.js';
import type { AuditResult, AuditSummary } from './types.js';
import { logger as defaultLogger, type Logger } from './utils/logger.js';

export interface FeatureAuditOptions {
  /** Reference CSV listing critical features */
  readonly criticalDataPath: string;
  /** Directory holding the `.tsv` data files */
  readonly dataDir: string;
  /** Mean coverage a critical feature needs to count as covered */
  readonly coverageThreshold?: number;
  readonly logger?: Logger;
}

export class FeatureAuditService {
  private readonly criticalDataPath: string;
  private readonly dataDir: string;
  private readonly log: Logger;
  readonly coverageThreshold: number;

  constructor(options: FeatureAuditOptions) {
    this.criticalDataPath = options.criticalDataPath;
    this.dataDir = options.dataDir;
    this.coverageThreshold = options.coverageThreshold ?? DEFAULT_COVERAGE_THRESHOLD;
    this.log = options.logger ?? defaultLogger;
  }

  async run(): Promise<AuditResult> {
    const features = await extractCriticalFeatures(this.criticalDataPath, this.log);
    const catalog = await scanCatalog(this.dataDir, this.log);

    this.log.info('Analyzing feature existence...');
    const existence = matchFeatureExistence(features.mappedFeatures, catalog);
    this.log.info(
      `Feature existence analysis completed. Found ${existence.missing.length} missing critical features`
    );

    const coverage = await calculateCoverage(
      this.dataDir,
      catalog,
      features.mappedFeatures,
      this.log
    );

    return { features, catalog, existence, coverage };
  }

  writeReports(result: AuditResult, outputDir: string): Promise<ReportWriteResult> {
    return writeReports(result, outputDir, this.log);
  }

  summarize(result: AuditResult): AuditSummary {
    return summarizeAudit(result, this.coverageThreshold);
  }
}
