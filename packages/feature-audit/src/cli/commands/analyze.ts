/**
 * Analyze Command
 *
 * Audit critical-feature coverage of a directory of TSV files and write
 * the CSV reports.
 *
 * USAGE:
 *   feature-audit [options]
 *
 * OPTIONS:
 *   --critical-data <path>  Reference CSV (default: critical_data_v2.csv)
 *   --data-dir <path>       Directory of .tsv files (default: data)
 *   --threshold <n>         Coverage threshold 0.0-1.0 (default: 0.8)
 *   --output-dir <path>     Report directory (default: .)
 *
 * Failures are logged; the command itself always completes.
 *
 * @module cli/commands/analyze
 */

import { FeatureAuditService } from '../../core/feature-audit-service.js';
import { formatSummary } from '../../core/report-emitter.js';
import type { AuditSummary } from '../../core/types.js';
import type { CLIConfig } from '../lib/config.js';
import type { CLILogger } from '../lib/logger.js';

export interface AnalyzeResult {
  readonly summary: AuditSummary;
  readonly reportsWritten: number;
  readonly reportsFailed: number;
}

/**
 * Run the audit described by `config`
 *
 * @param print - Receives the console summary (defaults to console.log)
 */
export async function analyzeCommand(
  config: CLIConfig,
  logger: CLILogger,
  print: (text: string) => void = console.log
): Promise<AnalyzeResult> {
  logger.commandStart('analyze', {
    criticalData: config.criticalDataPath,
    dataDir: config.dataDir,
    threshold: config.threshold,
    outputDir: config.outputDir,
  });

  const audit = new FeatureAuditService({
    criticalDataPath: config.criticalDataPath,
    dataDir: config.dataDir,
    coverageThreshold: config.threshold,
    logger,
  });

  const result = await audit.run();
  const written = await audit.writeReports(result, config.outputDir);
  const summary = audit.summarize(result);

  print(formatSummary(summary));

  logger.commandEnd(written.failed.length === 0, {
    reports: written.written.length,
  });

  return {
    summary,
    reportsWritten: written.written.length,
    reportsFailed: written.failed.length,
  };
}
