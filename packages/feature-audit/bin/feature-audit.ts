#!/usr/bin/env tsx
/**
 * Feature Audit CLI Entry Point
 *
 * Cross-references a critical-feature reference table against a directory
 * of TSV data files and reports feature existence and coverage.
 *
 * @module feature-audit-cli
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { analyzeCommand } from '../src/cli/commands/analyze.js';
import { loadConfig } from '../src/cli/lib/config.js';
import { createCLILogger } from '../src/cli/lib/logger.js';

interface ProgramOptions {
  readonly criticalData?: string;
  readonly dataDir?: string;
  readonly threshold?: string;
  readonly outputDir?: string;
  readonly config?: string;
  readonly verbose?: boolean;
  readonly json?: boolean;
}

function getVersion(): string {
  const __dirname = dirname(fileURLToPath(import.meta.url));
  const packageJsonPath = join(__dirname, '..', 'package.json');
  try {
    const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    if (
      typeof packageJson === 'object' &&
      packageJson !== null &&
      'version' in packageJson &&
      typeof packageJson.version === 'string'
    ) {
      return packageJson.version;
    }
  } catch (error) {
    console.warn(
      `Could not read package version: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  return '0.0.0';
}

function createProgram(): Command {
  const program = new Command();

  program
    .name('feature-audit')
    .description('Data Feature Analysis Tool - critical feature existence and coverage')
    .version(getVersion(), '-V, --version', 'Output the version number')
    .option('--critical-data <path>', 'Path to the critical data CSV file (default: critical_data_v2.csv)')
    .option('--data-dir <path>', 'Path to the directory containing TSV files (default: data)')
    .option('--threshold <n>', 'Coverage threshold (0.0-1.0, default: 0.8)')
    .option('--output-dir <path>', 'Output directory for reports (default: .)')
    .option('--config <path>', 'Path to config file (default: .feature-auditrc)')
    .option('-v, --verbose', 'Enable verbose output')
    .option('--json', 'Emit log lines as JSON')
    .action(async (options: ProgramOptions) => {
      const { config, issues } = await loadConfig({
        configPath: options.config,
        overrides: {
          criticalData: options.criticalData,
          dataDir: options.dataDir,
          threshold: options.threshold,
          outputDir: options.outputDir,
          verbose: options.verbose,
          json: options.json,
        },
      });

      const logger = createCLILogger({
        level: config.verbose ? 'debug' : 'info',
        json: config.json,
      });

      for (const issue of issues) {
        logger[issue.level](issue.message, { source: issue.source });
      }

      await analyzeCommand(config, logger);
    });

  return program;
}

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(
      `Error running analysis: ${error instanceof Error ? error.message : String(error)}`
    );
  });
