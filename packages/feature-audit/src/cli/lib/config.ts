/**
 * Feature Audit CLI Configuration Management
 *
 * Loads configuration from .feature-auditrc (YAML or JSON) with environment
 * variable overrides and defaults.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (FEATURE_AUDIT_*)
 * 3. Config file (.feature-auditrc or --config path)
 * 4. Default values
 *
 * Loading never throws. Problems are returned as `issues` so the caller can
 * log them once its logger exists; a bad value falls through to the next
 * layer down.
 *
 * @module cli/lib/config
 */

import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { DEFAULT_COVERAGE_THRESHOLD } from '../../core/report-emitter.js';

// ============================================================================
// Configuration Types
// ============================================================================

/**
 * Full CLI configuration
 */
export interface CLIConfig {
  /** Reference CSV listing critical features */
  readonly criticalDataPath: string;
  /** Directory containing the TSV data files */
  readonly dataDir: string;
  /** Coverage threshold in [0, 1] */
  readonly threshold: number;
  /** Directory the reports are written to */
  readonly outputDir: string;

  // Runtime overrides (from CLI flags)
  readonly verbose: boolean;
  readonly json: boolean;
  /** Resolved config file path */
  readonly configPath: string | null;
}

export interface ConfigIssue {
  readonly level: 'warn' | 'error';
  readonly message: string;
  readonly source: string;
}

export interface LoadedConfig {
  readonly config: CLIConfig;
  readonly issues: readonly ConfigIssue[];
}

/**
 * Coverage threshold: a finite number in [0, 1]
 */
export const ThresholdSchema = z.coerce
  .number()
  .finite()
  .min(0, 'Threshold must be at least 0')
  .max(1, 'Threshold must be at most 1');

/**
 * Config file structure (YAML or JSON)
 */
export const ConfigFileSchema = z.object({
  version: z.number().int().positive().optional(),
  critical_data: z.string().min(1).optional(),
  data_dir: z.string().min(1).optional(),
  threshold: z.number().optional(),
  output_dir: z.string().min(1).optional(),
});

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

// ============================================================================
// Default Configuration
// ============================================================================

export const DEFAULT_CONFIG: Pick<
  CLIConfig,
  'criticalDataPath' | 'dataDir' | 'threshold' | 'outputDir'
> = {
  criticalDataPath: 'critical_data_v2.csv',
  dataDir: 'data',
  threshold: DEFAULT_COVERAGE_THRESHOLD,
  outputDir: '.',
};

// ============================================================================
// Configuration Loading
// ============================================================================

/**
 * Standard config file names to search for
 */
export const CONFIG_FILE_NAMES = [
  '.feature-auditrc',
  '.feature-auditrc.yaml',
  '.feature-auditrc.yml',
  '.feature-auditrc.json',
] as const;

const ENV_PREFIX = 'FEATURE_AUDIT_';

/**
 * Find config file in a directory or its parents
 */
export function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);

  for (;;) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }
    const parent = resolve(dir, '..');
    if (parent === dir) return null;
    dir = parent;
  }
}

/**
 * Parse config file content
 *
 * YAML is a superset of JSON, so one parser covers every file name.
 */
export function parseConfigFile(content: string): ConfigFile {
  return ConfigFileSchema.parse(parseYaml(content) ?? {});
}

function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

function describe(error: unknown): string {
  if (error instanceof z.ZodError) return formatZodError(error);
  return error instanceof Error ? error.message : String(error);
}

/**
 * Load configuration options
 */
export interface LoadConfigOptions {
  /** Explicit config file path */
  configPath?: string;
  /** Working directory for the config file search */
  cwd?: string;
  /** Environment to read FEATURE_AUDIT_* variables from */
  env?: NodeJS.ProcessEnv;
  /** CLI flag overrides */
  overrides?: {
    criticalData?: string;
    dataDir?: string;
    threshold?: string | number;
    outputDir?: string;
    verbose?: boolean;
    json?: boolean;
  };
}

/**
 * Load and merge configuration from all sources
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<LoadedConfig> {
  const env = options.env ?? process.env;
  const overrides = options.overrides ?? {};
  const issues: ConfigIssue[] = [];
  const getEnvVar = (name: string): string | undefined => {
    const value = env[`${ENV_PREFIX}${name}`];
    return value === undefined || value === '' ? undefined : value;
  };

  // Locate the config file
  let configPath: string | null = null;
  const explicitPath = options.configPath ?? getEnvVar('CONFIG');
  if (explicitPath) {
    configPath = resolve(options.cwd ?? process.cwd(), explicitPath);
  } else {
    configPath = findConfigFile(options.cwd ?? process.cwd());
  }

  let fileConfig: ConfigFile = {};
  if (configPath) {
    try {
      fileConfig = parseConfigFile(await readFile(configPath, 'utf-8'));
    } catch (error) {
      issues.push({
        level: 'error',
        message: `Ignoring config file: ${describe(error)}`,
        source: configPath,
      });
    }
  }

  // Threshold is validated per layer; an invalid layer is skipped
  const thresholdLayers: Array<{ source: string; value: string | number | undefined }> = [
    { source: '--threshold', value: overrides.threshold },
    { source: `${ENV_PREFIX}THRESHOLD`, value: getEnvVar('THRESHOLD') },
    { source: configPath ?? 'config file', value: fileConfig.threshold },
  ];
  let threshold = DEFAULT_CONFIG.threshold;
  for (const layer of thresholdLayers) {
    if (layer.value === undefined) continue;
    const parsed = ThresholdSchema.safeParse(layer.value);
    if (parsed.success) {
      threshold = parsed.data;
      break;
    }
    issues.push({
      level: 'warn',
      message: `Invalid threshold ${JSON.stringify(layer.value)}: ${formatZodError(parsed.error)}`,
      source: layer.source,
    });
  }

  const config: CLIConfig = {
    criticalDataPath:
      overrides.criticalData ??
      getEnvVar('CRITICAL_DATA') ??
      fileConfig.critical_data ??
      DEFAULT_CONFIG.criticalDataPath,
    dataDir:
      overrides.dataDir ??
      getEnvVar('DATA_DIR') ??
      fileConfig.data_dir ??
      DEFAULT_CONFIG.dataDir,
    threshold,
    outputDir:
      overrides.outputDir ??
      getEnvVar('OUTPUT_DIR') ??
      fileConfig.output_dir ??
      DEFAULT_CONFIG.outputDir,
    verbose: overrides.verbose ?? false,
    json: overrides.json ?? false,
    configPath,
  };

  return { config, issues };
}
