/**
 * CLI Library Index
 *
 * Exports shared CLI utilities for the feature-audit CLI.
 *
 * @module cli/lib
 */

// Configuration
export {
  type CLIConfig,
  type ConfigFile,
  type ConfigIssue,
  type LoadConfigOptions,
  type LoadedConfig,
  CONFIG_FILE_NAMES,
  ConfigFileSchema,
  DEFAULT_CONFIG,
  ThresholdSchema,
  findConfigFile,
  loadConfig,
  parseConfigFile,
} from './config.js';

// Logging
export {
  type CLILoggerConfig,
  type StructuredLogEntry,
  CLILogger,
  createCLILogger,
  formatDuration,
} from './logger.js';
