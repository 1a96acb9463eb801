/**
 * Feature Audit CLI
 *
 * @module cli
 */

export * from './lib/index.js';
export { analyzeCommand, type AnalyzeResult } from './commands/analyze.js';

export const CLI_NAME = 'feature-audit';
