/**
 * Feature Audit
 *
 * Critical-feature existence and coverage auditing for tabular data files.
 *
 * @module feature-audit
 */

export * from './core/index.js';
export * from './cli/index.js';
