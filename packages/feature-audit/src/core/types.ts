/**
 * Feature Audit Core Types
 *
 * All structures are built fresh per run and held in memory until the
 * reports are written.
 */

// ============================================================================
// Feature Extraction
// ============================================================================

/**
 * Critical features harvested from the reference table
 */
export interface CriticalFeatureSet {
  /** Raw names of every Critical row, in row order (duplicates kept) */
  readonly rawFeatures: readonly string[];
  /** Distinct canonical names, in first-appearance order */
  readonly mappedFeatures: readonly string[];
  /** Raw name to canonical name */
  readonly mapping: ReadonlyMap<string, string>;
}

// ============================================================================
// Catalog
// ============================================================================

/**
 * File name to header columns, ordered by file name
 */
export type Catalog = ReadonlyMap<string, readonly string[]>;

// ============================================================================
// Existence
// ============================================================================

export interface ExistenceRecord {
  readonly exists: boolean;
  /** Files whose header contains the feature, in catalog order */
  readonly files: readonly string[];
}

export interface ExistenceReport {
  readonly records: ReadonlyMap<string, ExistenceRecord>;
  readonly existing: readonly string[];
  readonly missing: readonly string[];
}

// ============================================================================
// Coverage
// ============================================================================

export interface CoverageEntry {
  /** Non-missing over total rows, in [0, 1] */
  readonly coverage: number;
  readonly isCritical: boolean;
}

export interface CriticalCoverageEntry {
  readonly coverage: number;
  readonly nonMissingCount: number;
  readonly totalCount: number;
}

/**
 * Column name to file name to entry
 */
export type CoverageReport = ReadonlyMap<string, ReadonlyMap<string, CoverageEntry>>;

export type CriticalCoverageReport = ReadonlyMap<
  string,
  ReadonlyMap<string, CriticalCoverageEntry>
>;

export interface CoverageResult {
  readonly coverage: CoverageReport;
  readonly criticalCoverage: CriticalCoverageReport;
}

// ============================================================================
// Run Result
// ============================================================================

export interface AuditResult {
  readonly features: CriticalFeatureSet;
  readonly catalog: Catalog;
  readonly existence: ExistenceReport;
  readonly coverage: CoverageResult;
}

/**
 * Counts printed in the console summary
 */
export interface AuditSummary {
  readonly rawFeatureCount: number;
  readonly mappedFeatureCount: number;
  readonly distinctColumnCount: number;
  readonly missingFeatureCount: number;
  readonly existingFeatureCount: number;
  readonly threshold: number;
  readonly featuresMeetingThreshold: number;
}
