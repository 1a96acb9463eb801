/**
 * Existence Matcher
 *
 * @module core/existence-matcher
 */

import type { Catalog, ExistenceRecord, ExistenceReport } from './types.js';

/**
 * Look up every mapped critical feature in the catalog
 *
 * `existing` and `missing` together hold each mapped feature exactly once,
 * in the order of `mappedFeatures`.
 */
export function matchFeatureExistence(
  mappedFeatures: readonly string[],
  catalog: Catalog
): ExistenceReport {
  const records = new Map<string, ExistenceRecord>();
  const existing: string[] = [];
  const missing: string[] = [];

  for (const feature of mappedFeatures) {
    if (records.has(feature)) continue;

    const files: string[] = [];
    for (const [fileName, columns] of catalog) {
      if (columns.includes(feature)) {
        files.push(fileName);
      }
    }

    const exists = files.length > 0;
    records.set(feature, { exists, files });
    (exists ? existing : missing).push(feature);
  }

  return { records, existing, missing };
}
