/**
 * Summary Aggregator
 *
 * Totals index sizes per summary pattern, independently of the deletion
 * rules. Must run on the listing taken before any deletion.
 */

import type { IndexInfo, SummaryReport, SummarySpec } from './index-rule.interface';
import { matches } from './pattern-matcher';

export function aggregate(indices: readonly IndexInfo[], specs: readonly SummarySpec[]): SummaryReport {
  return specs.map((spec) => ({
    name: spec.name,
    totalBytes: indices
      .filter((index) => matches(spec.pattern, index.name))
      .reduce((total, index) => total + index.sizeBytes, 0),
  }));
}

export function totalSize(indices: readonly IndexInfo[]): number {
  return indices.reduce((total, index) => total + index.sizeBytes, 0);
}
