/**
 * Rule Evaluator
 *
 * Decides whether a single index is due for deletion under a single rule.
 * Age is counted in whole UTC calendar days between the suffix date and the
 * run date; an index is due once its age reaches the rule's threshold.
 */

import type { IndexInfo, IndexRule, RuleDecision } from './index-rule.interface';
import { matches } from './pattern-matcher';
import { extractSuffixDate } from './date-suffix';

const MS_PER_DAY = 24 * 60 * 60 * 1000;

export function startOfUtcDay(date: Date): number {
  return Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate());
}

/**
 * Whole days from `from` to `to`, by UTC calendar date. Negative when `from`
 * lies after `to`.
 */
export function daysBetween(from: Date, to: Date): number {
  return Math.floor((startOfUtcDay(to) - startOfUtcDay(from)) / MS_PER_DAY);
}

export function evaluateRule(index: IndexInfo, rule: IndexRule, today: Date): RuleDecision {
  if (!matches(rule.indexPattern, index.name)) {
    return { eligible: false, reason: 'no_match', ageDays: null };
  }

  const suffixDate = extractSuffixDate(index.name, rule.datePattern);
  if (!suffixDate) {
    return { eligible: false, reason: 'undated', ageDays: null };
  }

  const rawAge = daysBetween(suffixDate, today);
  // Future-dated suffixes are never due, even with a zero threshold
  if (rawAge < 0) {
    return { eligible: false, reason: 'not_due', ageDays: 0 };
  }

  const eligible = rawAge >= rule.ageThreshold;
  return { eligible, reason: eligible ? 'eligible' : 'not_due', ageDays: rawAge };
}

export function isEligible(index: IndexInfo, rule: IndexRule, today: Date): boolean {
  return evaluateRule(index, rule, today).eligible;
}
