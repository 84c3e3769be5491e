/**
 * Index Rule Types
 *
 * Data model shared by the decision engine (matcher, parser, evaluator,
 * planner, aggregator) and the collaborators feeding it.
 */

export const DEFAULT_DATE_PATTERN = '%Y.%m.%d';

export interface IndexRule {
  indexPattern: string;
  ageThreshold: number;
  datePattern: string;
}

export interface SummarySpec {
  pattern: string;
  name: string;
}

export interface ServiceRules {
  service: string;
  rules: IndexRule[];
  summaryReports: SummarySpec[];
}

export interface IndexInfo {
  name: string;
  sizeBytes: number;
  createdAt?: Date;
}

export interface DeletionPlan {
  service: string;
  indexNames: string[];
  // Matched a rule pattern but had no parseable date suffix
  undated: string[];
}

export interface SummaryEntry {
  name: string;
  totalBytes: number;
}

export type SummaryReport = SummaryEntry[];

export type RuleDecisionReason = 'no_match' | 'undated' | 'not_due' | 'eligible';

export interface RuleDecision {
  eligible: boolean;
  reason: RuleDecisionReason;
  ageDays: number | null;
}
