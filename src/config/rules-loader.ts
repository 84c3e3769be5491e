/**
 * Rules Loader
 *
 * Reads the YAML rules document and validates it into ServiceRules.
 *
 * Document shape:
 *   - service: logs-prod
 *     rules:
 *       - index_pattern: "*-logs-*"
 *         age_threshold: 14
 *         date_pattern: "%Y.%m.%d"   # optional
 *     summary_reports:              # optional
 *       - pattern: "app-*"
 *         name: Application logs
 */

import { readFile } from 'fs/promises';
import { parse } from 'yaml';
import { z } from 'zod';
import { DEFAULT_DATE_PATTERN, type ServiceRules } from '../rules/index-rule.interface';

const indexRuleSchema = z.object({
  index_pattern: z.string().min(1),
  age_threshold: z.number().int().nonnegative(),
  date_pattern: z.string().min(1).optional(),
});

const summarySpecSchema = z.object({
  pattern: z.string().min(1),
  name: z.string().min(1),
});

const serviceRulesSchema = z.object({
  service: z.string().min(1),
  rules: z.array(indexRuleSchema),
  summary_reports: z.array(summarySpecSchema).optional(),
});

export const rulesDocumentSchema = z.array(serviceRulesSchema);

export type RulesDocument = z.infer<typeof rulesDocumentSchema>;

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

export function parseRules(source: string, origin = 'rules document'): ServiceRules[] {
  let raw: unknown;
  try {
    raw = parse(source);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Invalid YAML in ${origin}: ${message}`);
  }

  const result = rulesDocumentSchema.safeParse(raw);
  if (!result.success) {
    throw new Error(`Invalid ${origin}: ${describeIssues(result.error)}`);
  }

  return result.data.map((entry) => ({
    service: entry.service,
    rules: entry.rules.map((rule) => ({
      indexPattern: rule.index_pattern,
      ageThreshold: rule.age_threshold,
      datePattern: rule.date_pattern ?? DEFAULT_DATE_PATTERN,
    })),
    summaryReports: entry.summary_reports ?? [],
  }));
}

export async function loadRules(rulesFile: string): Promise<ServiceRules[]> {
  const source = await readFile(rulesFile, 'utf8');
  return parseRules(source, `rules file ${rulesFile}`);
}
