/**
 * Deletion Planner
 *
 * Evaluates every index of a service against all of the service's rules.
 * An index is planned when any rule finds it due; each name appears once,
 * in listing order. Hidden indices (leading `.`) are protected.
 */

import type { DeletionPlan, IndexInfo, ServiceRules } from './index-rule.interface';
import { evaluateRule } from './rule-evaluator';

export function isProtectedIndex(name: string): boolean {
  return name.startsWith('.');
}

export function planDeletions(
  indices: readonly IndexInfo[],
  serviceRules: ServiceRules,
  today: Date
): DeletionPlan {
  const indexNames: string[] = [];
  const undated: string[] = [];
  const seen = new Set<string>();

  for (const index of indices) {
    if (seen.has(index.name) || isProtectedIndex(index.name)) {
      continue;
    }

    const decisions = serviceRules.rules.map((rule) => evaluateRule(index, rule, today));

    if (decisions.some((decision) => decision.eligible)) {
      seen.add(index.name);
      indexNames.push(index.name);
    } else if (decisions.some((decision) => decision.reason === 'undated')) {
      seen.add(index.name);
      undated.push(index.name);
    }
  }

  return { service: serviceRules.service, indexNames, undated };
}
