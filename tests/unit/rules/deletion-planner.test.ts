/**
 * Deletion Planner Unit Tests
 *
 * OR across rules, one entry per index, listing order preserved.
 */

import { describe, it, expect } from 'vitest';
import type { IndexInfo, ServiceRules } from '../../../src/rules/index-rule.interface';
import { isProtectedIndex, planDeletions } from '../../../src/rules/deletion-planner';

const today = new Date('2024-01-05T00:00:00Z');

const indices = (...names: string[]): IndexInfo[] => names.map((name) => ({ name, sizeBytes: 10 }));

describe('planDeletions', () => {
  it('should plan only expired indices', () => {
    const serviceRules: ServiceRules = {
      service: 'svc',
      rules: [{ indexPattern: '*-logs-*', ageThreshold: 2, datePattern: '%Y.%m.%d' }],
      summaryReports: [],
    };

    const plan = planDeletions(indices('app-logs-2024.01.01', 'app-logs-2024.01.04'), serviceRules, today);

    expect(plan).toEqual({ service: 'svc', indexNames: ['app-logs-2024.01.01'], undated: [] });
  });

  it('should plan an index once when only one of two matching rules has expired', () => {
    const serviceRules: ServiceRules = {
      service: 'svc',
      rules: [
        { indexPattern: '*-logs-*', ageThreshold: 30, datePattern: '%Y.%m.%d' },
        { indexPattern: 'app-*', ageThreshold: 3, datePattern: '%Y.%m.%d' },
        { indexPattern: 'app-logs-*', ageThreshold: 1, datePattern: '%Y.%m.%d' },
      ],
      summaryReports: [],
    };

    const plan = planDeletions(indices('app-logs-2024.01.01'), serviceRules, today);

    expect(plan.indexNames).toEqual(['app-logs-2024.01.01']);
  });

  it('should keep the listing order rather than rule order', () => {
    const serviceRules: ServiceRules = {
      service: 'svc',
      rules: [
        { indexPattern: 'b-*', ageThreshold: 1, datePattern: '%Y.%m.%d' },
        { indexPattern: 'a-*', ageThreshold: 1, datePattern: '%Y.%m.%d' },
      ],
      summaryReports: [],
    };

    const plan = planDeletions(
      indices('a-2024.01.01', 'b-2024.01.01', 'c-2024.01.01', 'a-2024.01.02'),
      serviceRules,
      today
    );

    expect(plan.indexNames).toEqual(['a-2024.01.01', 'b-2024.01.01', 'a-2024.01.02']);
  });

  it('should not repeat a name listed twice', () => {
    const serviceRules: ServiceRules = {
      service: 'svc',
      rules: [{ indexPattern: '*', ageThreshold: 0, datePattern: '%Y.%m.%d' }],
      summaryReports: [],
    };

    const plan = planDeletions(indices('x-2024.01.01', 'x-2024.01.01'), serviceRules, today);

    expect(plan.indexNames).toEqual(['x-2024.01.01']);
  });

  it('should collect matching indices without a date suffix as undated', () => {
    const serviceRules: ServiceRules = {
      service: 'svc',
      rules: [{ indexPattern: '*-logs-*', ageThreshold: 2, datePattern: '%Y.%m.%d' }],
      summaryReports: [],
    };

    const plan = planDeletions(indices('app-logs-current', 'app-logs-2024.01.01', 'other'), serviceRules, today);

    expect(plan.indexNames).toEqual(['app-logs-2024.01.01']);
    expect(plan.undated).toEqual(['app-logs-current']);
  });

  it('should not report an index as undated when another rule plans it', () => {
    const serviceRules: ServiceRules = {
      service: 'svc',
      rules: [
        { indexPattern: 'app-*', ageThreshold: 2, datePattern: '%Y-%m-%d' },
        { indexPattern: 'app-*', ageThreshold: 2, datePattern: '%Y.%m.%d' },
      ],
      summaryReports: [],
    };

    const plan = planDeletions(indices('app-2024.01.01'), serviceRules, today);

    expect(plan).toEqual({ service: 'svc', indexNames: ['app-2024.01.01'], undated: [] });
  });

  it('should never plan hidden indices', () => {
    const serviceRules: ServiceRules = {
      service: 'svc',
      rules: [{ indexPattern: '*', ageThreshold: 0, datePattern: '%Y.%m.%d' }],
      summaryReports: [],
    };

    const plan = planDeletions(indices('.kibana-2020.01.01', 'app-2020.01.01'), serviceRules, today);

    expect(plan.indexNames).toEqual(['app-2020.01.01']);
  });

  it('should plan nothing for a service without rules', () => {
    const plan = planDeletions(indices('app-2020.01.01'), { service: 'svc', rules: [], summaryReports: [] }, today);

    expect(plan).toEqual({ service: 'svc', indexNames: [], undated: [] });
  });
});

describe('isProtectedIndex', () => {
  it('should protect dot-prefixed names', () => {
    expect(isProtectedIndex('.opendistro-job-scheduler-lock')).toBe(true);
    expect(isProtectedIndex('logs.2024')).toBe(false);
  });
});
