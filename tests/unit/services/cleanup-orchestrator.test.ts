/**
 * CleanupOrchestrator Unit Tests
 *
 * Orchestrator builds the cleanup run across all configured services.
 * Responsibilities:
 *   - List indices once per service
 *   - Plan deletions and aggregate summaries from that listing
 *   - Isolate listing failures
 *   - Never delete
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { ClusterClient } from '../../../src/clients/cluster-client.interface';
import type { ServiceRules } from '../../../src/rules/index-rule.interface';
import { CleanupOrchestrator } from '../../../src/services/cleanup-orchestrator';

describe('CleanupOrchestrator', () => {
  let orchestrator: CleanupOrchestrator;
  let mockClusterClient: { name: string; listIndices: ReturnType<typeof vi.fn>; deleteIndex: ReturnType<typeof vi.fn> };

  const today = new Date('2024-01-05T06:00:00Z');

  const logsRules: ServiceRules = {
    service: 'svc',
    rules: [{ indexPattern: '*-logs-*', ageThreshold: 2, datePattern: '%Y.%m.%d' }],
    summaryReports: [{ pattern: 'app-*', name: 'App' }],
  };

  beforeEach(() => {
    mockClusterClient = {
      name: 'MockClusterClient',
      listIndices: vi.fn(),
      deleteIndex: vi.fn(),
    };
    orchestrator = new CleanupOrchestrator(mockClusterClient as ClusterClient);
  });

  it('should plan expired indices and keep recent ones', async () => {
    mockClusterClient.listIndices.mockResolvedValue([
      { name: 'app-logs-2024.01.01', sizeBytes: 300 },
      { name: 'app-logs-2024.01.04', sizeBytes: 200 },
    ]);

    const run = await orchestrator.run([logsRules], today);

    expect(mockClusterClient.listIndices).toHaveBeenCalledWith('svc');
    expect(run.services).toHaveLength(1);
    expect(run.services[0].plan.indexNames).toEqual(['app-logs-2024.01.01']);
    expect(run.failures).toEqual([]);
    expect(run.runDate).toBe(today);
  });

  it('should count indices kept by the rules in the summary', async () => {
    mockClusterClient.listIndices.mockResolvedValue([
      { name: 'app-logs-2024.01.01', sizeBytes: 300 },
      { name: 'app-logs-2024.01.04', sizeBytes: 200 },
    ]);

    const run = await orchestrator.run([logsRules], today);

    expect(run.services[0].summary).toEqual([{ name: 'App', totalBytes: 500 }]);
  });

  it('should isolate a listing failure to its service', async () => {
    mockClusterClient.listIndices.mockImplementation(async (service: string) => {
      if (service === 'broken') {
        throw new Error('503 Service Unavailable');
      }
      return [{ name: 'app-logs-2024.01.01', sizeBytes: 300 }];
    });

    const run = await orchestrator.run([{ ...logsRules, service: 'broken' }, logsRules], today);

    expect(run.failures).toEqual([{ service: 'broken', error: '503 Service Unavailable' }]);
    expect(run.services.map((s) => s.service)).toEqual(['svc']);
    expect(run.services[0].plan.indexNames).toEqual(['app-logs-2024.01.01']);
    expect(run.services[0].summary).toEqual([{ name: 'App', totalBytes: 300 }]);
  });

  it('should process services in configuration order', async () => {
    mockClusterClient.listIndices.mockResolvedValue([]);

    const run = await orchestrator.run(
      [
        { ...logsRules, service: 'first' },
        { ...logsRules, service: 'second' },
      ],
      today
    );

    expect(mockClusterClient.listIndices.mock.calls).toEqual([['first'], ['second']]);
    expect(run.services.map((s) => s.service)).toEqual(['first', 'second']);
  });

  it('should never call deleteIndex', async () => {
    mockClusterClient.listIndices.mockResolvedValue([{ name: 'app-logs-2020.01.01', sizeBytes: 1 }]);

    await orchestrator.run([logsRules], today);

    expect(mockClusterClient.deleteIndex).not.toHaveBeenCalled();
  });

  it('should give every run a distinct id', async () => {
    mockClusterClient.listIndices.mockResolvedValue([]);

    const first = await orchestrator.run([logsRules], today);
    const second = await orchestrator.run([logsRules], today);

    expect(first.runId).toMatch(/^[0-9a-f-]{36}$/);
    expect(first.runId).not.toBe(second.runId);
  });
});
