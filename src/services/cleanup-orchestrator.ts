/**
 * CleanupOrchestrator
 *
 * Builds the cleanup run: for every configured service, take one snapshot of
 * the index listing, plan deletions and aggregate the summary report.
 *
 * Responsibilities:
 *   - List indices per service through the cluster client
 *   - Isolate listing failures to the failing service
 *   - Return plans and reports; deleting and notifying happen elsewhere
 */

import { v4 as uuidv4 } from 'uuid';
import type { ClusterClient } from '../clients/cluster-client.interface';
import type { DeletionPlan, IndexInfo, ServiceRules, SummaryReport } from '../rules/index-rule.interface';
import { planDeletions } from '../rules/deletion-planner';
import { aggregate } from '../rules/summary-aggregator';
import { logger } from '../config/logger';

export interface ServicePlan {
  service: string;
  indices: IndexInfo[];
  plan: DeletionPlan;
  summary: SummaryReport;
}

export interface ServiceFailure {
  service: string;
  error: string;
}

export interface CleanupRun {
  runId: string;
  runDate: Date;
  services: ServicePlan[];
  failures: ServiceFailure[];
}

export class CleanupOrchestrator {
  constructor(private clusterClient: ClusterClient) {}

  async run(allServiceRules: readonly ServiceRules[], today: Date = new Date()): Promise<CleanupRun> {
    const runId = uuidv4();
    const services: ServicePlan[] = [];
    const failures: ServiceFailure[] = [];

    logger.info('CleanupOrchestrator: Planning cleanup', {
      runId,
      servicesCount: allServiceRules.length,
      runDate: today.toISOString(),
    });

    for (const serviceRules of allServiceRules) {
      let indices: IndexInfo[];
      try {
        indices = await this.clusterClient.listIndices(serviceRules.service);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logger.error('CleanupOrchestrator: Listing indices failed', {
          runId,
          service: serviceRules.service,
          error: message,
        });
        failures.push({ service: serviceRules.service, error: message });
        continue;
      }

      const plan = planDeletions(indices, serviceRules, today);
      const summary = aggregate(indices, serviceRules.summaryReports);

      for (const name of plan.undated) {
        logger.warn('CleanupOrchestrator: Index matches a rule but has no parseable date suffix', {
          runId,
          service: serviceRules.service,
          index: name,
        });
      }

      logger.info('CleanupOrchestrator: Service planned', {
        runId,
        service: serviceRules.service,
        indicesListed: indices.length,
        indicesPlanned: plan.indexNames.length,
      });

      services.push({ service: serviceRules.service, indices, plan, summary });
    }

    return { runId, runDate: today, services, failures };
  }
}
