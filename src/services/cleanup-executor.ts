/**
 * CleanupExecutor
 *
 * Applies the deletion plans of a cleanup run through the cluster client.
 *
 * Responsibilities:
 *   - Delete planned indices in plan order (log only, in dry-run)
 *   - Keep going when a single delete fails
 *   - Tally deleted and remaining sizes per service
 *   - Record cleanup history (audit trail) and metrics
 */

import type { ClusterClient } from '../clients/cluster-client.interface';
import type { CleanupHistoryRepository } from '../repositories/cleanup-history.repository';
import type { SummaryReport } from '../rules/index-rule.interface';
import type { CleanupRun, ServicePlan } from './cleanup-orchestrator';
import { totalSize } from '../rules/summary-aggregator';
import { formatSize } from '../utils/format-size';
import { bytesDeleted, deleteFailures, indicesDeleted, lastRunTimestamp, listingFailures } from '../metrics/cleanup-metrics';
import { logger } from '../config/logger';

export interface DeletedIndex {
  name: string;
  sizeBytes: number;
  success: boolean;
}

export interface ServiceCleanupResult {
  service: string;
  deletes: DeletedIndex[];
  totalDeletedBytes: number;
  totalRemainingBytes: number;
  deleteFailures: number;
  message: string;
  summary: SummaryReport;
  fetchError?: string;
}

export interface ExecuteOptions {
  dryRun: boolean;
}

export class CleanupExecutor {
  constructor(
    private clusterClient: ClusterClient,
    private historyRepo: CleanupHistoryRepository | null = null
  ) {}

  async execute(run: CleanupRun, options: ExecuteOptions): Promise<ServiceCleanupResult[]> {
    const results: ServiceCleanupResult[] = [];

    for (const servicePlan of run.services) {
      results.push(await this.executeService(run.runId, servicePlan, options));
    }

    for (const failure of run.failures) {
      listingFailures.inc({ service: failure.service });
      results.push({
        service: failure.service,
        deletes: [],
        totalDeletedBytes: 0,
        totalRemainingBytes: 0,
        deleteFailures: 0,
        message: `Listing indices failed for ${failure.service} service: ${failure.error}`,
        summary: [],
        fetchError: failure.error,
      });
    }

    lastRunTimestamp.set(Date.now() / 1000);
    return results;
  }

  private async executeService(
    runId: string,
    servicePlan: ServicePlan,
    options: ExecuteOptions
  ): Promise<ServiceCleanupResult> {
    const { service, indices, plan } = servicePlan;
    const historyId = await this.startHistory(runId, service, options.dryRun);
    const sizes = new Map(indices.map((index) => [index.name, index.sizeBytes]));

    const deletes: DeletedIndex[] = [];
    let totalDeletedBytes = 0;
    let failures = 0;

    for (const indexName of plan.indexNames) {
      const sizeBytes = sizes.get(indexName) ?? 0;

      if (options.dryRun) {
        logger.info('CleanupExecutor: Deleting index (dry-run)', { runId, service, index: indexName, sizeBytes });
      } else {
        logger.info('CleanupExecutor: Deleting index', { runId, service, index: indexName, sizeBytes });
        try {
          await this.clusterClient.deleteIndex(service, indexName);
        } catch (error) {
          const message = error instanceof Error ? error.message : String(error);
          logger.warn('CleanupExecutor: Index deletion failed', { runId, service, index: indexName, error: message });
          failures++;
          deleteFailures.inc({ service });
          deletes.push({ name: indexName, sizeBytes, success: false });
          continue;
        }
      }

      totalDeletedBytes += sizeBytes;
      indicesDeleted.inc({ service });
      bytesDeleted.inc({ service }, sizeBytes);
      deletes.push({ name: indexName, sizeBytes, success: true });
    }

    const totalRemainingBytes = totalSize(indices) - totalDeletedBytes;
    const message =
      `Cleanup finished for ${service} service: ${formatSize(totalDeletedBytes)} data has been deleted. ` +
      `(Remaining data size: ${formatSize(totalRemainingBytes)})`;

    logger.info(`CleanupExecutor: ${message}`, {
      runId,
      service,
      indicesDeleted: deletes.length - failures,
      deleteFailures: failures,
      dryRun: options.dryRun,
    });

    await this.completeHistory(historyId, {
      indicesDeleted: deletes.length - failures,
      bytesDeleted: totalDeletedBytes,
      deleteFailures: failures,
    });

    return {
      service,
      deletes,
      totalDeletedBytes,
      totalRemainingBytes,
      deleteFailures: failures,
      message,
      summary: servicePlan.summary,
    };
  }

  private async startHistory(runId: string, service: string, dryRun: boolean): Promise<string | null> {
    if (!this.historyRepo) {
      return null;
    }
    try {
      return await this.historyRepo.create({ run_id: runId, service, started_at: new Date(), dry_run: dryRun });
    } catch (error) {
      logger.error('CleanupExecutor: Failed to create cleanup history record', {
        runId,
        service,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }

  private async completeHistory(
    historyId: string | null,
    totals: { indicesDeleted: number; bytesDeleted: number; deleteFailures: number }
  ): Promise<void> {
    if (!this.historyRepo || historyId === null) {
      return;
    }
    try {
      await this.historyRepo.complete(historyId, {
        ...totals,
        status: totals.deleteFailures > 0 ? 'failed' : 'success',
        completed_at: new Date(),
        error_message: totals.deleteFailures > 0 ? `${totals.deleteFailures} index deletion(s) failed` : undefined,
      });
    } catch (error) {
      logger.error('CleanupExecutor: Failed to complete cleanup history record', {
        historyId,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
