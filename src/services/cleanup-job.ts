/**
 * Cleanup Job
 *
 * One full cleanup cycle: load rules, plan, delete, notify.
 * Used by the startup run and by the cron schedule.
 */

import type { ServiceRules } from '../rules/index-rule.interface';
import type { CleanupOrchestrator } from './cleanup-orchestrator';
import type { CleanupExecutor } from './cleanup-executor';
import type { WebhookNotifier } from '../notifications/webhook-notifier';
import { logger } from '../config/logger';

export interface CleanupJobDeps {
  loadRules: () => Promise<ServiceRules[]>;
  orchestrator: CleanupOrchestrator;
  executor: CleanupExecutor;
  notifier: WebhookNotifier;
}

export interface CleanupJobOptions {
  dryRun: boolean;
  today?: Date;
}

export interface CleanupJobOutcome {
  success: boolean;
  failedServices: string[];
  deleteFailures: number;
  notified: boolean;
}

export async function runCleanupJob(deps: CleanupJobDeps, options: CleanupJobOptions): Promise<CleanupJobOutcome> {
  const rules = await deps.loadRules();
  const run = await deps.orchestrator.run(rules, options.today ?? new Date());
  const results = await deps.executor.execute(run, { dryRun: options.dryRun });

  const failedServices = run.failures.map((failure) => failure.service);
  const deleteFailures = results.reduce((total, result) => total + result.deleteFailures, 0);

  let notified = false;
  let notificationAccepted = true;
  if (!options.dryRun && deps.notifier.enabled) {
    notificationAccepted = await deps.notifier.send(results);
    notified = notificationAccepted;
  }

  const success = failedServices.length === 0 && deleteFailures === 0 && notificationAccepted;

  logger.info('CleanupJob: Run finished', {
    runId: run.runId,
    success,
    failedServices,
    deleteFailures,
    notified,
    dryRun: options.dryRun,
  });

  return { success, failedServices, deleteFailures, notified };
}
