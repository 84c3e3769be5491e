/**
 * Index Cleanup Service
 *
 * Main entry point for the index cleanup service.
 *
 * Responsibilities:
 *   - Expose health and metrics endpoints
 *   - Execute cleanup on startup (cron job mode)
 *   - Schedule daily cleanups (continuous mode)
 *   - Graceful shutdown
 */

import express from 'express';
import { config } from './config';
import { logger } from './config/logger';
import { loadRules } from './config/rules-loader';
import { db } from './database/client';
import { healthRoutes } from './api/health-routes';
import { metricsRoutes, startDefaultMetrics } from './api/metrics-routes';
import { AivenClusterClient } from './clients/aiven-cluster.client';
import { CleanupOrchestrator } from './services/cleanup-orchestrator';
import { CleanupExecutor } from './services/cleanup-executor';
import { CleanupScheduler } from './services/cleanup-scheduler';
import { runCleanupJob } from './services/cleanup-job';
import { CleanupHistoryRepository } from './repositories/cleanup-history.repository';
import { WebhookNotifier } from './notifications/webhook-notifier';

const app = express();

app.set('trust proxy', true);

// Middleware
app.use(express.json());

// Routes
app.use(healthRoutes);
app.use(metricsRoutes);

startDefaultMetrics();

// Collaborators
const clusterClient = new AivenClusterClient(config.aiven);
const historyRepo = config.database.enabled ? new CleanupHistoryRepository(db) : null;
const orchestrator = new CleanupOrchestrator(clusterClient);
const executor = new CleanupExecutor(clusterClient, historyRepo);
const notifier = new WebhookNotifier({
  webhookUrl: config.notification.webhookUrl,
  project: config.aiven.project,
  titleLink: config.notification.titleLink,
});

// Main execution function
async function executeCleanup(): Promise<boolean> {
  logger.info('Index Cleanup Service: Starting cleanup execution', {
    dryRun: config.cleanup.dryRun,
    rulesFile: config.cleanup.rulesFile,
    project: config.aiven.project,
    nodeEnv: config.nodeEnv,
  });

  try {
    const outcome = await runCleanupJob(
      {
        loadRules: () => loadRules(config.cleanup.rulesFile),
        orchestrator,
        executor,
        notifier,
      },
      { dryRun: config.cleanup.dryRun }
    );
    if (outcome.failedServices.length > 0) {
      logger.error('Index Cleanup Service: Index listing failed for some services', {
        failedServices: outcome.failedServices,
      });
    }
    logger.info('Index Cleanup Service: Cleanup execution complete', { success: outcome.success });
    return outcome.success;
  } catch (error) {
    logger.error('Index Cleanup Service: Cleanup execution failed', {
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    return false;
  }
}

const scheduler = new CleanupScheduler(executeCleanup, config.cleanup.schedule);

async function shutdown(code: number): Promise<void> {
  scheduler.stop();
  await db.close();
  process.exit(code);
}

// Start server
const server = app.listen(config.port, async () => {
  logger.info(`Index Cleanup Service: Server started on port ${config.port}`);

  if (config.cleanup.continuousMode) {
    scheduler.start();
    if (config.cleanup.runOnStartup) {
      await scheduler.tick();
    }
    return;
  }

  // Execute cleanup on startup, then exit (cron job mode)
  if (config.cleanup.runOnStartup) {
    const success = await executeCleanup();
    logger.info('Index Cleanup Service: Exiting after cleanup (cron job mode)', { success });
    await shutdown(success ? 0 : 1);
  }
});

// Graceful shutdown
process.on('SIGTERM', () => {
  logger.info('Index Cleanup Service: SIGTERM received, shutting down gracefully');
  server.close(() => {
    logger.info('Index Cleanup Service: Server closed');
    void shutdown(0);
  });
});

export { app };
