/**
 * Metrics Routes
 *
 * Prometheus exposition of the cleanup counters and process metrics.
 */

import { Router, Request, Response } from 'express';
import { collectDefaultMetrics, register } from 'prom-client';
import '../metrics/cleanup-metrics';

let defaultMetricsStarted = false;

export function startDefaultMetrics(): void {
  if (!defaultMetricsStarted) {
    collectDefaultMetrics({ prefix: 'index_cleanup_' });
    defaultMetricsStarted = true;
  }
}

const router = Router();

router.get('/metrics', async (req: Request, res: Response) => {
  res.set('Content-Type', register.contentType);
  res.end(await register.metrics());
});

export { router as metricsRoutes };
