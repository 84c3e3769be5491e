/**
 * Health Check Routes
 *
 * Liveness and readiness endpoints for the container platform.
 * The database check only runs when the cleanup history is enabled.
 */

import { Router, Request, Response } from 'express';
import { db } from '../database/client';
import { config } from '../config';

const router = Router();

router.get('/health', async (req: Request, res: Response) => {
  if (!config.database.enabled) {
    res.json({
      status: 'healthy',
      service: config.service.name,
      timestamp: new Date().toISOString(),
      checks: {
        database: 'disabled',
      },
    });
    return;
  }

  try {
    await db.testConnection();

    res.json({
      status: 'healthy',
      service: config.service.name,
      timestamp: new Date().toISOString(),
      checks: {
        database: 'ok',
      },
    });
  } catch (error) {
    res.status(503).json({
      status: 'unhealthy',
      service: config.service.name,
      timestamp: new Date().toISOString(),
      error: error instanceof Error ? error.message : String(error),
      checks: {
        database: 'failed',
      },
    });
  }
});

router.get('/health/ready', async (req: Request, res: Response) => {
  // Simple readiness check
  res.json({
    ready: true,
    timestamp: new Date().toISOString(),
  });
});

export { router as healthRoutes };
