/**
 * Metrics Routes Unit Tests
 *
 * Test metrics endpoint response.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import express from 'express';
import request from 'supertest';
import { metricsRoutes } from '../../../src/api/metrics-routes';
import { indicesDeleted } from '../../../src/metrics/cleanup-metrics';

describe('Metrics Routes', () => {
  let app: express.Application;

  beforeEach(() => {
    app = express();
    app.use(metricsRoutes);
  });

  it('should return Prometheus metrics endpoint', async () => {
    const response = await request(app).get('/metrics');

    expect(response.status).toBe(200);
    expect(response.headers['content-type']).toContain('text/plain');
  });

  it('should expose the cleanup counters', async () => {
    indicesDeleted.inc({ service: 'metrics-test' }, 2);

    const response = await request(app).get('/metrics');

    expect(response.text).toContain('index_cleanup_indices_deleted_total{service="metrics-test"} 2');
  });
});
