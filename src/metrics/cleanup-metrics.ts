/**
 * Cleanup Metrics
 *
 * Prometheus metrics on the default registry, served by /metrics.
 */

import { Counter, Gauge, register } from 'prom-client';

// Re-registering under the same name throws; replace instead (module reloads in tests)
function counter(name: string, help: string): Counter<'service'> {
  register.removeSingleMetric(name);
  return new Counter({ name, help, labelNames: ['service'] });
}

export const indicesDeleted = counter(
  'index_cleanup_indices_deleted_total',
  'Indices deleted (or planned, in dry-run) per service'
);

export const bytesDeleted = counter(
  'index_cleanup_bytes_deleted_total',
  'Bytes freed by deleted indices per service'
);

export const deleteFailures = counter(
  'index_cleanup_delete_failures_total',
  'Index deletions rejected by the cluster per service'
);

export const listingFailures = counter(
  'index_cleanup_listing_failures_total',
  'Runs in which a service index listing failed'
);

register.removeSingleMetric('index_cleanup_last_run_timestamp_seconds');

export const lastRunTimestamp = new Gauge({
  name: 'index_cleanup_last_run_timestamp_seconds',
  help: 'Unix time of the last completed cleanup run',
});
