/**
 * Cluster Client Interface
 *
 * Contract for the search-cluster API the cleanup depends on. The decision
 * engine never calls it; the orchestrator lists through it and the executor
 * deletes through it.
 */

import type { IndexInfo } from '../rules/index-rule.interface';

export interface ClusterClient {
  readonly name: string;
  listIndices(service: string): Promise<IndexInfo[]>;
  deleteIndex(service: string, indexName: string): Promise<void>;
}
