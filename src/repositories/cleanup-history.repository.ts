/**
 * CleanupHistoryRepository
 *
 * Repository pattern for index_cleanup.cleanup_history table.
 * Provides audit trail for each service's cleanup within a run.
 */

import type { Database } from '../database/client';

export interface CleanupHistoryCreate {
  run_id: string;
  service: string;
  started_at: Date;
  dry_run: boolean;
}

export interface CleanupHistoryComplete {
  indicesDeleted: number;
  bytesDeleted: number;
  deleteFailures: number;
  status: 'success' | 'failed';
  completed_at: Date;
  error_message?: string;
}

interface CleanupHistoryRow {
  id: string;
}

export class CleanupHistoryRepository {
  constructor(private db: Database) {}

  async create(data: CleanupHistoryCreate): Promise<string> {
    const query = `
      INSERT INTO index_cleanup.cleanup_history
        (run_id, service, started_at, status, dry_run)
      VALUES ($1, $2, $3, 'running', $4)
      RETURNING id
    `;
    const result = await this.db.queryOne<CleanupHistoryRow>(query, [
      data.run_id,
      data.service,
      data.started_at,
      data.dry_run,
    ]);
    if (!result) {
      throw new Error('Failed to create cleanup history record');
    }
    return result.id;
  }

  async complete(historyId: string, data: CleanupHistoryComplete): Promise<void> {
    const query = `
      UPDATE index_cleanup.cleanup_history
      SET
        indices_deleted = $2,
        bytes_deleted = $3,
        delete_failures = $4,
        status = $5,
        completed_at = $6,
        error_message = $7
      WHERE id = $1
    `;
    await this.db.query(query, [
      historyId,
      data.indicesDeleted,
      data.bytesDeleted,
      data.deleteFailures,
      data.status,
      data.completed_at,
      data.error_message || null,
    ]);
  }
}
