import Database from 'better-sqlite3';
import { z } from 'zod';
import { IWorkerRepository } from '../../../core/interfaces/IWorkerRepository.js';
import { WorkerRecord } from '../../../core/entities/Worker.js';

const WorkerRowSchema = z.object({
  id: z.string(),
  capacity: z.number().int(),
  liveness: z.enum(['live', 'offline']),
  registered_at: z.string(),
  last_heartbeat: z.string(),
  offline_reason: z.string().nullable(),
});

/**
 * SQLite implementation of worker repository
 */
export class WorkerRepository implements IWorkerRepository {
  constructor(private db: Database.Database) {}

  saveWorker(worker: WorkerRecord): void {
    this.db
      .prepare(
        `
      INSERT INTO workers (id, capacity, liveness, registered_at, last_heartbeat, offline_reason)
      VALUES (?, ?, ?, ?, ?, ?)
      ON CONFLICT(id) DO UPDATE SET
        capacity = excluded.capacity,
        liveness = excluded.liveness,
        last_heartbeat = excluded.last_heartbeat,
        offline_reason = excluded.offline_reason
    `
      )
      .run(
        worker.id,
        worker.capacity,
        worker.liveness,
        worker.registeredAt.toISOString(),
        worker.lastHeartbeat.toISOString(),
        worker.offlineReason ?? null
      );
  }

  loadWorker(workerId: string): WorkerRecord | null {
    const row: unknown = this.db.prepare('SELECT * FROM workers WHERE id = ?').get(workerId);
    return row ? this.toRecord(row) : null;
  }

  getAllWorkers(): WorkerRecord[] {
    const rows: unknown[] = this.db
      .prepare('SELECT * FROM workers ORDER BY registered_at ASC, rowid ASC')
      .all();
    return rows.map((row) => this.toRecord(row));
  }

  deleteWorker(workerId: string): void {
    this.db.prepare('DELETE FROM workers WHERE id = ?').run(workerId);
  }

  private toRecord(raw: unknown): WorkerRecord {
    const row = WorkerRowSchema.parse(raw);
    return {
      id: row.id,
      capacity: row.capacity,
      liveness: row.liveness,
      registeredAt: new Date(row.registered_at),
      lastHeartbeat: new Date(row.last_heartbeat),
      offlineReason: row.offline_reason ?? undefined,
    };
  }
}
