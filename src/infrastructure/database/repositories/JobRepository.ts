import Database from 'better-sqlite3';
import { z } from 'zod';
import { IJobRepository } from '../../../core/interfaces/IJobRepository.js';
import { JOB_STATES, Job, JobResult, ProgressUpdate } from '../../../core/entities/Job.js';

const JobRowSchema = z.object({
  id: z.string(),
  state: z.enum(JOB_STATES),
  payload: z.string(),
  worker_id: z.string().nullable(),
  attempts: z.number().int(),
  progress: z.number().nullable(),
  submitted_at: z.string(),
  assigned_at: z.string().nullable(),
  started_at: z.string().nullable(),
  finished_at: z.string().nullable(),
  result: z.string().nullable(),
});

const JobResultSchema = z.object({
  status: z.enum(['completed', 'failed', 'cancelled']),
  code: z.number().nullable(),
  data: z.unknown(),
  error: z.string().optional(),
});

const ProgressRowSchema = z.object({
  timestamp: z.string(),
  message: z.string(),
  percentage: z.number().nullable(),
});

type JobRow = z.infer<typeof JobRowSchema>;

const toDate = (value: string | null): Date | undefined => (value ? new Date(value) : undefined);

/**
 * SQLite implementation of job repository
 */
export class JobRepository implements IJobRepository {
  constructor(private db: Database.Database) {}

  /**
   * Upsert; a REPLACE would cascade-delete the job's progress rows
   */
  saveJob(job: Job): void {
    const stmt = this.db.prepare(`
      INSERT INTO jobs (id, state, payload, worker_id, attempts, progress, submitted_at, assigned_at, started_at, finished_at, result)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(id) DO UPDATE SET
        state = excluded.state,
        worker_id = excluded.worker_id,
        attempts = excluded.attempts,
        progress = excluded.progress,
        assigned_at = excluded.assigned_at,
        started_at = excluded.started_at,
        finished_at = excluded.finished_at,
        result = excluded.result
    `);

    stmt.run(
      job.id,
      job.state,
      JSON.stringify(job.payload ?? null),
      job.workerId ?? null,
      job.attempts,
      job.progress,
      job.submittedAt.toISOString(),
      job.assignedAt ? job.assignedAt.toISOString() : null,
      job.startedAt ? job.startedAt.toISOString() : null,
      job.finishedAt ? job.finishedAt.toISOString() : null,
      job.result ? JSON.stringify(job.result) : null
    );
  }

  loadJob(jobId: string): Job | null {
    const row: unknown = this.db.prepare('SELECT * FROM jobs WHERE id = ?').get(jobId);
    if (!row) return null;
    return this.toJob(JobRowSchema.parse(row));
  }

  /**
   * All jobs in submission order
   */
  getAllJobs(): Job[] {
    const rows: unknown[] = this.db
      .prepare('SELECT * FROM jobs ORDER BY submitted_at ASC, rowid ASC')
      .all();
    return rows.map((row) => this.toJob(JobRowSchema.parse(row)));
  }

  saveJobProgress(jobId: string, update: ProgressUpdate): void {
    const stmt = this.db.prepare(`
      INSERT INTO job_progress (job_id, timestamp, message, percentage)
      VALUES (?, ?, ?, ?)
    `);

    stmt.run(jobId, update.timestamp.toISOString(), update.message, update.percentage);
  }

  loadJobProgress(jobId: string): ProgressUpdate[] {
    const rows: unknown[] = this.db
      .prepare('SELECT * FROM job_progress WHERE job_id = ? ORDER BY id')
      .all(jobId);

    return rows.map((raw) => {
      const row = ProgressRowSchema.parse(raw);
      return {
        timestamp: new Date(row.timestamp),
        message: row.message,
        percentage: row.percentage ?? 0,
      };
    });
  }

  /**
   * Delete terminal jobs that finished before the cutoff; progress rows go
   * with them through the foreign key
   */
  deleteJobsByAge(hoursOld: number = 24): number {
    const cutoffTime = new Date(Date.now() - hoursOld * 60 * 60 * 1000).toISOString();

    const result = this.db
      .prepare(
        `
      DELETE FROM jobs
      WHERE finished_at IS NOT NULL
        AND finished_at < ?
        AND state IN ('completed', 'failed', 'cancelled')
    `
      )
      .run(cutoffTime);

    return result.changes || 0;
  }

  private toJob(row: JobRow): Job {
    let result: JobResult | undefined;
    if (row.result) {
      const parsed = JobResultSchema.parse(JSON.parse(row.result));
      result = {
        status: parsed.status,
        code: parsed.code,
        data: parsed.data ?? null,
        error: parsed.error,
      };
    }

    const payload: unknown = JSON.parse(row.payload);

    return {
      id: row.id,
      payload,
      state: row.state,
      workerId: row.worker_id ?? undefined,
      submittedAt: new Date(row.submitted_at),
      assignedAt: toDate(row.assigned_at),
      startedAt: toDate(row.started_at),
      finishedAt: toDate(row.finished_at),
      attempts: row.attempts,
      progress: row.progress ?? 0,
      progressUpdates: this.loadJobProgress(row.id),
      result,
    };
  }
}
