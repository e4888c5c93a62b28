import { randomUUID } from 'crypto';
import {
  DEFAULT_JOB_LIST_LIMIT,
  Job,
  JobListQuery,
  JobPage,
  JobResult,
  JobState,
  canTransition,
  isTerminal,
} from '../../core/entities/Job.js';
import { IJobRepository } from '../../core/interfaces/IJobRepository.js';
import {
  InvalidStateError,
  JobNotFoundError,
  WorkerMismatchError,
} from '../../core/errors/OrchestrationError.js';
import { Logger, silentLogger } from '../../utils/logger.js';

export interface JobStatistics {
  totalSubmitted: number;
  queued: number;
  assigned: number;
  running: number;
  completed: number;
  failed: number;
  cancelled: number;
}

export interface CancelResult {
  job: Job;
  previousState: JobState;
}

/**
 * Job Queue: owns every job and the FIFO sequence of queued job ids.
 *
 * A job id is in `pending` if and only if the job's state is `queued`.
 */
export class JobQueue {
  private jobs: Map<string, Job> = new Map();
  private pending: string[] = [];
  private sequence: Map<string, number> = new Map();
  private nextSequence = 0;

  // lifetime counters, kept when old jobs are evicted
  private totalSubmitted = 0;
  private completedCount = 0;
  private failedCount = 0;
  private cancelledCount = 0;

  private jobFinishedCallback?: (job: Job) => void;
  private readonly logger: Logger;

  constructor(
    private jobRepo?: IJobRepository,
    logger?: Logger
  ) {
    this.logger = logger ?? silentLogger;

    if (this.jobRepo) {
      this.loadJobsFromDatabase();
    }
  }

  /**
   * Restore jobs from the database. Terminal jobs come back as history;
   * anything in flight lost its worker with the previous process and is
   * queued again in submission order.
   */
  private loadJobsFromDatabase(): void {
    if (!this.jobRepo) return;

    try {
      const dbJobs = this.jobRepo.getAllJobs();
      let requeued = 0;

      for (const job of dbJobs) {
        this.track(job);
        this.totalSubmitted++;

        if (isTerminal(job.state)) {
          this.countFinished(job.state);
          continue;
        }

        if (job.state !== 'queued') {
          job.state = 'queued';
          job.workerId = undefined;
          job.assignedAt = undefined;
          job.startedAt = undefined;
          job.progress = 0;
          this.persist(job, 'restored');
          requeued++;
        }
        this.pending.push(job.id);
      }

      this.logger.info(
        `Loaded ${dbJobs.length} jobs from database (${this.pending.length} queued, ${requeued} requeued)`
      );
    } catch (error) {
      this.logger.error('Error loading jobs from database:', error);
    }
  }

  /**
   * Submit a new job to the back of the queue
   */
  submit(payload: unknown): string {
    const job: Job = {
      id: randomUUID(),
      payload,
      state: 'queued',
      submittedAt: new Date(),
      attempts: 0,
      progress: 0,
      progressUpdates: [],
    };

    this.track(job);
    this.pending.push(job.id);
    this.totalSubmitted++;
    this.persist(job, 'queued');

    return job.id;
  }

  get(jobId: string): Job | null {
    return this.jobs.get(jobId) ?? null;
  }

  /**
   * Cancel a job that has not reached a terminal state. Callers are
   * responsible for releasing the worker slot of a dispatched job.
   */
  cancel(jobId: string): CancelResult {
    const job = this.require(jobId);
    const previousState = job.state;

    if (isTerminal(previousState)) {
      throw new InvalidStateError(`Job ${jobId} is already ${previousState}`);
    }

    if (previousState === 'queued') {
      this.removeFromPending(jobId);
    }

    this.finish(jobId, { status: 'cancelled', code: null, data: null });
    return { job, previousState };
  }

  peekNext(): string | null {
    return this.pending[0] ?? null;
  }

  /**
   * Take the head of the queue and assign it to a worker. Capacity is the
   * caller's concern.
   */
  dequeueFor(workerId: string): string | null {
    const jobId = this.pending.shift();
    if (jobId === undefined) return null;

    const job = this.require(jobId);
    this.transition(job, 'assigned');
    job.workerId = workerId;
    job.assignedAt = new Date();
    job.attempts++;
    this.persist(job, `assigned to ${workerId}`);

    return jobId;
  }

  /**
   * Worker acknowledged the job
   */
  markRunning(jobId: string, workerId: string): void {
    const job = this.require(jobId);
    if (job.workerId !== workerId) {
      throw new WorkerMismatchError(jobId, workerId, job.workerId);
    }

    this.transition(job, 'running');
    job.startedAt = new Date();
    this.persist(job, 'running');
  }

  /**
   * Return in-flight jobs to the front of the queue, keeping their
   * submission order. Terminal and already-queued jobs are skipped.
   */
  requeue(jobIds: string[]): string[] {
    const requeued: Job[] = [];

    for (const jobId of jobIds) {
      const job = this.jobs.get(jobId);
      if (!job || isTerminal(job.state) || job.state === 'queued') continue;

      this.transition(job, 'queued');
      job.workerId = undefined;
      job.assignedAt = undefined;
      job.startedAt = undefined;
      job.progress = 0;
      this.persist(job, 'requeued');
      requeued.push(job);
    }

    const ordered = requeued
      .map((job) => job.id)
      .sort((a, b) => (this.sequence.get(a) ?? 0) - (this.sequence.get(b) ?? 0));
    this.pending.unshift(...ordered);

    return ordered;
  }

  /**
   * Move a job to its terminal state and store the result
   */
  finish(jobId: string, result: JobResult): Job {
    const job = this.require(jobId);

    this.transition(job, result.status);
    const now = new Date();
    if (!job.startedAt && result.status !== 'cancelled' && job.assignedAt) {
      // report arrived before the acknowledgement
      job.startedAt = now;
    }
    job.finishedAt = now;
    job.result = result;
    if (result.status === 'completed') {
      job.progress = 100;
    }

    this.countFinished(result.status);
    this.persist(job, result.status);
    this.jobFinishedCallback?.(job);

    return job;
  }

  /**
   * Update job progress; only in-flight jobs record progress
   */
  updateProgress(jobId: string, progress: number, message: string): boolean {
    const job = this.require(jobId);
    if (job.state !== 'assigned' && job.state !== 'running') {
      return false;
    }

    const update = {
      timestamp: new Date(),
      message,
      percentage: Math.min(100, Math.max(0, progress)),
    };
    job.progress = update.percentage;
    job.progressUpdates.push(update);

    if (this.jobRepo) {
      try {
        this.jobRepo.saveJob(job);
        this.jobRepo.saveJobProgress(jobId, update);
      } catch (error) {
        this.logger.error(`Failed to persist progress for job ${jobId}:`, error);
      }
    }

    return true;
  }

  /**
   * All jobs in submission order
   */
  getAll(): Job[] {
    return Array.from(this.jobs.values());
  }

  getJobsByState(state: JobState): Job[] {
    if (state === 'queued') {
      return this.pending.map((id) => this.require(id));
    }
    return this.getAll().filter((job) => job.state === state);
  }

  /**
   * Jobs matching the query, in submission order (or newest first)
   */
  list(query: JobListQuery = {}): JobPage {
    const { state, workerId } = query;
    const matches = this.getAll()
      .filter((job) => (state ? job.state === state : true))
      .filter((job) => (workerId ? job.workerId === workerId : true))
      .sort((a, b) => (this.sequence.get(a.id) ?? 0) - (this.sequence.get(b.id) ?? 0));

    if (query.order === 'newest') {
      matches.reverse();
    }

    const limit = query.all ? null : query.limit ?? DEFAULT_JOB_LIST_LIMIT;
    return {
      jobs: limit === null ? matches : matches.slice(0, limit),
      total: matches.length,
      limit,
    };
  }

  getQueuedIds(): string[] {
    return [...this.pending];
  }

  getStatistics(): JobStatistics {
    let assigned = 0;
    let running = 0;
    for (const job of this.jobs.values()) {
      if (job.state === 'assigned') assigned++;
      else if (job.state === 'running') running++;
    }

    return {
      totalSubmitted: this.totalSubmitted,
      queued: this.pending.length,
      assigned,
      running,
      completed: this.completedCount,
      failed: this.failedCount,
      cancelled: this.cancelledCount,
    };
  }

  /**
   * Evict terminal jobs that finished more than `hoursOld` hours ago
   */
  clearOldJobs(hoursOld: number = 24): number {
    const cutoffTime = new Date(Date.now() - hoursOld * 60 * 60 * 1000);
    let cleared = 0;

    for (const [jobId, job] of Array.from(this.jobs.entries())) {
      if (isTerminal(job.state) && job.finishedAt && job.finishedAt < cutoffTime) {
        this.jobs.delete(jobId);
        this.sequence.delete(jobId);
        cleared++;
      }
    }

    if (this.jobRepo) {
      try {
        this.jobRepo.deleteJobsByAge(hoursOld);
      } catch (error) {
        this.logger.error('Failed to delete old jobs from database:', error);
      }
    }

    return cleared;
  }

  onJobFinished(callback: (job: Job) => void): void {
    this.jobFinishedCallback = callback;
  }

  private transition(job: Job, to: JobState): void {
    if (!canTransition(job.state, to)) {
      throw new InvalidStateError(`Job ${job.id} cannot move from ${job.state} to ${to}`);
    }
    job.state = to;
  }

  private require(jobId: string): Job {
    const job = this.jobs.get(jobId);
    if (!job) {
      throw new JobNotFoundError(jobId);
    }
    return job;
  }

  private track(job: Job): void {
    this.jobs.set(job.id, job);
    this.sequence.set(job.id, this.nextSequence++);
  }

  private removeFromPending(jobId: string): void {
    const index = this.pending.indexOf(jobId);
    if (index !== -1) {
      this.pending.splice(index, 1);
    }
  }

  private countFinished(state: JobState): void {
    if (state === 'completed') this.completedCount++;
    else if (state === 'failed') this.failedCount++;
    else if (state === 'cancelled') this.cancelledCount++;
  }

  private persist(job: Job, label: string): void {
    if (!this.jobRepo) return;

    try {
      this.jobRepo.saveJob(job);
      this.logger.debug(`✓ Job ${job.id} persisted to database (${label})`);
    } catch (error) {
      this.logger.error(`Failed to persist job ${job.id} to database:`, error);
    }
  }
}
