import { Job, JobListQuery, JobOutcome, JobPage, ReportReceipt, ResultLookup } from '../../core/entities/Job.js';
import { Worker, WorkerHandle, WorkerStatus } from '../../core/entities/Worker.js';
import { IJobRepository } from '../../core/interfaces/IJobRepository.js';
import { IWorkerChannel } from '../../core/interfaces/IWorkerChannel.js';
import { IWorkerRepository } from '../../core/interfaces/IWorkerRepository.js';
import {
  CapacityExceededError,
  InvalidStateError,
  JobNotFoundError,
  UnknownWorkerError,
} from '../../core/errors/OrchestrationError.js';
import { JobQueue, JobStatistics } from '../../infrastructure/queue/JobQueue.js';
import { WorkerRegistry } from '../../infrastructure/registry/WorkerRegistry.js';
import { Scheduler } from '../../infrastructure/scheduler/Scheduler.js';
import { Logger, silentLogger } from '../../utils/logger.js';
import { ResultAggregator } from './ResultAggregator.js';

export interface MasterSettings {
  heartbeatTimeoutMs: number;
  removalGraceMs: number;
  sweepIntervalMs: number;
  schedulerIntervalMs: number;
  dispatchTimeoutMs: number;
  maxDispatchAttempts: number;
  resultRetentionHours: number;
}

export interface MasterControllerDeps {
  channel: IWorkerChannel;
  jobRepository?: IJobRepository;
  workerRepository?: IWorkerRepository;
  createLogger?: (component: string) => Logger;
  now?: () => number;
}

/**
 * Aggregate snapshot answered by `master info`
 */
export interface MasterInfo {
  workerCount: number;
  onlineCount: number;
  queuedCount: number;
  runningCount: number;
  completedCount: number;
  failedCount: number;
  cancelledCount: number;
  totalSubmitted: number;
}

const RETENTION_SWEEP_MS = 60 * 60 * 1000;

/**
 * The master: owns the worker registry and job queue and is the only entry
 * point external callers reach.
 */
export class MasterController {
  private readonly registry: WorkerRegistry;
  private readonly queue: JobQueue;
  private readonly scheduler: Scheduler;
  private readonly aggregator: ResultAggregator;
  private readonly channel: IWorkerChannel;
  private readonly logger: Logger;
  private retentionTimer: NodeJS.Timeout | null = null;
  private started = false;

  constructor(private settings: MasterSettings, deps: MasterControllerDeps) {
    const logFor = deps.createLogger ?? (() => silentLogger);
    this.logger = logFor('Master');
    this.channel = deps.channel;

    this.registry = new WorkerRegistry(
      {
        heartbeatTimeoutMs: settings.heartbeatTimeoutMs,
        removalGraceMs: settings.removalGraceMs,
        sweepIntervalMs: settings.sweepIntervalMs,
        now: deps.now,
        logger: logFor('WorkerRegistry'),
      },
      deps.workerRepository
    );
    this.queue = new JobQueue(deps.jobRepository, logFor('JobQueue'));
    this.scheduler = new Scheduler(this.registry, this.queue, this.channel, {
      intervalMs: settings.schedulerIntervalMs,
      dispatchTimeoutMs: settings.dispatchTimeoutMs,
      maxDispatchAttempts: settings.maxDispatchAttempts,
      logger: logFor('Scheduler'),
    });
    this.aggregator = new ResultAggregator(this.queue, this.registry, logFor('ResultAggregator'));
  }

  start(): void {
    if (this.started) return;
    this.started = true;

    this.registry.start();
    this.scheduler.start();
    this.retentionTimer = setInterval(() => this.evictOldResults(), RETENTION_SWEEP_MS);
    this.retentionTimer.unref();

    this.logger.info('Master started');
  }

  /**
   * Stop background loops; in-flight dispatches settle before this resolves
   */
  async stop(): Promise<void> {
    if (!this.started) return;
    this.started = false;

    if (this.retentionTimer) {
      clearInterval(this.retentionTimer);
      this.retentionTimer = null;
    }
    this.registry.stop();
    await this.scheduler.stop();

    this.logger.info('Master stopped');
  }

  isStarted(): boolean {
    return this.started;
  }

  // ---- jobs ----

  submit(payload: unknown): string {
    const jobId = this.queue.submit(payload);
    this.logger.debug(`Job ${jobId} submitted`);
    return jobId;
  }

  /**
   * Cancel a job. A dispatched job frees its worker slot at once; the abort
   * sent to the worker is best-effort and the worker's later report is
   * ignored.
   */
  cancel(jobId: string): Job {
    const { job, previousState } = this.queue.cancel(jobId);

    if ((previousState === 'assigned' || previousState === 'running') && job.workerId) {
      this.registry.release(job.workerId, jobId);
      try {
        this.channel.abort(job.workerId, jobId);
      } catch (error) {
        this.logger.warn(`Abort signal for job ${jobId} not delivered:`, error);
      }
    }

    this.logger.debug(`Job ${jobId} cancelled (was ${previousState})`);
    return job;
  }

  getJob(jobId: string): Job {
    const job = this.queue.get(jobId);
    if (!job) {
      throw new JobNotFoundError(jobId);
    }
    return job;
  }

  /**
   * Page of the job history; the first 20 matches unless `all` or `limit`
   * say otherwise
   */
  listJobs(query: JobListQuery = {}): JobPage {
    return this.queue.list(query);
  }

  getResult(jobId: string): ResultLookup {
    return this.aggregator.getResult(jobId);
  }

  // ---- workers ----

  register(workerId: string, capacity: number): WorkerHandle {
    return this.registry.register(workerId, capacity);
  }

  heartbeat(workerId: string): void {
    this.registry.heartbeat(workerId);
  }

  getWorkerStatus(workerId: string): WorkerStatus {
    return this.registry.getStatus(workerId);
  }

  getWorker(workerId: string): Worker {
    const worker = this.registry.get(workerId);
    if (!worker) {
      throw new UnknownWorkerError(workerId);
    }
    return worker;
  }

  isWorkerConnected(workerId: string): boolean {
    return this.channel.isConnected(workerId);
  }

  /**
   * Pull-mode assignment: hand the head of the queue to the calling worker
   */
  dequeueFor(workerId: string): string | null {
    const worker = this.getWorker(workerId);

    if (worker.status === 'offline') {
      throw new InvalidStateError(`Worker ${workerId} is offline; heartbeat or register first`);
    }
    if (worker.load >= worker.capacity) {
      throw new CapacityExceededError(workerId, worker.capacity);
    }

    const jobId = this.queue.dequeueFor(workerId);
    if (jobId !== null) {
      this.registry.assign(workerId, jobId);
    }
    return jobId;
  }

  acknowledge(jobId: string, workerId: string): ReportReceipt {
    return this.aggregator.acknowledge(jobId, workerId);
  }

  progress(jobId: string, workerId: string, percentage: number, message: string): ReportReceipt {
    return this.aggregator.progress(jobId, workerId, percentage, message);
  }

  report(jobId: string, workerId: string, outcome: JobOutcome): ReportReceipt {
    return this.aggregator.report(jobId, workerId, outcome);
  }

  /**
   * Worker went away before its heartbeat timed out, e.g. its channel closed.
   * Jobs it held are recovered at once.
   */
  markWorkerOffline(workerId: string, reason: string): void {
    if (this.registry.has(workerId) && this.registry.getStatus(workerId) !== 'offline') {
      this.registry.markOffline(workerId, reason);
    }
  }

  // ---- queries ----

  masterInfo(): MasterInfo {
    const workers = this.registry.list();
    const stats = this.queue.getStatistics();

    return {
      workerCount: workers.length,
      onlineCount: workers.filter((w) => w.status !== 'offline').length,
      queuedCount: stats.queued,
      runningCount: stats.assigned + stats.running,
      completedCount: stats.completed,
      failedCount: stats.failed,
      cancelledCount: stats.cancelled,
      totalSubmitted: stats.totalSubmitted,
    };
  }

  slaveList(): Worker[] {
    return this.registry.list();
  }

  getStatistics(): JobStatistics & { dispatchesInFlight: number } {
    return {
      ...this.queue.getStatistics(),
      dispatchesInFlight: this.scheduler.getInFlightCount(),
    };
  }

  /**
   * Run one scheduling pass and one liveness pass now instead of waiting
   * for the timers
   */
  runOnce(): void {
    this.registry.sweep();
    this.scheduler.tick();
  }

  whenIdle(): Promise<void> {
    return this.scheduler.whenIdle();
  }

  onJobFinished(callback: (job: Job) => void): void {
    this.queue.onJobFinished(callback);
  }

  evictOldResults(): number {
    const cleared = this.queue.clearOldJobs(this.settings.resultRetentionHours);
    if (cleared > 0) {
      this.logger.info(`Evicted ${cleared} finished jobs older than ${this.settings.resultRetentionHours}h`);
    }
    return cleared;
  }
}
