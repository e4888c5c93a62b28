import { isTerminal } from '../../core/entities/Job.js';
import { IWorkerChannel } from '../../core/interfaces/IWorkerChannel.js';
import { ChannelReplacedError, isOrchestrationError } from '../../core/errors/OrchestrationError.js';
import { JobQueue } from '../queue/JobQueue.js';
import { WorkerRegistry } from '../registry/WorkerRegistry.js';
import { withTimeout } from '../../utils/timeout.js';
import { Logger, silentLogger } from '../../utils/logger.js';

export interface SchedulerOptions {
  intervalMs: number;
  dispatchTimeoutMs: number;
  /** Assignments a job may use before losing its worker fails it */
  maxDispatchAttempts: number;
  logger?: Logger;
}

export interface Assignment {
  jobId: string;
  workerId: string;
  attempt: number;
}

/**
 * Pairs idle worker capacity with queued jobs on a fixed interval.
 *
 * Workers are visited in registration order and jobs are taken FIFO, so a
 * tick is deterministic for a given registry and queue. Dispatch is not
 * awaited by the loop; its outcome re-enters the queue and registry from the
 * promise callbacks.
 */
export class Scheduler {
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Set<Promise<void>> = new Set();
  private readonly logger: Logger;

  constructor(
    private registry: WorkerRegistry,
    private queue: JobQueue,
    private channel: IWorkerChannel,
    private options: SchedulerOptions
  ) {
    this.logger = options.logger ?? silentLogger;
    this.registry.onWorkerLost((workerId, jobIds, reason) => this.recoverJobs(workerId, jobIds, reason));
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      try {
        this.tick();
      } catch (error) {
        this.logger.error('Scheduling pass failed:', error);
      }
    }, this.options.intervalMs);
  }

  /**
   * Stop the loop and wait for dispatches already on the wire to settle
   */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    await this.whenIdle();
  }

  /**
   * One scheduling pass. Returns the assignments it made.
   */
  tick(): Assignment[] {
    const assignments: Assignment[] = [];

    for (const worker of this.registry.list()) {
      if (this.queue.peekNext() === null) break;
      if (worker.status !== 'online') continue;
      // pull-mode workers take work through dequeueFor
      if (!this.channel.isConnected(worker.id)) continue;

      const free = worker.capacity - worker.load;
      for (let i = 0; i < free; i++) {
        const jobId = this.queue.dequeueFor(worker.id);
        if (jobId === null) break;

        this.registry.assign(worker.id, jobId);
        const job = this.queue.get(jobId);
        const attempt = job?.attempts ?? 1;
        assignments.push({ jobId, workerId: worker.id, attempt });
        this.dispatch(worker.id, jobId, job?.payload, attempt);
      }
    }

    if (assignments.length > 0) {
      this.logger.debug(`Assigned ${assignments.length} jobs`);
    }

    return assignments;
  }

  /**
   * Resolves once no dispatch is awaiting an acknowledgement
   */
  async whenIdle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled(Array.from(this.inFlight));
    }
  }

  getInFlightCount(): number {
    return this.inFlight.size;
  }

  private dispatch(workerId: string, jobId: string, payload: unknown, attempt: number): void {
    const label = `dispatch of job ${jobId} to ${workerId}`;

    let sent: Promise<void>;
    try {
      sent = this.channel.dispatch(workerId, { jobId, payload, attempt });
    } catch (error) {
      sent = Promise.reject(error);
    }

    const settled = withTimeout(sent, this.options.dispatchTimeoutMs, label)
      .then(
        () => this.onAcknowledged(workerId, jobId, attempt),
        (error: unknown) => this.onDispatchFailed(workerId, jobId, attempt, error)
      )
      .catch((error: unknown) => {
        this.logger.error(`Failed to record outcome of ${label}:`, error);
      })
      .finally(() => {
        this.inFlight.delete(settled);
      });

    this.inFlight.add(settled);
  }

  /**
   * True while the job is still the same assignment this dispatch made
   */
  private isCurrent(workerId: string, jobId: string, attempt: number): boolean {
    const job = this.queue.get(jobId);
    return (
      job !== null &&
      job.state === 'assigned' &&
      job.workerId === workerId &&
      job.attempts === attempt
    );
  }

  private onAcknowledged(workerId: string, jobId: string, attempt: number): void {
    if (!this.isCurrent(workerId, jobId, attempt)) {
      this.logger.debug(`Ignoring stale acknowledgement for job ${jobId} from ${workerId}`);
      return;
    }
    this.queue.markRunning(jobId, workerId);
  }

  private onDispatchFailed(workerId: string, jobId: string, attempt: number, error: unknown): void {
    const reason = error instanceof Error ? error.message : String(error);

    if (!this.isCurrent(workerId, jobId, attempt)) {
      this.logger.debug(`Ignoring stale dispatch failure for job ${jobId}: ${reason}`);
      return;
    }

    if (error instanceof ChannelReplacedError) {
      // the worker is still there on its new socket; only this dispatch is lost
      this.registry.release(workerId, jobId);
      this.queue.requeue([jobId]);
      this.logger.info(`Requeued job ${jobId}: ${reason}`);
      return;
    }

    const kind = isOrchestrationError(error) ? error.kind : 'TransportFailure';
    this.logger.warn(`Dispatch of job ${jobId} to ${workerId} failed (${kind}): ${reason}`);

    // the worker-lost listener requeues this job along with anything else it held
    this.registry.markOffline(workerId, `dispatch failed: ${reason}`);
  }

  /**
   * Jobs held by a worker that went offline go back to the front of the
   * queue, unless they have used up their dispatch attempts
   */
  private recoverJobs(workerId: string, jobIds: string[], reason: string): void {
    const requeue: string[] = [];

    for (const jobId of jobIds) {
      const job = this.queue.get(jobId);
      if (!job || isTerminal(job.state) || job.state === 'queued') continue;

      // a late ack must not start a job we are about to hand to someone else
      this.sendAbort(workerId, jobId);

      if (job.attempts >= this.options.maxDispatchAttempts) {
        this.queue.finish(jobId, {
          status: 'failed',
          code: null,
          data: null,
          error: `TransportFailure: worker ${workerId} lost after ${job.attempts} attempts (${reason})`,
        });
      } else {
        requeue.push(jobId);
      }
    }

    const requeued = this.queue.requeue(requeue);
    if (requeued.length > 0) {
      this.logger.info(`Requeued ${requeued.length} jobs from worker ${workerId}`);
    }
  }

  private sendAbort(workerId: string, jobId: string): void {
    try {
      this.channel.abort(workerId, jobId);
    } catch (error) {
      this.logger.debug(`Abort for job ${jobId} not delivered: ${String(error)}`);
    }
  }
}
