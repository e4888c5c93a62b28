import { Job, JobOutcome, ReportReceipt, ResultLookup, isTerminal } from '../../core/entities/Job.js';
import { JobNotFoundError, WorkerMismatchError } from '../../core/errors/OrchestrationError.js';
import { JobQueue } from '../../infrastructure/queue/JobQueue.js';
import { WorkerRegistry } from '../../infrastructure/registry/WorkerRegistry.js';
import { Logger, silentLogger } from '../../utils/logger.js';

/**
 * Applies what workers report about the jobs they hold and answers result
 * queries.
 *
 * Reports may be delivered more than once. A report for a job that is
 * already terminal is accepted and ignored.
 */
export class ResultAggregator {
  private readonly logger: Logger;

  constructor(
    private queue: JobQueue,
    private registry: WorkerRegistry,
    logger?: Logger
  ) {
    this.logger = logger ?? silentLogger;
  }

  report(jobId: string, workerId: string, outcome: JobOutcome): ReportReceipt {
    const job = this.queue.get(jobId) ?? this.missing(jobId);

    if (isTerminal(job.state)) {
      this.logger.debug(`Duplicate report for ${job.state} job ${jobId} from ${workerId} ignored`);
      return { jobId, applied: false, state: job.state };
    }

    this.requireOwner(job, workerId);

    const finished = this.queue.finish(jobId, {
      status: outcome.status,
      code: outcome.code,
      data: outcome.data ?? null,
      error: outcome.error,
    });
    this.registry.release(workerId, jobId);

    this.logger.debug(`Job ${jobId} ${finished.state} on ${workerId} (code ${outcome.code})`);
    return { jobId, applied: true, state: finished.state };
  }

  /**
   * Worker confirms it started the job
   */
  acknowledge(jobId: string, workerId: string): ReportReceipt {
    const job = this.queue.get(jobId) ?? this.missing(jobId);

    if (isTerminal(job.state)) {
      return { jobId, applied: false, state: job.state };
    }

    this.requireOwner(job, workerId);
    if (job.state === 'running') {
      return { jobId, applied: false, state: job.state };
    }

    this.queue.markRunning(jobId, workerId);
    return { jobId, applied: true, state: 'running' };
  }

  progress(jobId: string, workerId: string, percentage: number, message: string): ReportReceipt {
    const job = this.queue.get(jobId) ?? this.missing(jobId);

    if (isTerminal(job.state)) {
      return { jobId, applied: false, state: job.state };
    }

    this.requireOwner(job, workerId);
    const applied = this.queue.updateProgress(jobId, percentage, message);
    return { jobId, applied, state: job.state };
  }

  getResult(jobId: string): ResultLookup {
    const job = this.queue.get(jobId) ?? this.missing(jobId);

    if (isTerminal(job.state) && job.result) {
      return { kind: 'result', jobId, result: job.result };
    }
    return { kind: 'pending', jobId, state: job.state };
  }

  private requireOwner(job: Job, workerId: string): void {
    if (job.workerId !== workerId || job.state === 'queued') {
      throw new WorkerMismatchError(job.id, workerId, job.workerId);
    }
  }

  private missing(jobId: string): never {
    throw new JobNotFoundError(jobId);
  }
}
