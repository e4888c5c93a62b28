import { Liveness, Worker, WorkerHandle, WorkerRecord, WorkerStatus } from '../../core/entities/Worker.js';
import { IWorkerRepository } from '../../core/interfaces/IWorkerRepository.js';
import {
  CapacityExceededError,
  InvalidRequestError,
  InvalidStateError,
  UnknownWorkerError,
} from '../../core/errors/OrchestrationError.js';
import { Logger, silentLogger } from '../../utils/logger.js';

interface WorkerEntry {
  id: string;
  capacity: number;
  liveness: Liveness;
  registeredAt: Date;
  lastHeartbeat: Date;
  offlineReason?: string;
  activeJobIds: Set<string>;
}

export interface WorkerRegistryOptions {
  heartbeatTimeoutMs: number;
  /** How long an offline worker is kept before it is forgotten */
  removalGraceMs: number;
  sweepIntervalMs: number;
  now?: () => number;
  logger?: Logger;
}

export interface SweepReport {
  offline: string[];
  removed: string[];
}

/**
 * Called with the jobs a worker held when it went offline
 */
export type WorkerLostCallback = (workerId: string, jobIds: string[], reason: string) => void;

/**
 * Tracks known workers, their liveness, capacity and current load
 */
export class WorkerRegistry {
  // Map iteration order is insertion order, i.e. first registration
  private workers: Map<string, WorkerEntry> = new Map();
  private sweepTimer: NodeJS.Timeout | null = null;
  private workerLostCallback?: WorkerLostCallback;
  private readonly now: () => number;
  private readonly logger: Logger;

  constructor(
    private options: WorkerRegistryOptions,
    private workerRepo?: IWorkerRepository
  ) {
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? silentLogger;

    if (this.workerRepo) {
      this.loadWorkersFromDatabase();
    }
  }

  /**
   * Restore known workers as offline; they come back with their next heartbeat
   */
  private loadWorkersFromDatabase(): void {
    if (!this.workerRepo) return;

    try {
      const records = this.workerRepo.getAllWorkers();
      for (const record of records) {
        this.workers.set(record.id, {
          id: record.id,
          capacity: record.capacity,
          liveness: 'offline',
          registeredAt: record.registeredAt,
          lastHeartbeat: record.lastHeartbeat,
          offlineReason: record.liveness === 'offline' ? record.offlineReason : 'master restarted',
          activeJobIds: new Set(),
        });
      }
      this.logger.info(`Restored ${records.length} workers from database`);
    } catch (error) {
      this.logger.error('Error loading workers from database:', error);
    }
  }

  /**
   * Register a worker, or refresh an existing registration
   */
  register(workerId: string, capacity: number): WorkerHandle {
    if (!workerId) {
      throw new InvalidRequestError('Worker id must not be empty');
    }
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new InvalidRequestError(`Capacity must be a positive integer, got ${capacity}`);
    }

    const now = new Date(this.now());
    let entry = this.workers.get(workerId);

    if (entry) {
      if (capacity < entry.activeJobIds.size) {
        throw new CapacityExceededError(workerId, capacity);
      }
      const wasOffline = entry.liveness === 'offline';
      entry.capacity = capacity;
      entry.liveness = 'live';
      entry.lastHeartbeat = now;
      entry.offlineReason = undefined;
      this.logger.info(
        `Worker ${workerId} re-registered (capacity ${capacity}${wasOffline ? ', back online' : ''})`
      );
    } else {
      entry = {
        id: workerId,
        capacity,
        liveness: 'live',
        registeredAt: now,
        lastHeartbeat: now,
        activeJobIds: new Set(),
      };
      this.workers.set(workerId, entry);
      this.logger.info(`Worker ${workerId} registered (capacity ${capacity})`);
    }

    this.persist(entry);

    return {
      id: entry.id,
      capacity: entry.capacity,
      status: this.statusOf(entry),
      registeredAt: entry.registeredAt,
    };
  }

  heartbeat(workerId: string): void {
    const entry = this.require(workerId);
    entry.lastHeartbeat = new Date(this.now());

    if (entry.liveness === 'offline') {
      entry.liveness = 'live';
      entry.offlineReason = undefined;
      this.logger.info(`Worker ${workerId} back online`);
    }

    this.persist(entry);
  }

  /**
   * Snapshot of all workers in registration order
   */
  list(): Worker[] {
    return Array.from(this.workers.values(), (entry) => this.snapshot(entry));
  }

  get(workerId: string): Worker | null {
    const entry = this.workers.get(workerId);
    return entry ? this.snapshot(entry) : null;
  }

  has(workerId: string): boolean {
    return this.workers.has(workerId);
  }

  getStatus(workerId: string): WorkerStatus {
    return this.statusOf(this.require(workerId));
  }

  availableCapacity(workerId: string): number {
    const entry = this.require(workerId);
    if (entry.liveness === 'offline') return 0;
    return entry.capacity - entry.activeJobIds.size;
  }

  /**
   * Record that a job now occupies one of the worker's slots
   */
  assign(workerId: string, jobId: string): void {
    const entry = this.require(workerId);

    if (entry.liveness === 'offline') {
      throw new InvalidStateError(`Worker ${workerId} is offline`);
    }
    if (entry.activeJobIds.has(jobId)) return;
    if (entry.activeJobIds.size >= entry.capacity) {
      throw new CapacityExceededError(workerId, entry.capacity);
    }

    entry.activeJobIds.add(jobId);
  }

  /**
   * Free the slot a job held. Returns false when the worker did not hold it
   * (already released, or the worker is gone).
   */
  release(workerId: string, jobId: string): boolean {
    const entry = this.workers.get(workerId);
    if (!entry) return false;
    return entry.activeJobIds.delete(jobId);
  }

  /**
   * Take a worker out of rotation until it heartbeats again. Jobs it held
   * are handed to the worker-lost listener.
   */
  markOffline(workerId: string, reason: string): string[] {
    const entry = this.require(workerId);
    const jobIds = Array.from(entry.activeJobIds);

    entry.liveness = 'offline';
    entry.offlineReason = reason;
    entry.activeJobIds.clear();
    this.persist(entry);

    this.logger.warn(`Worker ${workerId} marked offline (${reason}); ${jobIds.length} jobs released`);
    this.workerLostCallback?.(workerId, jobIds, reason);

    return jobIds;
  }

  /**
   * One liveness pass: stale live workers go offline, long-offline workers
   * are removed
   */
  sweep(): SweepReport {
    const now = this.now();
    const report: SweepReport = { offline: [], removed: [] };

    for (const entry of Array.from(this.workers.values())) {
      const age = now - entry.lastHeartbeat.getTime();

      if (entry.liveness === 'live' && age > this.options.heartbeatTimeoutMs) {
        this.markOffline(entry.id, `no heartbeat for ${age}ms`);
        report.offline.push(entry.id);
      } else if (
        entry.liveness === 'offline' &&
        age > this.options.heartbeatTimeoutMs + this.options.removalGraceMs
      ) {
        this.remove(entry.id);
        report.removed.push(entry.id);
      }
    }

    return report;
  }

  start(): void {
    if (this.sweepTimer) return;
    this.sweepTimer = setInterval(() => {
      try {
        this.sweep();
      } catch (error) {
        this.logger.error('Liveness sweep failed:', error);
      }
    }, this.options.sweepIntervalMs);
  }

  stop(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
  }

  onWorkerLost(callback: WorkerLostCallback): void {
    this.workerLostCallback = callback;
  }

  private remove(workerId: string): void {
    const entry = this.workers.get(workerId);
    if (!entry) return;

    // only offline workers get here, and markOffline already released their jobs
    this.workers.delete(workerId);
    this.logger.info(`Worker ${workerId} removed after grace period`);

    if (this.workerRepo) {
      try {
        this.workerRepo.deleteWorker(workerId);
      } catch (error) {
        this.logger.error(`Failed to delete worker ${workerId} from database:`, error);
      }
    }
  }

  private require(workerId: string): WorkerEntry {
    const entry = this.workers.get(workerId);
    if (!entry) {
      throw new UnknownWorkerError(workerId);
    }
    return entry;
  }

  private statusOf(entry: WorkerEntry): WorkerStatus {
    if (entry.liveness === 'offline') return 'offline';
    return entry.activeJobIds.size >= entry.capacity ? 'busy' : 'online';
  }

  private snapshot(entry: WorkerEntry): Worker {
    return {
      id: entry.id,
      status: this.statusOf(entry),
      capacity: entry.capacity,
      load: entry.activeJobIds.size,
      activeJobIds: Array.from(entry.activeJobIds),
      registeredAt: entry.registeredAt,
      lastHeartbeat: entry.lastHeartbeat,
      offlineReason: entry.offlineReason,
    };
  }

  private persist(entry: WorkerEntry): void {
    if (!this.workerRepo) return;

    const record: WorkerRecord = {
      id: entry.id,
      capacity: entry.capacity,
      liveness: entry.liveness,
      registeredAt: entry.registeredAt,
      lastHeartbeat: entry.lastHeartbeat,
      offlineReason: entry.offlineReason,
    };

    try {
      this.workerRepo.saveWorker(record);
    } catch (error) {
      this.logger.error(`Failed to persist worker ${entry.id} to database:`, error);
    }
  }
}
