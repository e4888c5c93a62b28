import { WorkerRecord } from '../entities/Worker.js';

/**
 * Interface for worker persistence
 */
export interface IWorkerRepository {
  saveWorker(worker: WorkerRecord): void;

  loadWorker(workerId: string): WorkerRecord | null;

  /**
   * All workers, ordered by registration time
   */
  getAllWorkers(): WorkerRecord[];

  deleteWorker(workerId: string): void;
}
