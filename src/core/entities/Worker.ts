/**
 * Worker (slave) domain entity
 */
export type WorkerStatus = 'online' | 'busy' | 'offline';

export type Liveness = 'live' | 'offline';

export interface Worker {
  id: string;
  status: WorkerStatus;
  capacity: number;
  load: number;
  activeJobIds: string[];
  registeredAt: Date;
  lastHeartbeat: Date;
  offlineReason?: string;
}

/**
 * Returned by register(); what a worker needs to know about itself
 */
export interface WorkerHandle {
  id: string;
  capacity: number;
  status: WorkerStatus;
  registeredAt: Date;
}

/**
 * Persisted form of a worker. Load is not persisted: held jobs do not
 * survive a restart of the master.
 */
export interface WorkerRecord {
  id: string;
  capacity: number;
  liveness: Liveness;
  registeredAt: Date;
  lastHeartbeat: Date;
  offlineReason?: string;
}
