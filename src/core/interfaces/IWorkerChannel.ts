/**
 * Message pushed to a worker when a job is dispatched to it
 */
export interface DispatchMessage {
  jobId: string;
  payload: unknown;
  attempt: number;
}

/**
 * Push channel from the master to connected workers.
 *
 * dispatch() resolves when the worker acknowledges the job and rejects when
 * the worker rejects it or the message cannot be delivered. It has no
 * timeout of its own; callers bound it.
 */
export interface IWorkerChannel {
  isConnected(workerId: string): boolean;

  dispatch(workerId: string, message: DispatchMessage): Promise<void>;

  /**
   * Best-effort abort signal; delivery is not guaranteed
   */
  abort(workerId: string, jobId: string): void;
}
