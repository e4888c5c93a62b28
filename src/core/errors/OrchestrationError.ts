/**
 * Error kinds surfaced to callers of the master.
 *
 * Each kind maps 1:1 to a numeric exit code (rendered by external clients)
 * and to an HTTP status used by the REST API.
 */
export type ErrorKind =
  | 'UnknownWorker'
  | 'JobNotFound'
  | 'InvalidState'
  | 'WorkerMismatch'
  | 'CapacityExceeded'
  | 'TransportFailure'
  | 'InvalidRequest';

export const ERROR_EXIT_CODES: Record<ErrorKind, number> = {
  UnknownWorker: 10,
  JobNotFound: 11,
  InvalidState: 12,
  WorkerMismatch: 13,
  CapacityExceeded: 14,
  TransportFailure: 15,
  InvalidRequest: 16,
};

export const ERROR_HTTP_STATUS: Record<ErrorKind, number> = {
  UnknownWorker: 404,
  JobNotFound: 404,
  InvalidState: 409,
  WorkerMismatch: 409,
  CapacityExceeded: 429,
  TransportFailure: 502,
  InvalidRequest: 400,
};

export class OrchestrationError extends Error {
  readonly code: number;

  constructor(
    readonly kind: ErrorKind,
    message: string
  ) {
    super(message);
    this.name = `${kind}Error`;
    this.code = ERROR_EXIT_CODES[kind];
  }

  toJSON(): { kind: ErrorKind; code: number; message: string } {
    return { kind: this.kind, code: this.code, message: this.message };
  }
}

export class UnknownWorkerError extends OrchestrationError {
  constructor(readonly workerId: string) {
    super('UnknownWorker', `Unknown worker: ${workerId}`);
  }
}

export class JobNotFoundError extends OrchestrationError {
  constructor(readonly jobId: string) {
    super('JobNotFound', `Job not found: ${jobId}`);
  }
}

export class InvalidStateError extends OrchestrationError {
  constructor(message: string) {
    super('InvalidState', message);
  }
}

export class WorkerMismatchError extends OrchestrationError {
  constructor(
    readonly jobId: string,
    readonly workerId: string,
    readonly assignedWorkerId: string | undefined
  ) {
    super(
      'WorkerMismatch',
      `Worker ${workerId} does not hold job ${jobId} (assigned: ${assignedWorkerId ?? 'none'})`
    );
  }
}

export class CapacityExceededError extends OrchestrationError {
  constructor(readonly workerId: string, capacity: number) {
    super('CapacityExceeded', `Worker ${workerId} is at capacity (${capacity})`);
  }
}

export class TransportFailureError extends OrchestrationError {
  constructor(message: string) {
    super('TransportFailure', message);
  }
}

/**
 * Dispatch lost because the worker reconnected on a new socket. The worker
 * itself is still reachable.
 */
export class ChannelReplacedError extends TransportFailureError {
  constructor(readonly workerId: string, readonly jobId: string) {
    super(`Channel to ${workerId} was replaced before job ${jobId} was acknowledged`);
  }
}

export class InvalidRequestError extends OrchestrationError {
  constructor(message: string) {
    super('InvalidRequest', message);
  }
}

export function isOrchestrationError(error: unknown): error is OrchestrationError {
  return error instanceof OrchestrationError;
}
