/**
 * Job domain entity
 */
export const JOB_STATES = ['queued', 'assigned', 'running', 'completed', 'failed', 'cancelled'] as const;

export type JobState = (typeof JOB_STATES)[number];

export const TERMINAL_STATES: ReadonlySet<JobState> = new Set<JobState>([
  'completed',
  'failed',
  'cancelled',
]);

/**
 * Legal state transitions. Terminal states have no outgoing edges.
 */
export const JOB_TRANSITIONS: Record<JobState, readonly JobState[]> = {
  queued: ['assigned', 'cancelled'],
  assigned: ['running', 'queued', 'completed', 'failed', 'cancelled'],
  running: ['completed', 'failed', 'queued', 'cancelled'],
  completed: [],
  failed: [],
  cancelled: [],
};

export function isTerminal(state: JobState): boolean {
  return TERMINAL_STATES.has(state);
}

export function canTransition(from: JobState, to: JobState): boolean {
  return JOB_TRANSITIONS[from].includes(to);
}

/**
 * Outcome reported by a worker for a job it held
 */
export interface JobOutcome {
  status: 'completed' | 'failed';
  code: number;
  data?: unknown;
  error?: string;
}

/**
 * Stored result of a terminal job
 */
export interface JobResult {
  status: 'completed' | 'failed' | 'cancelled';
  code: number | null;
  data: unknown;
  error?: string;
}

export interface ProgressUpdate {
  timestamp: Date;
  message: string;
  percentage: number;
}

export interface Job {
  id: string;
  payload: unknown;
  state: JobState;
  workerId?: string; // lookup key into the worker registry
  submittedAt: Date;
  assignedAt?: Date;
  startedAt?: Date;
  finishedAt?: Date;
  attempts: number;
  progress: number; // 0-100
  progressUpdates: ProgressUpdate[];
  result?: JobResult;
}

export type ResultLookup =
  | { kind: 'result'; jobId: string; result: JobResult }
  | { kind: 'pending'; jobId: string; state: JobState };

export interface ReportReceipt {
  jobId: string;
  applied: boolean;
  state: JobState;
}

export const JOB_SORT_ORDERS = ['oldest', 'newest'] as const;

export type JobSortOrder = (typeof JOB_SORT_ORDERS)[number];

export const DEFAULT_JOB_LIST_LIMIT = 20;

/**
 * Job listing filter. Without `all`, a listing stops after `limit` jobs
 * (default 20).
 */
export interface JobListQuery {
  state?: JobState;
  workerId?: string;
  order?: JobSortOrder;
  limit?: number;
  all?: boolean;
}

export interface JobPage {
  jobs: Job[];
  /** Jobs matching the filter before the limit applied */
  total: number;
  limit: number | null;
}
