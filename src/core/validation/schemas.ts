import { z } from 'zod';
import { JOB_SORT_ORDERS, JOB_STATES } from '../entities/Job.js';

export const WorkerIdSchema = z.string().min(1, 'workerId must not be empty').max(256);

export const CapacitySchema = z.number().int().min(1, 'capacity must be at least 1');

export const JobOutcomeSchema = z.object({
  status: z.enum(['completed', 'failed']),
  code: z.number().int(),
  data: z.unknown().optional(),
  error: z.string().optional(),
});

export const JobStateSchema = z.enum(JOB_STATES);

export const JobListLimitSchema = z.number().int().min(1, 'limit must be at least 1').max(1000);

// ---- HTTP request bodies ----

export const RegisterBodySchema = z.object({
  workerId: WorkerIdSchema,
  capacity: CapacitySchema,
});

export const SubmitBodySchema = z.object({
  payload: z.unknown(),
});

export const WorkerBodySchema = z.object({
  workerId: WorkerIdSchema,
});

export const ProgressBodySchema = z.object({
  workerId: WorkerIdSchema,
  percentage: z.number(),
  message: z.string().default(''),
});

export const ReportBodySchema = z.object({
  workerId: WorkerIdSchema,
  outcome: JobOutcomeSchema,
});

/**
 * Query string of GET /api/jobs; every value arrives as a string
 */
export const JobListQuerySchema = z.object({
  state: JobStateSchema.optional(),
  workerId: WorkerIdSchema.optional(),
  order: z.enum(JOB_SORT_ORDERS).optional(),
  limit: z.coerce.number().pipe(JobListLimitSchema).optional(),
  all: z
    .enum(['true', 'false'])
    .transform((value) => value === 'true')
    .optional(),
});

// ---- worker channel, worker -> master ----

export const WorkerMessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('register'), workerId: WorkerIdSchema, capacity: CapacitySchema }),
  z.object({ type: z.literal('heartbeat') }),
  z.object({ type: z.literal('ack'), jobId: z.string() }),
  z.object({ type: z.literal('reject'), jobId: z.string(), reason: z.string().default('rejected') }),
  z.object({
    type: z.literal('progress'),
    jobId: z.string(),
    percentage: z.number(),
    message: z.string().default(''),
  }),
  z.object({ type: z.literal('report'), jobId: z.string(), outcome: JobOutcomeSchema }),
]);

export type WorkerMessage = z.infer<typeof WorkerMessageSchema>;

/**
 * Master -> worker messages
 */
export type MasterMessage =
  | { type: 'registered'; workerId: string; capacity: number; status: string }
  | { type: 'dispatch'; jobId: string; payload: unknown; attempt: number }
  | { type: 'abort'; jobId: string }
  | { type: 'heartbeat-ack'; timestamp: string }
  | { type: 'report-ack'; jobId: string; applied: boolean; state: string }
  | { type: 'error'; kind: string; code: number; message: string; jobId?: string };

/**
 * Format zod issues as one line, e.g. `capacity: capacity must be at least 1`
 */
export function describeZodError(error: z.ZodError): string {
  return error.errors.map((e) => `${e.path.join('.') || 'body'}: ${e.message}`).join('; ');
}
