import { z } from 'zod';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { MasterController } from '../../application/services/MasterController.js';
import { JOB_SORT_ORDERS, JOB_STATES, Job, JobPage, JobState } from '../../core/entities/Job.js';
import type { JobStatistics } from '../../infrastructure/queue/JobQueue.js';
import { JobListLimitSchema } from '../../core/validation/schemas.js';
import { serializeJob } from '../../infrastructure/web/WebServer.js';
import { errorResult, jsonBlock, textResult } from './toolResult.js';

const STATE_EMOJI: Record<JobState, string> = {
  queued: '⏳',
  assigned: '📤',
  running: '🔄',
  completed: '✅',
  failed: '❌',
  cancelled: '⛔',
};

export function formatJob(job: Job): string {
  const progressText = job.progressUpdates
    .map((update) => `- [${update.percentage}%] ${update.timestamp.toISOString()}: ${update.message}`)
    .join('\n');

  return `# ${STATE_EMOJI[job.state]} Job ${job.id}

## Status
- **State**: ${job.state}
- **Worker**: ${job.workerId ?? 'unassigned'}
- **Attempts**: ${job.attempts}
- **Progress**: ${job.progress}%
- **Submitted**: ${job.submittedAt.toISOString()}
${job.startedAt ? `- **Started**: ${job.startedAt.toISOString()}\n` : ''}${job.finishedAt ? `- **Finished**: ${job.finishedAt.toISOString()}\n` : ''}
## Progress Updates
${progressText || 'No progress updates yet'}`;
}

export function formatJobList(page: JobPage, stats: JobStatistics): string {
  const shown = page.jobs.map(serializeJob);
  const more =
    page.total > shown.length
      ? `\n\nShowing ${shown.length} of ${page.total} jobs; pass all=true to see everything`
      : '';

  return `# Job Queue Status

## Statistics
- Total Submitted: ${stats.totalSubmitted}
- Queued: ${stats.queued}
- Assigned: ${stats.assigned}
- Running: ${stats.running}
- Completed: ${stats.completed}
- Failed: ${stats.failed}
- Cancelled: ${stats.cancelled}

## Jobs
${shown.length === 0 ? 'No jobs found' : jsonBlock(shown)}${more}`;
}

/**
 * Register the job tools: submit, cancel, status, result and listing
 */
export function registerJobTools(server: McpServer, master: MasterController, onSubmitted?: (jobId: string) => void) {
  server.tool(
    'submit-job',
    'Submit a job to the queue. The payload is forwarded to whichever worker runs it.',
    {
      payload: z.unknown().describe('Opaque job payload (any JSON value)'),
    },
    async ({ payload }) => {
      try {
        const jobId = master.submit(payload ?? null);
        onSubmitted?.(jobId);
        return textResult(`# Job Submitted

Job ID: ${jobId}
State: queued

Use \`get-job-status\` to follow it and \`get-job-result\` once it finishes.`);
      } catch (error) {
        return errorResult('submitting job', error);
      }
    }
  );

  server.tool(
    'cancel-job',
    'Cancel a queued or running job',
    {
      job_id: z.string().describe('The ID of the job to cancel'),
    },
    async ({ job_id }) => {
      try {
        const job = master.cancel(job_id);
        return textResult(`# Job Cancelled

Job ID: ${job.id}
State: ${job.state}
Cancelled at: ${job.finishedAt?.toISOString() ?? new Date().toISOString()}`);
      } catch (error) {
        return errorResult('cancelling job', error);
      }
    }
  );

  server.tool(
    'get-job-status',
    'Get the state, assigned worker and progress of a job',
    {
      job_id: z.string().describe('The ID of the job to check'),
    },
    async ({ job_id }) => {
      try {
        return textResult(formatJob(master.getJob(job_id)));
      } catch (error) {
        return errorResult('getting job status', error);
      }
    }
  );

  server.tool(
    'get-job-result',
    'Get the result of a finished job, or its current state if it is still pending',
    {
      job_id: z.string().describe('The ID of the job'),
    },
    async ({ job_id }) => {
      try {
        const lookup = master.getResult(job_id);
        if (lookup.kind === 'pending') {
          return textResult(`Job ${job_id} has not finished yet (state: ${lookup.state})`);
        }

        const { result } = lookup;
        return textResult(`# ${STATE_EMOJI[result.status]} Job ${job_id}: ${result.status}

- **Code**: ${result.code ?? 'n/a'}
${result.error ? `- **Error**: ${result.error}\n` : ''}
## Data
${jsonBlock(result.data)}`);
      } catch (error) {
        return errorResult('getting job result', error);
      }
    }
  );

  server.tool(
    'list-jobs',
    'List jobs with their state and progress, oldest first. Shows the first 20 unless all is set.',
    {
      state: z.enum(JOB_STATES).optional().describe('Filter jobs by state (optional)'),
      worker_id: z.string().optional().describe('Only jobs held or finished by this worker (optional)'),
      order: z.enum(JOB_SORT_ORDERS).optional().describe("'oldest' (default) or 'newest' first"),
      limit: JobListLimitSchema.optional().describe('Maximum number of jobs to show (default 20)'),
      all: z.boolean().optional().describe('Show every matching job'),
    },
    async ({ state, worker_id, order, limit, all }) => {
      try {
        const page = master.listJobs({ state, workerId: worker_id, order, limit, all });
        return textResult(formatJobList(page, master.getStatistics()));
      } catch (error) {
        return errorResult('listing jobs', error);
      }
    }
  );
}
