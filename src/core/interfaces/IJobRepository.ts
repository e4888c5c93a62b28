import { Job, ProgressUpdate } from '../entities/Job.js';

/**
 * Interface for job persistence
 */
export interface IJobRepository {
  saveJob(job: Job): void;

  loadJob(jobId: string): Job | null;

  getAllJobs(): Job[];

  saveJobProgress(jobId: string, update: ProgressUpdate): void;

  loadJobProgress(jobId: string): ProgressUpdate[];

  deleteJobsByAge(hoursOld: number): number;
}
