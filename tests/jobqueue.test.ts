import { JobQueue } from "../src/infrastructure/queue/JobQueue.js";
import { canTransition, JOB_STATES } from "../src/core/entities/Job.js";
import { InvalidStateError, WorkerMismatchError, JobNotFoundError } from "../src/core/errors/OrchestrationError.js";

describe("JobQueue", () => {
  let queue: JobQueue;

  beforeEach(() => {
    queue = new JobQueue();
  });

  describe("Job Submission", () => {
    test("should submit a job as queued with no worker", () => {
      const jobId = queue.submit({ task: "resize" });
      const job = queue.get(jobId);

      expect(job?.state).toBe("queued");
      expect(job?.workerId).toBeUndefined();
      expect(job?.attempts).toBe(0);
      expect(job?.payload).toEqual({ task: "resize" });
    });

    test("should give every job a distinct id", () => {
      const ids = new Set([queue.submit(1), queue.submit(2), queue.submit(3)]);
      expect(ids.size).toBe(3);
    });

    test("should return null for non-existent job", () => {
      expect(queue.get("non-existent-id")).toBeNull();
    });
  });

  describe("FIFO order", () => {
    test("should dequeue in submission order", () => {
      const a = queue.submit("a");
      const b = queue.submit("b");
      const c = queue.submit("c");

      expect(queue.dequeueFor("w1")).toBe(a);
      expect(queue.dequeueFor("w1")).toBe(b);
      expect(queue.dequeueFor("w2")).toBe(c);
      expect(queue.dequeueFor("w2")).toBeNull();
    });

    test("should stamp the assignment on dequeue", () => {
      const jobId = queue.submit("x");
      queue.dequeueFor("w1");
      const job = queue.get(jobId);

      expect(job?.state).toBe("assigned");
      expect(job?.workerId).toBe("w1");
      expect(job?.attempts).toBe(1);
      expect(job?.assignedAt).toBeInstanceOf(Date);
    });

    test("should put requeued jobs ahead of newer submissions in submission order", () => {
      const a = queue.submit("a");
      const b = queue.submit("b");
      const c = queue.submit("c");
      queue.dequeueFor("w1");
      queue.dequeueFor("w1");

      // requested in reverse, restored in submission order
      expect(queue.requeue([b, a])).toEqual([a, b]);
      expect(queue.getQueuedIds()).toEqual([a, b, c]);

      const job = queue.get(a);
      expect(job?.state).toBe("queued");
      expect(job?.workerId).toBeUndefined();
      expect(job?.attempts).toBe(1);
    });

    test("should skip terminal and queued jobs on requeue", () => {
      const a = queue.submit("a");
      const b = queue.submit("b");
      queue.dequeueFor("w1");
      queue.finish(a, { status: "completed", code: 0, data: null });

      expect(queue.requeue([a, b])).toEqual([]);
      expect(queue.getQueuedIds()).toEqual([b]);
    });
  });

  describe("State transitions", () => {
    test("should run and complete an assigned job", () => {
      const jobId = queue.submit("x");
      queue.dequeueFor("w1");
      queue.markRunning(jobId, "w1");
      const job = queue.finish(jobId, { status: "completed", code: 0, data: { ok: true } });

      expect(job.state).toBe("completed");
      expect(job.progress).toBe(100);
      expect(job.startedAt).toBeInstanceOf(Date);
      expect(job.finishedAt).toBeInstanceOf(Date);
      expect(job.result).toEqual({ status: "completed", code: 0, data: { ok: true } });
    });

    test("should refuse markRunning from another worker", () => {
      const jobId = queue.submit("x");
      queue.dequeueFor("w1");

      expect(() => queue.markRunning(jobId, "w2")).toThrow(WorkerMismatchError);
      expect(queue.get(jobId)?.state).toBe("assigned");
    });

    test("should not leave a terminal state", () => {
      const jobId = queue.submit("x");
      queue.cancel(jobId);

      expect(() => queue.cancel(jobId)).toThrow(InvalidStateError);
      expect(() => queue.finish(jobId, { status: "failed", code: 1, data: null })).toThrow(InvalidStateError);
    });

    test("terminal states have no outgoing transitions", () => {
      for (const from of ["completed", "failed", "cancelled"] as const) {
        for (const to of JOB_STATES) {
          expect(canTransition(from, to)).toBe(false);
        }
      }
    });

    test("should cancel a queued job and drop it from the queue", () => {
      const a = queue.submit("a");
      const b = queue.submit("b");
      const { job, previousState } = queue.cancel(a);

      expect(previousState).toBe("queued");
      expect(job.state).toBe("cancelled");
      expect(job.result).toEqual({ status: "cancelled", code: null, data: null });
      expect(queue.getQueuedIds()).toEqual([b]);
    });

    test("should throw JobNotFound for unknown ids", () => {
      expect(() => queue.cancel("missing")).toThrow(JobNotFoundError);
    });
  });

  describe("Progress Tracking", () => {
    test("should clamp progress and record updates", () => {
      const jobId = queue.submit("x");
      queue.dequeueFor("w1");

      expect(queue.updateProgress(jobId, 150, "almost")).toBe(true);
      expect(queue.get(jobId)?.progress).toBe(100);
      expect(queue.updateProgress(jobId, -5, "rewind")).toBe(true);
      expect(queue.get(jobId)?.progress).toBe(0);
      expect(queue.get(jobId)?.progressUpdates.map((u) => u.message)).toEqual(["almost", "rewind"]);
    });

    test("should ignore progress for queued jobs", () => {
      const jobId = queue.submit("x");
      expect(queue.updateProgress(jobId, 50, "too early")).toBe(false);
      expect(queue.get(jobId)?.progress).toBe(0);
    });
  });

  describe("Listing", () => {
    test("should show the first 20 jobs in submission order by default", () => {
      const ids = Array.from({ length: 25 }, (_, i) => queue.submit(i));

      const page = queue.list();

      expect(page.jobs.map((j) => j.id)).toEqual(ids.slice(0, 20));
      expect(page.total).toBe(25);
      expect(page.limit).toBe(20);
    });

    test("should return everything with all, newest first on request", () => {
      const ids = Array.from({ length: 25 }, (_, i) => queue.submit(i));

      const page = queue.list({ all: true, order: "newest" });

      expect(page.jobs.map((j) => j.id)).toEqual([...ids].reverse());
      expect(page.limit).toBeNull();
    });

    test("should list in submission order even when the queue is not", () => {
      const a = queue.submit("a");
      const b = queue.submit("b");
      queue.dequeueFor("w1"); // a
      queue.dequeueFor("w1"); // b
      queue.requeue([a]);
      queue.requeue([b]);

      expect(queue.getQueuedIds()).toEqual([b, a]);
      expect(queue.list({ state: "queued" }).jobs.map((j) => j.id)).toEqual([a, b]);
    });

    test("should filter by worker and state", () => {
      const a = queue.submit("a");
      const b = queue.submit("b");
      const c = queue.submit("c");
      queue.dequeueFor("w1"); // a
      queue.dequeueFor("w2"); // b
      queue.dequeueFor("w1"); // c
      queue.finish(a, { status: "completed", code: 0, data: null });

      expect(queue.list({ workerId: "w1" }).jobs.map((j) => j.id)).toEqual([a, c]);
      expect(queue.list({ workerId: "w1", state: "assigned" }).jobs.map((j) => j.id)).toEqual([c]);
      expect(queue.list({ workerId: "w2" }).jobs.map((j) => j.id)).toEqual([b]);
      expect(queue.list({ workerId: "nobody" })).toEqual({ jobs: [], total: 0, limit: 20 });
    });
  });

  describe("Statistics", () => {
    test("should count every state", () => {
      const a = queue.submit("a");
      const b = queue.submit("b");
      const c = queue.submit("c");
      const d = queue.submit("d");
      queue.submit("e");

      queue.dequeueFor("w1"); // a
      queue.dequeueFor("w1"); // b
      queue.dequeueFor("w1"); // c
      queue.markRunning(b, "w1");
      queue.finish(c, { status: "failed", code: 2, data: null, error: "boom" });
      queue.cancel(d);

      expect(queue.getStatistics()).toEqual({
        totalSubmitted: 5,
        queued: 1,
        assigned: 1,
        running: 1,
        completed: 0,
        failed: 1,
        cancelled: 1,
      });
      expect(queue.getJobsByState("assigned").map((j) => j.id)).toEqual([a]);
    });

    test("should keep lifetime counters after old jobs are evicted", () => {
      const jobId = queue.submit("x");
      queue.cancel(jobId);

      expect(queue.clearOldJobs(-1)).toBe(1);
      expect(queue.get(jobId)).toBeNull();
      expect(queue.getStatistics().totalSubmitted).toBe(1);
      expect(queue.getStatistics().cancelled).toBe(1);
    });

    test("should notify when a job finishes", () => {
      const finished: string[] = [];
      queue.onJobFinished((job) => finished.push(`${job.id}:${job.state}`));
      const jobId = queue.submit("x");
      queue.cancel(jobId);

      expect(finished).toEqual([`${jobId}:cancelled`]);
    });
  });
});
