import { DatabaseConnection, IN_MEMORY } from '../src/infrastructure/database/DatabaseConnection.js';
import { JobRepository } from '../src/infrastructure/database/repositories/JobRepository.js';
import { WorkerRepository } from '../src/infrastructure/database/repositories/WorkerRepository.js';
import { JobQueue } from '../src/infrastructure/queue/JobQueue.js';
import { WorkerRegistry } from '../src/infrastructure/registry/WorkerRegistry.js';

describe('SQLite persistence', () => {
  let connection: DatabaseConnection;
  let jobRepo: JobRepository;
  let workerRepo: WorkerRepository;

  beforeEach(() => {
    // Use in-memory database for tests
    connection = new DatabaseConnection(IN_MEMORY);
    jobRepo = new JobRepository(connection.getDatabase());
    workerRepo = new WorkerRepository(connection.getDatabase());
  });

  afterEach(() => {
    connection.close();
  });

  test('should save and load a finished job with its result', () => {
    const queue = new JobQueue(jobRepo);
    const jobId = queue.submit({ file: 'a.txt', lines: [1, 2] });
    queue.dequeueFor('w1');
    queue.markRunning(jobId, 'w1');
    queue.finish(jobId, { status: 'failed', code: 4, data: { partial: true }, error: 'timeout' });

    const loaded = jobRepo.loadJob(jobId);
    expect(loaded?.state).toBe('failed');
    expect(loaded?.payload).toEqual({ file: 'a.txt', lines: [1, 2] });
    expect(loaded?.workerId).toBe('w1');
    expect(loaded?.attempts).toBe(1);
    expect(loaded?.startedAt).toBeInstanceOf(Date);
    expect(loaded?.result).toEqual({ status: 'failed', code: 4, data: { partial: true }, error: 'timeout' });
  });

  test('should return null for a job that was never saved', () => {
    expect(jobRepo.loadJob('missing')).toBeNull();
  });

  test('should keep progress history when the job row is updated', () => {
    const queue = new JobQueue(jobRepo);
    const jobId = queue.submit('x');
    queue.dequeueFor('w1');
    queue.updateProgress(jobId, 10, 'reading');
    queue.updateProgress(jobId, 60, 'writing');

    const progress = jobRepo.loadJobProgress(jobId);
    expect(progress.map((p) => [p.percentage, p.message])).toEqual([
      [10, 'reading'],
      [60, 'writing'],
    ]);
    expect(jobRepo.loadJob(jobId)?.progress).toBe(60);
  });

  test('should restore jobs on restart, requeueing in-flight ones in submission order', () => {
    const first = new JobQueue(jobRepo);
    const a = first.submit('a');
    const b = first.submit('b');
    const c = first.submit('c');
    first.dequeueFor('w1'); // a
    first.dequeueFor('w1'); // b
    first.finish(b, { status: 'completed', code: 0, data: 'ok' });

    const restored = new JobQueue(jobRepo);

    expect(restored.getQueuedIds()).toEqual([a, c]);
    expect(restored.get(a)?.workerId).toBeUndefined();
    expect(restored.get(a)?.attempts).toBe(1);
    expect(restored.get(b)?.result?.data).toBe('ok');
    expect(restored.getStatistics()).toEqual({
      totalSubmitted: 3,
      queued: 2,
      assigned: 0,
      running: 0,
      completed: 1,
      failed: 0,
      cancelled: 0,
    });
  });

  test('should delete only old terminal jobs', () => {
    const queue = new JobQueue(jobRepo);
    const done = queue.submit('done');
    const waiting = queue.submit('waiting');
    queue.cancel(done);

    expect(jobRepo.deleteJobsByAge(-1)).toBe(1);
    expect(jobRepo.loadJob(done)).toBeNull();
    expect(jobRepo.loadJob(waiting)?.state).toBe('queued');
  });

  test('should restore workers as offline in registration order', () => {
    let clock = 1_000;
    const options = { heartbeatTimeoutMs: 1000, removalGraceMs: 1000, sweepIntervalMs: 500, now: () => clock };
    const registry = new WorkerRegistry(options, workerRepo);
    registry.register('w1', 2);
    clock += 10;
    registry.register('w2', 1);
    registry.markOffline('w2', 'channel closed');

    const restored = new WorkerRegistry(options, workerRepo);
    const workers = restored.list();

    expect(workers.map((w) => [w.id, w.status, w.capacity, w.offlineReason])).toEqual([
      ['w1', 'offline', 2, 'master restarted'],
      ['w2', 'offline', 1, 'channel closed'],
    ]);

    restored.heartbeat('w1');
    expect(restored.getStatus('w1')).toBe('online');
    expect(workerRepo.loadWorker('w1')?.liveness).toBe('live');
  });

  test('should keep the original registration time on re-registration', () => {
    let clock = 1_000;
    const registry = new WorkerRegistry(
      { heartbeatTimeoutMs: 1000, removalGraceMs: 1000, sweepIntervalMs: 500, now: () => clock },
      workerRepo
    );
    registry.register('w1', 1);
    clock = 9_000;
    registry.register('w1', 3);

    const record = workerRepo.loadWorker('w1');
    expect(record?.registeredAt.getTime()).toBe(1_000);
    expect(record?.lastHeartbeat.getTime()).toBe(9_000);
    expect(record?.capacity).toBe(3);
  });

  test('should report statistics', () => {
    const queue = new JobQueue(jobRepo);
    queue.submit('a');
    queue.cancel(queue.submit('b'));
    workerRepo.saveWorker({
      id: 'w1',
      capacity: 1,
      liveness: 'live',
      registeredAt: new Date(0),
      lastHeartbeat: new Date(0),
    });

    const stats = connection.getStatistics();
    expect(stats.totalJobs).toBe(2);
    expect(stats.totalWorkers).toBe(1);
    expect(stats.jobStates).toEqual({ queued: 1, cancelled: 1 });
    expect(stats.databaseSize).toBe(0);
  });
});
