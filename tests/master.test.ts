import { MasterController, MasterSettings } from '../src/application/services/MasterController.js';
import type { JobListQuery } from '../src/core/entities/Job.js';
import { OrchestrationError } from '../src/core/errors/OrchestrationError.js';
import { FakeWorkerChannel } from './helpers/FakeWorkerChannel.js';

const settings: MasterSettings = {
  heartbeatTimeoutMs: 1000,
  removalGraceMs: 10_000,
  sweepIntervalMs: 500,
  schedulerIntervalMs: 100,
  dispatchTimeoutMs: 5000,
  maxDispatchAttempts: 3,
  resultRetentionHours: 24,
};

function errorKind(fn: () => unknown): string | null {
  try {
    fn();
    return null;
  } catch (error) {
    return error instanceof OrchestrationError ? error.kind : 'other';
  }
}

describe('MasterController', () => {
  let clock: number;
  let channel: FakeWorkerChannel;
  let master: MasterController;

  beforeEach(() => {
    clock = 5_000_000;
    channel = new FakeWorkerChannel();
    master = new MasterController(settings, { channel, now: () => clock });
  });

  afterEach(async () => {
    channel.ackAll();
    await master.whenIdle();
    await master.stop();
  });

  test('starts empty', () => {
    expect(master.masterInfo()).toEqual({
      workerCount: 0,
      onlineCount: 0,
      queuedCount: 0,
      runningCount: 0,
      completedCount: 0,
      failedCount: 0,
      cancelledCount: 0,
      totalSubmitted: 0,
    });
    expect(master.slaveList()).toEqual([]);
  });

  test('recovers the job of a worker that stops heartbeating', async () => {
    master.register('A', 1);
    master.register('B', 1);
    channel.connect('A', 'B');
    const j1 = master.submit({ n: 1 });
    const j2 = master.submit({ n: 2 });

    master.runOnce();
    expect(master.getJob(j1).workerId).toBe('A');
    expect(master.getJob(j2).workerId).toBe('B');
    channel.ackAll();
    await master.whenIdle();

    // A goes silent, B keeps heartbeating
    clock += 1500;
    master.heartbeat('B');
    master.runOnce();

    expect(master.getWorkerStatus('A')).toBe('offline');
    expect(master.getJob(j1).state).toBe('queued');
    expect(master.masterInfo()).toMatchObject({ workerCount: 2, onlineCount: 1, queuedCount: 1, runningCount: 1 });

    // a late report from A no longer counts
    expect(errorKind(() => master.report(j1, 'A', { status: 'completed', code: 0 }))).toBe('WorkerMismatch');

    master.report(j2, 'B', { status: 'completed', code: 0, data: 'two' });
    master.runOnce();
    expect(master.getJob(j1)).toMatchObject({ state: 'assigned', workerId: 'B', attempts: 2 });

    channel.ack('B', j1);
    await master.whenIdle();
    master.report(j1, 'B', { status: 'completed', code: 0, data: 'one' });

    expect(master.getResult(j1)).toEqual({
      kind: 'result',
      jobId: j1,
      result: { status: 'completed', code: 0, data: 'one' },
    });
    expect(master.masterInfo()).toEqual({
      workerCount: 2,
      onlineCount: 1,
      queuedCount: 0,
      runningCount: 0,
      completedCount: 2,
      failedCount: 0,
      cancelledCount: 0,
      totalSubmitted: 2,
    });
  });

  test('cancelling a dispatched job frees the slot and signals the worker', () => {
    master.register('A', 1);
    channel.connect('A');
    const jobId = master.submit('x');
    master.runOnce();

    const job = master.cancel(jobId);

    expect(job.state).toBe('cancelled');
    expect(master.getWorker('A').load).toBe(0);
    expect(channel.aborted).toEqual([{ workerId: 'A', jobId }]);
    expect(errorKind(() => master.cancel(jobId))).toBe('InvalidState');
    expect(master.report(jobId, 'A', { status: 'completed', code: 0 })).toEqual({
      jobId,
      applied: false,
      state: 'cancelled',
    });
  });

  test('pull-mode workers take jobs with dequeueFor', () => {
    master.register('P', 1);
    const jobId = master.submit('x');

    expect(master.dequeueFor('P')).toBe(jobId);
    expect(errorKind(() => master.dequeueFor('P'))).toBe('CapacityExceeded');
    expect(master.acknowledge(jobId, 'P')).toEqual({ jobId, applied: true, state: 'running' });

    master.report(jobId, 'P', { status: 'failed', code: 7, error: 'bad input' });
    expect(master.dequeueFor('P')).toBeNull();
    expect(master.masterInfo().failedCount).toBe(1);
  });

  test('dequeueFor refuses unknown and offline workers', () => {
    master.register('P', 1);
    master.markWorkerOffline('P', 'channel closed');

    expect(errorKind(() => master.dequeueFor('ghost'))).toBe('UnknownWorker');
    expect(errorKind(() => master.dequeueFor('P'))).toBe('InvalidState');
  });

  test('a worker whose channel closes hands its jobs back at once', () => {
    master.register('A', 1);
    channel.connect('A');
    const jobId = master.submit('x');
    master.runOnce();

    master.markWorkerOffline('A', 'channel closed: socket closed');

    expect(master.getWorkerStatus('A')).toBe('offline');
    expect(master.getJob(jobId).state).toBe('queued');
    expect(() => master.markWorkerOffline('ghost', 'gone')).not.toThrow();
  });

  test('lists jobs by state', () => {
    const a = master.submit('a');
    const b = master.submit('b');
    master.cancel(a);

    const ids = (query: JobListQuery) => master.listJobs(query).jobs.map((j) => j.id);

    expect(ids({ state: 'queued' })).toEqual([b]);
    expect(ids({ state: 'cancelled' })).toEqual([a]);
    expect(ids({})).toEqual([a, b]);
    expect(ids({ order: 'newest', limit: 1 })).toEqual([b]);
    expect(master.listJobs({ limit: 1 })).toMatchObject({ total: 2, limit: 1 });
    expect(master.getResult(b)).toEqual({ kind: 'pending', jobId: b, state: 'queued' });
  });

  test('start and stop are idempotent', async () => {
    master.start();
    master.start();
    expect(master.isStarted()).toBe(true);

    await master.stop();
    await master.stop();
    expect(master.isStarted()).toBe(false);
  });
});
