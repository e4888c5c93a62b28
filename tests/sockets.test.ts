import WebSocket from 'ws';
import { MasterController } from '../src/application/services/MasterController.js';
import { WorkerChannelHub } from '../src/infrastructure/transport/WorkerChannelHub.js';
import { WebServer } from '../src/infrastructure/web/WebServer.js';

type Message = Record<string, unknown>;

/** ws client that buffers what it receives */
class TestSocket {
  private inbox: Message[] = [];
  private waiters: Array<(message: Message) => void> = [];

  private constructor(readonly ws: WebSocket) {
    ws.on('message', (data: WebSocket.RawData) => {
      const parsed: unknown = JSON.parse(data.toString());
      const message: Message = typeof parsed === 'object' && parsed !== null ? Object.fromEntries(Object.entries(parsed)) : {};
      const waiter = this.waiters.shift();
      if (waiter) {
        waiter(message);
      } else {
        this.inbox.push(message);
      }
    });
  }

  static open(url: string): Promise<TestSocket> {
    return new Promise((resolve, reject) => {
      const ws = new WebSocket(url);
      const socket = new TestSocket(ws);
      ws.once('open', () => resolve(socket));
      ws.once('error', reject);
    });
  }

  send(message: Message): void {
    this.ws.send(JSON.stringify(message));
  }

  next(): Promise<Message> {
    const queued = this.inbox.shift();
    if (queued) {
      return Promise.resolve(queued);
    }
    return new Promise((resolve) => this.waiters.push(resolve));
  }

  close(): Promise<void> {
    if (this.ws.readyState === WebSocket.CLOSED) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.ws.once('close', () => resolve());
      this.ws.close();
    });
  }
}

async function eventually(check: () => boolean, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!check()) {
    if (Date.now() > deadline) {
      throw new Error('condition not met in time');
    }
    await new Promise((resolve) => setTimeout(resolve, 10));
  }
}

describe('WebSocket endpoints on a listening server', () => {
  let hub: WorkerChannelHub;
  let master: MasterController;
  let web: WebServer;
  let baseUrl: string;
  const sockets: TestSocket[] = [];

  const open = async (path: string): Promise<TestSocket> => {
    const socket = await TestSocket.open(`${baseUrl}${path}`);
    sockets.push(socket);
    return socket;
  };

  beforeEach(async () => {
    hub = new WorkerChannelHub();
    master = new MasterController(
      {
        heartbeatTimeoutMs: 60_000,
        removalGraceMs: 60_000,
        sweepIntervalMs: 1000,
        schedulerIntervalMs: 1000,
        dispatchTimeoutMs: 5000,
        maxDispatchAttempts: 3,
        resultRetentionHours: 24,
      },
      { channel: hub }
    );
    hub.attachHandler(master);
    web = new WebServer(master, hub, 0);
    const server = web;
    master.onJobFinished((job) => server.notifyJobUpdate(job.id, job.state));
    await web.start();
    baseUrl = `ws://127.0.0.1:${web.getPort() ?? 0}`;
  });

  afterEach(async () => {
    await Promise.all(sockets.splice(0).map((socket) => socket.close()));
    await hub.closeAll();
    await master.whenIdle();
    await master.stop();
    await web.stop();
  });

  test('event clients are greeted on connect', async () => {
    const events = await open('/events');

    expect(await events.next()).toMatchObject({ type: 'connected' });
  });

  test('a worker runs a job over /workers and /events hears about it', async () => {
    const events = await open('/events');
    await events.next();
    const worker = await open('/workers');

    worker.send({ type: 'register', workerId: 'w1', capacity: 1 });
    expect(await worker.next()).toEqual({ type: 'registered', workerId: 'w1', capacity: 1, status: 'online' });

    const jobId = master.submit({ task: 'echo' });
    master.runOnce();
    expect(await worker.next()).toEqual({ type: 'dispatch', jobId, payload: { task: 'echo' }, attempt: 1 });

    worker.send({ type: 'ack', jobId });
    worker.send({ type: 'report', jobId, outcome: { status: 'completed', code: 0, data: 'echo' } });
    expect(await worker.next()).toEqual({ type: 'report-ack', jobId, applied: true, state: 'completed' });

    expect(await events.next()).toMatchObject({ type: 'job_updated', jobId, state: 'completed' });
    expect(master.getResult(jobId)).toEqual({
      kind: 'result',
      jobId,
      result: { status: 'completed', code: 0, data: 'echo' },
    });
  });

  test('closing a worker socket takes the worker offline', async () => {
    const worker = await open('/workers');
    worker.send({ type: 'register', workerId: 'w1', capacity: 1 });
    await worker.next();

    await worker.close();
    await eventually(() => master.getWorkerStatus('w1') === 'offline');

    expect(master.getWorker('w1').offlineReason).toBe('channel closed: socket closed');
    expect(hub.isConnected('w1')).toBe(false);
  });

  test('upgrades on other paths are refused', async () => {
    await expect(TestSocket.open(`${baseUrl}/elsewhere`)).rejects.toBeInstanceOf(Error);
  });
});
