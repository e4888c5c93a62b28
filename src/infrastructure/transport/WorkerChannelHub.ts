import { IncomingMessage } from 'http';
import { Duplex } from 'stream';
import { WebSocketServer, WebSocket, RawData } from 'ws';
import { JobOutcome, ReportReceipt } from '../../core/entities/Job.js';
import { WorkerHandle } from '../../core/entities/Worker.js';
import { DispatchMessage, IWorkerChannel } from '../../core/interfaces/IWorkerChannel.js';
import {
  ChannelReplacedError,
  InvalidRequestError,
  OrchestrationError,
  TransportFailureError,
  isOrchestrationError,
} from '../../core/errors/OrchestrationError.js';
import {
  MasterMessage,
  WorkerMessage,
  WorkerMessageSchema,
  describeZodError,
} from '../../core/validation/schemas.js';
import { Logger, silentLogger } from '../../utils/logger.js';

/**
 * What the hub needs from the master to serve worker messages
 */
export interface WorkerSessionHandler {
  register(workerId: string, capacity: number): WorkerHandle;
  heartbeat(workerId: string): void;
  acknowledge(jobId: string, workerId: string): ReportReceipt;
  progress(jobId: string, workerId: string, percentage: number, message: string): ReportReceipt;
  report(jobId: string, workerId: string, outcome: JobOutcome): ReportReceipt;
  markWorkerOffline(workerId: string, reason: string): void;
}

/**
 * One end of a worker connection; a thin wrapper over a socket
 */
export interface WorkerConnection {
  send(message: MasterMessage): void;
  close(code?: number, reason?: string): void;
}

interface PendingDispatch {
  resolve: () => void;
  reject: (error: Error) => void;
}

export interface WorkerSession {
  readonly id: number;
  readonly connection: WorkerConnection;
  workerId?: string;
  pending: Map<string, PendingDispatch>;
  openedAt: Date;
}

/**
 * Push channel to workers over WebSocket.
 *
 * A socket becomes a worker's channel with its first `register` message.
 * Dispatches wait for the worker's `ack` or `reject`; the caller bounds the
 * wait.
 */
export class WorkerChannelHub implements IWorkerChannel {
  private wss: WebSocketServer;
  private sessions: Set<WorkerSession> = new Set();
  private byWorker: Map<string, WorkerSession> = new Map();
  private handler: WorkerSessionHandler | null = null;
  private nextSessionId = 1;
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? silentLogger;
    this.wss = new WebSocketServer({ noServer: true });
  }

  /**
   * Connect the hub to the master that serves worker messages
   */
  attachHandler(handler: WorkerSessionHandler): void {
    this.handler = handler;
  }

  /**
   * Accept an HTTP upgrade request as a worker socket
   */
  handleUpgrade(request: IncomingMessage, socket: Duplex, head: Buffer): void {
    this.wss.handleUpgrade(request, socket, head, (ws) => {
      this.acceptSocket(ws, request.socket.remoteAddress);
    });
  }

  private acceptSocket(ws: WebSocket, remoteAddress?: string): void {
    const session = this.openSession({
      send: (message) => {
        if (ws.readyState !== WebSocket.OPEN) {
          throw new TransportFailureError('Worker socket is not open');
        }
        ws.send(JSON.stringify(message));
      },
      close: (code, reason) => ws.close(code, reason),
    });

    this.logger.info(`Worker socket #${session.id} connected${remoteAddress ? ` from ${remoteAddress}` : ''}`);

    ws.on('message', (data: RawData) => {
      this.handleMessage(session, data.toString());
    });

    ws.on('close', () => {
      this.closeSession(session, 'socket closed');
    });

    ws.on('error', (error) => {
      this.logger.error(`Worker socket #${session.id} error:`, error);
      this.closeSession(session, `socket error: ${error.message}`);
    });
  }

  openSession(connection: WorkerConnection): WorkerSession {
    const session: WorkerSession = {
      id: this.nextSessionId++,
      connection,
      pending: new Map(),
      openedAt: new Date(),
    };
    this.sessions.add(session);
    return session;
  }

  /**
   * Forget a session; dispatches still waiting on it fail. A worker whose
   * socket drops is taken offline unless `notify` is false.
   */
  closeSession(session: WorkerSession, reason: string, notify = true): void {
    if (!this.sessions.delete(session)) return;

    this.failPending(
      session,
      (jobId) =>
        new TransportFailureError(
          `Channel to ${session.workerId ?? 'worker'} closed before job ${jobId} was acknowledged (${reason})`
        )
    );

    if (session.workerId && this.byWorker.get(session.workerId) === session) {
      this.byWorker.delete(session.workerId);
      this.logger.info(`Worker ${session.workerId} disconnected (${reason})`);
      if (notify && this.handler) {
        this.handler.markWorkerOffline(session.workerId, `channel closed: ${reason}`);
      }
    }
  }

  handleMessage(session: WorkerSession, raw: string): void {
    let message: WorkerMessage;
    try {
      const parsed = WorkerMessageSchema.safeParse(JSON.parse(raw));
      if (!parsed.success) {
        this.sendError(session, new InvalidRequestError(describeZodError(parsed.error)));
        return;
      }
      message = parsed.data;
    } catch {
      this.sendError(session, new InvalidRequestError('Message is not valid JSON'));
      return;
    }

    try {
      this.dispatchMessage(session, message);
    } catch (error) {
      const jobId = 'jobId' in message ? message.jobId : undefined;
      if (isOrchestrationError(error)) {
        this.sendError(session, error, jobId);
      } else {
        this.logger.error(`Failed to handle ${message.type} from socket #${session.id}:`, error);
        this.sendError(
          session,
          new OrchestrationError('InvalidRequest', error instanceof Error ? error.message : String(error)),
          jobId
        );
      }
    }
  }

  private dispatchMessage(session: WorkerSession, message: WorkerMessage): void {
    const handler = this.requireHandler();

    if (message.type === 'register') {
      this.bind(session, message.workerId);
      const handle = handler.register(message.workerId, message.capacity);
      session.connection.send({
        type: 'registered',
        workerId: handle.id,
        capacity: handle.capacity,
        status: handle.status,
      });
      return;
    }

    const workerId = session.workerId;
    if (!workerId) {
      throw new InvalidRequestError(`Send 'register' before '${message.type}'`);
    }

    switch (message.type) {
      case 'heartbeat':
        handler.heartbeat(workerId);
        session.connection.send({ type: 'heartbeat-ack', timestamp: new Date().toISOString() });
        break;

      case 'ack':
        // a job taken with dequeueFor has no dispatch waiting on it
        if (!this.settle(session, message.jobId, null)) {
          handler.acknowledge(message.jobId, workerId);
        }
        break;

      case 'reject':
        this.settle(
          session,
          message.jobId,
          new TransportFailureError(`Worker ${workerId} rejected job ${message.jobId}: ${message.reason}`)
        );
        break;

      case 'progress':
        handler.progress(message.jobId, workerId, message.percentage, message.message);
        break;

      case 'report': {
        // a report implies the job was accepted
        this.settle(session, message.jobId, null);
        const receipt = handler.report(message.jobId, workerId, message.outcome);
        session.connection.send({ type: 'report-ack', ...receipt });
        break;
      }
    }
  }

  /**
   * Bind a socket to a worker id. A reconnecting worker replaces its
   * previous socket.
   */
  private bind(session: WorkerSession, workerId: string): void {
    if (session.workerId && session.workerId !== workerId) {
      throw new InvalidRequestError(`Socket is already registered as ${session.workerId}`);
    }

    const previous = this.byWorker.get(workerId);
    if (previous && previous !== session) {
      this.sessions.delete(previous);
      this.byWorker.delete(workerId);
      this.failPending(previous, (jobId) => new ChannelReplacedError(workerId, jobId));
      previous.connection.close(4000, 'replaced by a new connection');
      this.logger.info(`Worker ${workerId} reconnected; socket #${previous.id} replaced by #${session.id}`);
    }

    session.workerId = workerId;
    this.byWorker.set(workerId, session);
  }

  /**
   * Resolve or reject the dispatch waiting on this job. False when none is.
   */
  private settle(session: WorkerSession, jobId: string, error: Error | null): boolean {
    const pending = session.pending.get(jobId);
    if (!pending) {
      this.logger.debug(`No dispatch awaiting acknowledgement for job ${jobId} on ${session.workerId}`);
      return false;
    }

    session.pending.delete(jobId);
    if (error) {
      pending.reject(error);
    } else {
      pending.resolve();
    }
    return true;
  }

  private failPending(session: WorkerSession, errorFor: (jobId: string) => Error): void {
    for (const [jobId, pending] of session.pending) {
      pending.reject(errorFor(jobId));
    }
    session.pending.clear();
  }

  private sendError(session: WorkerSession, error: OrchestrationError, jobId?: string): void {
    try {
      session.connection.send({ type: 'error', ...error.toJSON(), jobId });
    } catch (sendError) {
      this.logger.warn(`Could not deliver error to socket #${session.id}:`, sendError);
    }
  }

  private requireHandler(): WorkerSessionHandler {
    if (!this.handler) {
      throw new Error('Worker channel has no handler attached');
    }
    return this.handler;
  }

  // ---- IWorkerChannel ----

  isConnected(workerId: string): boolean {
    return this.byWorker.has(workerId);
  }

  dispatch(workerId: string, message: DispatchMessage): Promise<void> {
    const session = this.byWorker.get(workerId);
    if (!session) {
      return Promise.reject(new TransportFailureError(`Worker ${workerId} has no open channel`));
    }

    return new Promise<void>((resolve, reject) => {
      const previous = session.pending.get(message.jobId);
      if (previous) {
        previous.reject(new TransportFailureError(`Job ${message.jobId} dispatched again`));
      }
      session.pending.set(message.jobId, { resolve, reject });

      try {
        session.connection.send({ type: 'dispatch', ...message });
      } catch (error) {
        session.pending.delete(message.jobId);
        reject(error instanceof Error ? error : new TransportFailureError(String(error)));
      }
    });
  }

  abort(workerId: string, jobId: string): void {
    const session = this.byWorker.get(workerId);
    if (!session) return;

    const pending = session.pending.get(jobId);
    if (pending) {
      session.pending.delete(jobId);
      pending.reject(new TransportFailureError(`Job ${jobId} aborted`));
    }

    session.connection.send({ type: 'abort', jobId });
  }

  getConnectedWorkers(): string[] {
    return Array.from(this.byWorker.keys());
  }

  /**
   * Close every socket; pending dispatches fail
   */
  closeAll(): Promise<void> {
    for (const session of Array.from(this.sessions)) {
      this.closeSession(session, 'master shutting down', false);
      session.connection.close(1001, 'master shutting down');
    }

    return new Promise((resolve) => {
      this.wss.close(() => resolve());
    });
  }
}
