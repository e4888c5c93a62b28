import express, { Express, NextFunction, Request, Response } from 'express';
import { IncomingMessage, Server as HttpServer } from 'http';
import { Duplex } from 'stream';
import { WebSocketServer, WebSocket } from 'ws';
import cors from 'cors';
import { z } from 'zod';
import type { MasterController } from '../../application/services/MasterController.js';
import type { Job } from '../../core/entities/Job.js';
import type { Worker } from '../../core/entities/Worker.js';
import {
  ERROR_HTTP_STATUS,
  InvalidRequestError,
  isOrchestrationError,
} from '../../core/errors/OrchestrationError.js';
import {
  JobListQuerySchema,
  ProgressBodySchema,
  RegisterBodySchema,
  ReportBodySchema,
  SubmitBodySchema,
  WorkerBodySchema,
  describeZodError,
} from '../../core/validation/schemas.js';
import type { WorkerChannelHub } from '../transport/WorkerChannelHub.js';
import type { StreamableHTTPTransportManager } from '../transport/StreamableHTTPTransportManager.js';
import { Logger, silentLogger } from '../../utils/logger.js';

export const WORKER_CHANNEL_PATH = '/workers';
export const EVENTS_PATH = '/events';

function parseBody<T extends z.ZodTypeAny>(schema: T, body: unknown): z.infer<T> {
  const parsed = schema.safeParse(body ?? {});
  if (!parsed.success) {
    throw new InvalidRequestError(describeZodError(parsed.error));
  }
  return parsed.data;
}

export function serializeJob(job: Job) {
  return {
    id: job.id,
    state: job.state,
    workerId: job.workerId ?? null,
    payload: job.payload,
    attempts: job.attempts,
    progress: job.progress,
    submittedAt: job.submittedAt.toISOString(),
    assignedAt: job.assignedAt?.toISOString() ?? null,
    startedAt: job.startedAt?.toISOString() ?? null,
    finishedAt: job.finishedAt?.toISOString() ?? null,
    result: job.result ?? null,
  };
}

export function serializeWorker(worker: Worker) {
  return {
    id: worker.id,
    status: worker.status,
    capacity: worker.capacity,
    load: worker.load,
    activeJobIds: worker.activeJobIds,
    registeredAt: worker.registeredAt.toISOString(),
    lastHeartbeat: worker.lastHeartbeat.toISOString(),
    offlineReason: worker.offlineReason ?? null,
  };
}

/**
 * HTTP API, worker channel and event stream of the master
 */
export class WebServer {
  private app: Express;
  private httpServer: HttpServer | null = null;
  private eventsWss: WebSocketServer;
  private clients: Set<WebSocket> = new Set();
  private readonly logger: Logger;

  constructor(
    private master: MasterController,
    private workerHub: WorkerChannelHub | null,
    private port: number = 3001,
    logger?: Logger
  ) {
    this.logger = logger ?? silentLogger;
    this.app = express();
    this.eventsWss = new WebSocketServer({ noServer: true });
    this.setupMiddleware();
    this.setupRoutes();
  }

  getApp(): Express {
    return this.app;
  }

  /**
   * Port the server listens on once started; useful when started on port 0
   */
  getPort(): number | null {
    const address = this.httpServer?.address();
    return address && typeof address === 'object' ? address.port : null;
  }

  /**
   * Serve MCP over Streamable HTTP at /mcp. Must be called before start().
   */
  public enableStreamableTransport(manager: StreamableHTTPTransportManager): void {
    this.app.post('/mcp', (req: Request, res: Response) => {
      void manager.handlePostRequest(req, res);
    });
    this.app.get('/mcp', (req: Request, res: Response) => {
      manager.handleGetRequest(res);
    });
    this.app.delete('/mcp', (req: Request, res: Response) => {
      void manager.handleDeleteRequest(req, res);
    });
    this.app.get('/mcp/sessions', (req: Request, res: Response) => {
      res.json({
        success: true,
        data: {
          activeSessionCount: manager.getActiveSessionCount(),
          sessions: manager.getSessionInfo(),
        },
      });
    });

    this.logger.info('MCP Streamable HTTP routes registered: POST/GET/DELETE /mcp, GET /mcp/sessions');
  }

  private setupMiddleware(): void {
    this.app.use(cors());
    this.app.use(express.json({ limit: '10mb' }));
  }

  private setupRoutes(): void {
    const m = this.master;

    // master info
    this.app.get('/api/master/info', (req: Request, res: Response) => {
      res.json({ success: true, data: m.masterInfo() });
    });

    // slave list
    this.app.get('/api/slaves', (req: Request, res: Response) => {
      const workers = m.slaveList().map((worker) => ({
        ...serializeWorker(worker),
        connected: m.isWorkerConnected(worker.id),
      }));
      res.json({ success: true, data: workers });
    });

    this.app.post('/api/slaves', (req: Request, res: Response) => {
      const { workerId, capacity } = parseBody(RegisterBodySchema, req.body);
      const handle = m.register(workerId, capacity);
      res.status(201).json({
        success: true,
        data: { ...handle, registeredAt: handle.registeredAt.toISOString() },
      });
    });

    this.app.get('/api/slaves/:id', (req: Request, res: Response) => {
      const worker = m.getWorker(req.params.id);
      res.json({
        success: true,
        data: { ...serializeWorker(worker), connected: m.isWorkerConnected(worker.id) },
      });
    });

    this.app.post('/api/slaves/:id/heartbeat', (req: Request, res: Response) => {
      m.heartbeat(req.params.id);
      res.json({ success: true, data: { status: m.getWorkerStatus(req.params.id) } });
    });

    // pull-mode assignment
    this.app.post('/api/slaves/:id/dequeue', (req: Request, res: Response) => {
      const jobId = m.dequeueFor(req.params.id);
      res.json({ success: true, data: jobId ? serializeJob(m.getJob(jobId)) : null });
    });

    // jobs
    this.app.post('/api/jobs', (req: Request, res: Response) => {
      const { payload } = parseBody(SubmitBodySchema, req.body);
      const jobId = m.submit(payload ?? null);
      this.notifyJobUpdate(jobId, 'queued');
      res.status(201).json({ success: true, data: { jobId } });
    });

    // first 20 in submission order unless ?all=true or ?limit=N
    this.app.get('/api/jobs', (req: Request, res: Response) => {
      const page = m.listJobs(parseBody(JobListQuerySchema, req.query));
      res.json({
        success: true,
        data: page.jobs.map(serializeJob),
        total: page.total,
        limit: page.limit,
      });
    });

    this.app.get('/api/jobs/:id', (req: Request, res: Response) => {
      res.json({ success: true, data: serializeJob(m.getJob(req.params.id)) });
    });

    this.app.get('/api/jobs/:id/result', (req: Request, res: Response) => {
      res.json({ success: true, data: m.getResult(req.params.id) });
    });

    this.app.post('/api/jobs/:id/cancel', (req: Request, res: Response) => {
      const job = m.cancel(req.params.id);
      res.json({ success: true, data: serializeJob(job) });
    });

    this.app.post('/api/jobs/:id/ack', (req: Request, res: Response) => {
      const { workerId } = parseBody(WorkerBodySchema, req.body);
      res.json({ success: true, data: m.acknowledge(req.params.id, workerId) });
    });

    this.app.post('/api/jobs/:id/progress', (req: Request, res: Response) => {
      const { workerId, percentage, message } = parseBody(ProgressBodySchema, req.body);
      res.json({ success: true, data: m.progress(req.params.id, workerId, percentage, message) });
    });

    this.app.post('/api/jobs/:id/report', (req: Request, res: Response) => {
      const { workerId, outcome } = parseBody(ReportBodySchema, req.body);
      res.json({ success: true, data: m.report(req.params.id, workerId, outcome) });
    });

    this.app.get('/api/health', (req: Request, res: Response) => {
      res.json({
        success: true,
        data: {
          status: m.isStarted() ? 'running' : 'stopped',
          timestamp: new Date().toISOString(),
          connectedWorkers: this.workerHub?.getConnectedWorkers().length ?? 0,
          statistics: m.getStatistics(),
        },
      });
    });

    this.app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
      if (isOrchestrationError(error)) {
        res.status(ERROR_HTTP_STATUS[error.kind]).json({ success: false, error: error.toJSON() });
        return;
      }
      if (error instanceof SyntaxError) {
        res.status(400).json({
          success: false,
          error: new InvalidRequestError('Request body is not valid JSON').toJSON(),
        });
        return;
      }

      this.logger.error(`${req.method} ${req.path} failed:`, error);
      res.status(500).json({
        success: false,
        error: { kind: 'Internal', code: 1, message: error instanceof Error ? error.message : 'Unknown error' },
      });
    });
  }

  private handleUpgrade(request: IncomingMessage, socket: Duplex, head: Buffer): void {
    const { pathname } = new URL(request.url ?? '/', 'http://localhost');

    if (pathname === WORKER_CHANNEL_PATH && this.workerHub) {
      this.workerHub.handleUpgrade(request, socket, head);
    } else if (pathname === EVENTS_PATH) {
      this.eventsWss.handleUpgrade(request, socket, head, (ws) => this.addEventClient(ws));
    } else {
      socket.destroy();
    }
  }

  private addEventClient(ws: WebSocket): void {
    this.logger.debug('Event client connected');
    this.clients.add(ws);

    ws.on('close', () => {
      this.clients.delete(ws);
    });

    ws.on('error', (error) => {
      this.logger.error('Event client error:', error);
      this.clients.delete(ws);
    });

    ws.send(JSON.stringify({ type: 'connected', timestamp: new Date().toISOString() }));
  }

  public broadcast(message: Record<string, unknown>): void {
    const payload = JSON.stringify(message);
    this.clients.forEach((client) => {
      if (client.readyState === WebSocket.OPEN) {
        client.send(payload);
      }
    });
  }

  public notifyJobUpdate(jobId: string, state: string): void {
    this.broadcast({
      type: 'job_updated',
      jobId,
      state,
      timestamp: new Date().toISOString(),
    });
  }

  public start(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(this.port, () => {
        this.logger.info(`API available at http://localhost:${this.port}/api`);
        resolve();
      });

      server.on('upgrade', (request: IncomingMessage, socket: Duplex, head: Buffer) => {
        this.handleUpgrade(request, socket, head);
      });

      server.on('error', (error) => {
        this.logger.error('Server error:', error);
        reject(error);
      });

      this.httpServer = server;
    });
  }

  public stop(): Promise<void> {
    return new Promise((resolve) => {
      this.clients.forEach((client) => {
        client.close();
      });
      this.clients.clear();
      this.eventsWss.close();

      if (this.httpServer) {
        this.httpServer.close(() => {
          this.logger.info('HTTP server closed');
          resolve();
        });
        this.httpServer.closeAllConnections();
        this.httpServer = null;
      } else {
        resolve();
      }
    });
  }
}
