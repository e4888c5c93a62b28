/**
 * MCP over Streamable HTTP.
 *
 * Every client session gets its own transport and MCP server. A session
 * starts with an `initialize` request and is named by the `mcp-session-id`
 * header from then on; idle sessions are closed after a timeout.
 */

import { McpServer as BaseMcpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { isInitializeRequest } from '@modelcontextprotocol/sdk/types.js';
import { Request, Response } from 'express';
import { randomUUID } from 'crypto';
import { Logger, silentLogger } from '../../utils/logger.js';

export interface McpSession {
  sessionId: string;
  transport: StreamableHTTPServerTransport;
  server: BaseMcpServer;
  createdAt: Date;
  lastActivity: Date;
  requestCount: number;
}

export interface SessionFactory {
  createServerForSession(sessionId: string): BaseMcpServer;
}

export interface SessionInfo {
  sessionId: string;
  createdAt: string;
  lastActivity: string;
  requestCount: number;
  inactiveMinutes: number;
}

export interface TransportManagerOptions {
  sessionTimeoutMinutes?: number;
  cleanupIntervalMs?: number;
  logger?: Logger;
  now?: () => number;
}

const SESSION_ID_HEADER_NAME = 'mcp-session-id';

// JSON-RPC error codes used on the HTTP edge
const SESSION_ERROR = -32000;
const INTERNAL_ERROR = -32603;

function rpcError(res: Response, status: number, code: number, message: string): void {
  res.status(status).json({ jsonrpc: '2.0', error: { code, message }, id: null });
}

export class StreamableHTTPTransportManager {
  private sessions = new Map<string, McpSession>();
  private readonly sessionTimeoutMs: number;
  private readonly cleanupTimer: NodeJS.Timeout;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(
    private sessionFactory: SessionFactory,
    options: TransportManagerOptions = {}
  ) {
    this.sessionTimeoutMs = (options.sessionTimeoutMinutes ?? 60) * 60 * 1000;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? Date.now;

    this.cleanupTimer = setInterval(() => {
      this.cleanupStaleSessions().catch((error: unknown) => {
        this.logger.error('Stale MCP session cleanup failed:', error);
      });
    }, options.cleanupIntervalMs ?? 5 * 60 * 1000);
    this.cleanupTimer.unref();
  }

  /**
   * No server-initiated streams; GET always answers 405
   */
  handleGetRequest(res: Response): void {
    res.set('Allow', 'POST, DELETE');
    rpcError(res, 405, SESSION_ERROR, 'Method not allowed; send requests with POST');
  }

  /**
   * Route a JSON-RPC message to its session. Only `initialize` may arrive
   * without a session id; it opens a new session.
   */
  async handlePostRequest(req: Request, res: Response): Promise<void> {
    const sessionId = req.header(SESSION_ID_HEADER_NAME);

    try {
      if (sessionId) {
        const session = this.sessions.get(sessionId);
        if (!session) {
          rpcError(res, 404, SESSION_ERROR, `Session not found: ${sessionId}`);
          return;
        }
        session.lastActivity = new Date(this.now());
        session.requestCount++;
        await session.transport.handleRequest(req, res, req.body);
        return;
      }

      if (!isInitializeRequest(req.body)) {
        rpcError(res, 400, SESSION_ERROR, `Missing ${SESSION_ID_HEADER_NAME} header; start with an initialize request`);
        return;
      }

      const session = this.openSession();
      await session.server.connect(session.transport);
      this.logger.info(`New MCP session: ${session.sessionId}`);

      await session.transport.handleRequest(req, res, req.body);
    } catch (error) {
      this.logger.error('Error handling MCP request:', error);
      if (!res.headersSent) {
        rpcError(res, 500, INTERNAL_ERROR, error instanceof Error ? error.message : String(error));
      }
    }
  }

  /**
   * Client-initiated session termination
   */
  async handleDeleteRequest(req: Request, res: Response): Promise<void> {
    const sessionId = req.header(SESSION_ID_HEADER_NAME);
    if (!sessionId || !this.sessions.has(sessionId)) {
      rpcError(res, 404, SESSION_ERROR, `Session not found: ${sessionId ?? '(none)'}`);
      return;
    }

    await this.removeSession(sessionId);
    res.status(204).end();
  }

  /**
   * Close sessions idle longer than the timeout. Returns how many closed.
   */
  async cleanupStaleSessions(): Promise<number> {
    const now = this.now();
    const stale = Array.from(this.sessions.values())
      .filter((session) => now - session.lastActivity.getTime() > this.sessionTimeoutMs)
      .map((session) => session.sessionId);

    if (stale.length > 0) {
      this.logger.info(`Closing ${stale.length} idle MCP sessions`);
      await Promise.all(stale.map((id) => this.removeSession(id)));
    }
    return stale.length;
  }

  getSessionInfo(): SessionInfo[] {
    const now = this.now();
    return Array.from(this.sessions.values()).map((session) => ({
      sessionId: session.sessionId,
      createdAt: session.createdAt.toISOString(),
      lastActivity: session.lastActivity.toISOString(),
      requestCount: session.requestCount,
      inactiveMinutes: Math.floor((now - session.lastActivity.getTime()) / 60000),
    }));
  }

  getActiveSessionCount(): number {
    return this.sessions.size;
  }

  async closeAll(): Promise<void> {
    clearInterval(this.cleanupTimer);
    await Promise.all(Array.from(this.sessions.keys()).map((id) => this.removeSession(id)));
  }

  private openSession(): McpSession {
    const sessionId = randomUUID();
    const startedAt = new Date(this.now());
    const session: McpSession = {
      sessionId,
      transport: new StreamableHTTPServerTransport({
        sessionIdGenerator: () => sessionId,
        enableJsonResponse: true,
      }),
      server: this.sessionFactory.createServerForSession(sessionId),
      createdAt: startedAt,
      lastActivity: startedAt,
      requestCount: 1,
    };

    // registered before connect so a fast follow-up request finds it
    this.sessions.set(sessionId, session);
    return session;
  }

  private async removeSession(sessionId: string): Promise<void> {
    const session = this.sessions.get(sessionId);
    if (!session) return;

    // out of the map first so a concurrent DELETE or cleanup skips it
    this.sessions.delete(sessionId);

    try {
      await session.server.close();
      this.logger.info(`MCP session closed: ${sessionId}`);
    } catch (error) {
      this.logger.error(`Error closing MCP session ${sessionId}:`, error);
    }
  }
}
