import { McpServer as BaseMcpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { Config } from '../config.js';
import { MasterController } from '../application/services/MasterController.js';
import { DatabaseConnection } from '../infrastructure/database/DatabaseConnection.js';
import { JobRepository } from '../infrastructure/database/repositories/JobRepository.js';
import { WorkerRepository } from '../infrastructure/database/repositories/WorkerRepository.js';
import { WorkerChannelHub } from '../infrastructure/transport/WorkerChannelHub.js';
import { StreamableHTTPTransportManager, SessionFactory } from '../infrastructure/transport/StreamableHTTPTransportManager.js';
import { WebServer } from '../infrastructure/web/WebServer.js';
import { Logger, createLogger } from '../utils/logger.js';
import { registerMasterTools } from './tools/MasterTools.js';
import { registerJobTools } from './tools/JobTools.js';

/**
 * Wires the master together: database, worker channel, HTTP API and MCP
 */
export class MasterServer implements SessionFactory {
  private server: BaseMcpServer | null = null; // stdio only; streamable sessions get their own
  private readonly master: MasterController;
  private readonly hub: WorkerChannelHub;
  private readonly dbConnection: DatabaseConnection;
  private webServer: WebServer | null = null;
  private streamableTransportManager: StreamableHTTPTransportManager | null = null;
  private readonly logger: Logger;

  constructor(private config: Config) {
    const debug = config.server.debug;
    const logFor = (component: string) => createLogger(component, debug);
    this.logger = logFor('MasterServer');

    this.dbConnection = new DatabaseConnection(config.database.path);
    const db = this.dbConnection.getDatabase();

    this.hub = new WorkerChannelHub(logFor('WorkerChannel'));
    this.master = new MasterController(config.master, {
      channel: this.hub,
      jobRepository: new JobRepository(db),
      workerRepository: new WorkerRepository(db),
      createLogger: logFor,
    });
    this.hub.attachHandler(this.master);

    if (config.api.enabled) {
      this.webServer = new WebServer(this.master, this.hub, config.api.port, logFor('WebServer'));
      const web = this.webServer;
      this.master.onJobFinished((job) => web.notifyJobUpdate(job.id, job.state));
    }

    if (config.mcp.transport === 'stdio') {
      this.server = this.createServerForSession('stdio');
    } else if (config.mcp.transport === 'streamable' && this.webServer) {
      this.streamableTransportManager = new StreamableHTTPTransportManager(this, {
        sessionTimeoutMinutes: config.mcp.sessionTimeoutMinutes,
        logger: logFor('StreamableHTTP'),
      });
      this.webServer.enableStreamableTransport(this.streamableTransportManager);
    }
  }

  getMaster(): MasterController {
    return this.master;
  }

  getWebServer(): WebServer | null {
    return this.webServer;
  }

  /**
   * New MCP server with every tool registered (SessionFactory implementation)
   */
  createServerForSession(sessionId: string): BaseMcpServer {
    this.logger.debug(`Creating MCP server for session: ${sessionId}`);

    const server = new BaseMcpServer({
      name: this.config.server.name,
      version: this.config.server.version,
    });

    registerMasterTools(server, this.master, this.dbConnection);
    registerJobTools(server, this.master, (jobId) => this.webServer?.notifyJobUpdate(jobId, 'queued'));

    return server;
  }

  printStats(): void {
    const stats = this.dbConnection.getStatistics();
    const info = this.master.masterInfo();
    console.error(
      `📊 Database: ${stats.totalJobs} jobs, ${stats.totalWorkers} workers, ${(stats.databaseSize / 1024).toFixed(2)} KB`
    );
    console.error(
      `📋 Queue: ${info.queuedCount} queued, ${info.completedCount} completed, ${info.failedCount} failed, ${info.cancelledCount} cancelled`
    );
  }

  async start(): Promise<void> {
    this.logger.debug(`Database at: ${this.dbConnection.getDatabasePath()}`);

    if (this.webServer) {
      await this.webServer.start();
    }

    this.master.start();

    if (this.server) {
      const transport = new StdioServerTransport();

      process.stdin.on('error', (error) => {
        this.logger.warn(`stdin error (non-fatal): ${error.message}`);
      });
      process.stdout.on('error', (error) => {
        this.logger.warn(`stdout error (non-fatal): ${error.message}`);
      });

      await this.server.connect(transport);
      this.logger.info('MCP server running on stdio');
    } else if (this.streamableTransportManager) {
      const port = this.config.api.port;
      this.logger.info(`MCP endpoint: http://localhost:${port}/mcp`);
      this.logger.info(`Session info: http://localhost:${port}/mcp/sessions`);
    }

    if (this.webServer) {
      this.logger.info(`Workers connect at ws://localhost:${this.config.api.port}/workers`);
    }
  }

  /**
   * Stop accepting work, close every channel and the database
   */
  async shutdown(): Promise<void> {
    this.logger.info('Shutting down...');

    await this.master.stop();

    if (this.streamableTransportManager) {
      await this.streamableTransportManager.closeAll();
    }
    if (this.server) {
      await this.server.close();
    }

    await this.hub.closeAll();

    if (this.webServer) {
      await this.webServer.stop();
    }

    this.dbConnection.close();
  }
}
