import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { MasterController, MasterInfo } from '../../application/services/MasterController.js';
import type { Worker } from '../../core/entities/Worker.js';
import type { DatabaseConnection } from '../../infrastructure/database/DatabaseConnection.js';
import { errorResult, jsonBlock, textResult } from './toolResult.js';

export function formatMasterInfo(info: MasterInfo): string {
  return `# Master Info

## Workers
- Registered: ${info.workerCount}
- Online: ${info.onlineCount}

## Jobs
- Queued: ${info.queuedCount}
- Running: ${info.runningCount}
- Completed: ${info.completedCount}
- Failed: ${info.failedCount}
- Cancelled: ${info.cancelledCount}
- Total Submitted: ${info.totalSubmitted}`;
}

export function formatSlaveList(workers: Worker[]): string {
  if (workers.length === 0) {
    return '# Workers\n\nNo workers registered';
  }

  const rows = workers.map(
    (w) => `| ${w.id} | ${w.status} | ${w.load}/${w.capacity} | ${w.lastHeartbeat.toISOString()} |`
  );

  return `# Workers

| ID | Status | Load | Last Heartbeat |
|----|--------|------|----------------|
${rows.join('\n')}`;
}

/**
 * Register master-info, slave-list and health-check
 */
export function registerMasterTools(
  server: McpServer,
  master: MasterController,
  dbConnection: DatabaseConnection
) {
  server.tool(
    'master-info',
    'Summary of the master: worker counts and job counts by state',
    {},
    async () => {
      try {
        return textResult(formatMasterInfo(master.masterInfo()));
      } catch (error) {
        return errorResult('getting master info', error);
      }
    }
  );

  server.tool(
    'slave-list',
    'List registered workers in registration order with status and load',
    {},
    async () => {
      try {
        return textResult(formatSlaveList(master.slaveList()));
      } catch (error) {
        return errorResult('listing workers', error);
      }
    }
  );

  server.tool(
    'health-check',
    'Check the health of the master and its components (scheduler, database, workers)',
    {},
    async () => {
      try {
        const info = master.masterInfo();
        let status = master.isStarted() ? 'healthy' : 'stopped';

        let database: Record<string, unknown>;
        try {
          const stats = dbConnection.getStatistics();
          database = {
            status: 'healthy',
            message: `Database connected - ${stats.totalJobs} jobs, ${stats.totalWorkers} workers`,
            statistics: stats,
          };
        } catch (error) {
          database = {
            status: 'error',
            message: error instanceof Error ? error.message : String(error),
          };
          status = 'degraded';
        }

        const health = {
          timestamp: new Date().toISOString(),
          status,
          components: {
            master: {
              status: master.isStarted() ? 'running' : 'stopped',
              workers: { registered: info.workerCount, online: info.onlineCount },
            },
            jobQueue: { statistics: master.getStatistics() },
            database,
          },
        };

        return textResult(`# System Health Check\n\n${jsonBlock(health)}`);
      } catch (error) {
        return errorResult('running health check', error);
      }
    }
  );
}
