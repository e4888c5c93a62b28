import * as dotenv from 'dotenv';
import { z } from 'zod';

// Load environment variables from .env file
dotenv.config();

export type McpTransport = 'stdio' | 'streamable' | 'none';

export interface Config {
  server: {
    name: string;
    version: string;
    debug: boolean;
  };
  master: {
    heartbeatTimeoutMs: number;
    removalGraceMs: number;
    sweepIntervalMs: number;
    schedulerIntervalMs: number;
    dispatchTimeoutMs: number;
    maxDispatchAttempts: number;
    resultRetentionHours: number;
  };
  database: {
    path: string;
  };
  api: {
    enabled: boolean;
    port: number;
  };
  mcp: {
    transport: McpTransport;
    sessionTimeoutMinutes: number;
  };
}

// Zod validation schema
const ConfigSchema = z.object({
  server: z.object({
    name: z.string().min(1, 'Server name must not be empty'),
    version: z.string().min(1, 'Version must not be empty'),
    debug: z.boolean(),
  }),
  master: z
    .object({
      heartbeatTimeoutMs: z.number().int().min(100, 'Heartbeat timeout must be at least 100ms'),
      removalGraceMs: z.number().int().min(0),
      sweepIntervalMs: z.number().int().min(50),
      schedulerIntervalMs: z.number().int().min(10),
      dispatchTimeoutMs: z.number().int().min(100),
      maxDispatchAttempts: z.number().int().min(1).max(100),
      resultRetentionHours: z.number().min(0.01),
    })
    .refine((m) => m.sweepIntervalMs <= m.heartbeatTimeoutMs, {
      message: 'Sweep interval must not exceed the heartbeat timeout',
      path: ['sweepIntervalMs'],
    }),
  database: z.object({
    path: z.string().min(1, 'Database path must not be empty'),
  }),
  api: z.object({
    enabled: z.boolean(),
    port: z.number().int().min(1024).max(65535),
  }),
  mcp: z.object({
    transport: z.enum(['stdio', 'streamable', 'none']),
    sessionTimeoutMinutes: z.number().int().min(5).max(1440),
  }),
}).refine((c) => c.mcp.transport !== 'streamable' || c.api.enabled, {
  message: 'Streamable MCP transport is served by the HTTP API; enable the API',
  path: ['mcp', 'transport'],
});

/**
 * Parse command line arguments
 * Usage: talus-master --api-port 3001 --heartbeat-timeout-ms 15000 --debug
 */
export function parseArgs(argv: string[] = process.argv): Record<string, string | boolean> {
  const args: Record<string, string | boolean> = {};

  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i];

    if (arg.startsWith('--')) {
      const key = arg.slice(2);

      // Check if next arg is a value or another flag
      if (i + 1 < argv.length && !argv[i + 1].startsWith('--')) {
        args[key] = argv[++i];
      } else {
        args[key] = true;
      }
    }
  }

  return args;
}

/**
 * Assemble configuration from CLI arguments, then environment variables,
 * then defaults. Throws a ZodError when the result is invalid.
 */
export function buildConfig(
  cliArgs: Record<string, string | boolean>,
  env: NodeJS.ProcessEnv = process.env
): Config {
  const getString = (cliKey: string, envKey: string, defaultValue: string): string => {
    const cliValue = cliArgs[cliKey];
    if (typeof cliValue === 'string') return cliValue;
    return env[envKey] || defaultValue;
  };

  const getBoolean = (cliKey: string, envKey: string, defaultValue: boolean): boolean => {
    const cliValue = cliArgs[cliKey];
    if (cliValue !== undefined) return cliValue === true || cliValue === 'true';
    const envValue = env[envKey];
    return envValue === 'true' ? true : envValue === 'false' ? false : defaultValue;
  };

  const getNumber = (cliKey: string, envKey: string, defaultValue: number): number => {
    const cliValue = cliArgs[cliKey];
    if (typeof cliValue === 'string') return Number(cliValue);
    const envValue = env[envKey];
    return envValue ? Number(envValue) : defaultValue;
  };

  const rawConfig = {
    server: {
      name: getString('server-name', 'SERVER_NAME', 'talus-master'),
      version: getString('server-version', 'SERVER_VERSION', '1.0.0'),
      debug: getBoolean('debug', 'DEBUG', false),
    },
    master: {
      heartbeatTimeoutMs: getNumber('heartbeat-timeout-ms', 'HEARTBEAT_TIMEOUT_MS', 15000),
      removalGraceMs: getNumber('removal-grace-ms', 'REMOVAL_GRACE_MS', 300000),
      sweepIntervalMs: getNumber('sweep-interval-ms', 'SWEEP_INTERVAL_MS', 5000),
      schedulerIntervalMs: getNumber('scheduler-interval-ms', 'SCHEDULER_INTERVAL_MS', 1000),
      dispatchTimeoutMs: getNumber('dispatch-timeout-ms', 'DISPATCH_TIMEOUT_MS', 10000),
      maxDispatchAttempts: getNumber('max-dispatch-attempts', 'MAX_DISPATCH_ATTEMPTS', 3),
      resultRetentionHours: getNumber('result-retention-hours', 'RESULT_RETENTION_HOURS', 24),
    },
    database: {
      path: getString('database-path', 'DATABASE_PATH', 'talus-master.db'),
    },
    api: {
      enabled: getBoolean('api', 'API_ENABLED', true),
      port: getNumber('api-port', 'API_PORT', 3001),
    },
    mcp: {
      transport: getString('mcp-transport', 'MCP_TRANSPORT', 'none'),
      sessionTimeoutMinutes: getNumber('mcp-session-timeout', 'MCP_SESSION_TIMEOUT_MINUTES', 60),
    },
  };

  return ConfigSchema.parse(rawConfig);
}

/**
 * Get configuration from environment variables or CLI arguments.
 * Prints every validation issue and exits when the configuration is invalid.
 */
export function getConfig(): Config {
  try {
    return buildConfig(parseArgs());
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error('\n❌ Configuration Validation Failed!\n');
      console.error('Errors:');
      error.errors.forEach((err) => {
        const path = err.path.join('.');
        console.error(`  • ${path || 'root'}: ${err.message}`);
      });
      console.error('\n💡 Tips:');
      console.error('  - Check your .env file');
      console.error('  - Verify CLI arguments');
      console.error('  - Timeouts and intervals are in milliseconds');
      console.error();
      process.exit(1);
    }
    throw error;
  }
}

/**
 * Print configuration summary
 */
export function printConfigInfo(config: Config): void {
  const m = config.master;

  console.error('═'.repeat(68));
  console.error(`  ${config.server.name} v${config.server.version} ${config.server.debug ? '(Debug Mode)' : ''}`);
  console.error('═'.repeat(68));

  console.error(`\n⏱️  Liveness: heartbeat timeout ${m.heartbeatTimeoutMs}ms | sweep every ${m.sweepIntervalMs}ms | forget after +${m.removalGraceMs}ms`);
  console.error(`⚙️  Scheduler: every ${m.schedulerIntervalMs}ms | dispatch timeout ${m.dispatchTimeoutMs}ms | ${m.maxDispatchAttempts} attempts`);
  console.error(`🗄️  Database: ${config.database.path} | results kept ${m.resultRetentionHours}h`);

  if (config.api.enabled) {
    console.error(`\n🌐 API:     http://localhost:${config.api.port}/api`);
    console.error(`🔌 Workers: ws://localhost:${config.api.port}/workers`);
  }

  if (config.mcp.transport !== 'none') {
    const label = config.mcp.transport === 'streamable' ? 'STREAMABLE HTTP' : 'STDIO';
    const isHttpMode = config.mcp.transport === 'streamable';
    console.error(`\n📡 MCP: ${label} mode ${isHttpMode ? `(session timeout: ${config.mcp.sessionTimeoutMinutes}m)` : ''}`);
  }

  console.error('\n' + '─'.repeat(68));
}
