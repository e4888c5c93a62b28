/**
 * Component-prefixed logger.
 *
 * Everything goes to stderr: stdout belongs to the MCP stdio transport.
 */
export interface Logger {
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
  debug(message: string, ...details: unknown[]): void;
}

export function createLogger(component: string, debug = false): Logger {
  const prefix = `[${component}]`;
  return {
    info: (message, ...details) => console.error(`${prefix} ${message}`, ...details),
    warn: (message, ...details) => console.error(`${prefix} ⚠️ ${message}`, ...details),
    error: (message, ...details) => console.error(`${prefix} ✗ ${message}`, ...details),
    debug: (message, ...details) => {
      if (debug) {
        console.error(`[DEBUG] ${prefix} ${message}`, ...details);
      }
    },
  };
}

/**
 * Logger that drops everything; used by tests and library consumers that
 * bring their own logging.
 */
export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  debug: () => undefined,
};
