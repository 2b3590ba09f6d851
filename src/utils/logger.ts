/**
 * Scoped stderr logger. stdout stays free for the MCP stdio transport.
 */
export interface Logger {
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
  debug(message: string, ...details: unknown[]): void;
}

export function createLogger(scope: string, debug = false): Logger {
  const prefix = `[${scope}]`;

  return {
    info: (message, ...details) => console.error(`${prefix} ${message}`, ...details),
    warn: (message, ...details) => console.error(`${prefix} WARN ${message}`, ...details),
    error: (message, ...details) => console.error(`${prefix} ERROR ${message}`, ...details),
    debug: (message, ...details) => {
      if (debug) {
        console.error(`[DEBUG] ${prefix} ${message}`, ...details);
      }
    },
  };
}

/**
 * One-line JSON record for collaborator failures
 */
export function logFailure(logger: Logger, component: string, error: unknown): void {
  logger.error(
    JSON.stringify({
      timestamp: new Date().toISOString(),
      component,
      error: error instanceof Error ? error.message : String(error),
    })
  );
}
