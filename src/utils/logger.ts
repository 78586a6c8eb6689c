import winston from 'winston';

/**
 * Build the process logger. Every console level goes to stderr because stdout
 * carries the MCP stdio transport.
 */
export function createLogger(env: NodeJS.ProcessEnv = process.env): winston.Logger {
  const transports: winston.transport[] = [
    new winston.transports.Console({
      stderrLevels: ['error', 'warn', 'info', 'verbose', 'debug', 'silly'],
      format: winston.format.combine(winston.format.colorize(), winston.format.simple()),
    }),
  ];

  // Optional file logging controlled by env
  const isFileLogEnabled = env.MCP_LOG_ENABLE === 'true' || env.MCP_LOG_ENABLE === '1';
  if (isFileLogEnabled) {
    transports.push(
      new winston.transports.File({
        filename: env.MCP_LOG_FILE || 'sandbox-exec-mcp.log',
        format: winston.format.json(),
      }),
    );
  }

  return winston.createLogger({
    level: env.MCP_LOG_LEVEL || 'info',
    format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
    transports,
  });
}

/**
 * Logger that drops everything, for callers that were given none.
 */
export function createSilentLogger(): winston.Logger {
  return winston.createLogger({
    silent: true,
    transports: [new winston.transports.Console()],
  });
}
