import winston from 'winston';

const LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'];

// stdout carries the MCP stdio transport; every level goes to stderr.
export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  defaultMeta: { service: 'warehouse-mcp-bridge' },
  transports: [
    new winston.transports.Console({
      stderrLevels: LEVELS,
    }),
  ],
});

export function setLogLevel(level: string): void {
  logger.level = level;
}
