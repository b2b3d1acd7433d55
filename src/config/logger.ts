import winston from 'winston';
// Loads .env before the level and format are read below.
import './index';

const isProduction = process.env.NODE_ENV === 'production';

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  format: isProduction
    ? winston.format.combine(winston.format.timestamp(), winston.format.errors({ stack: true }), winston.format.json())
    : winston.format.combine(
        winston.format.colorize(),
        winston.format.timestamp(),
        winston.format.errors({ stack: true }),
        winston.format.simple()
      ),
  transports: [new winston.transports.Console()],
  // Keep test output clean; `node --test` sets NODE_TEST_CONTEXT in child runs.
  silent: process.env.NODE_ENV === 'test' || Boolean(process.env.NODE_TEST_CONTEXT),
});

/** Applies the validated level from AppConfig once configuration is loaded. */
export function setLogLevel(level: string): void {
  logger.level = level;
}

/** Subset of the logger the services depend on, so tests can pass a recorder. */
export interface Logger {
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}
