/**
 * Logger Configuration
 */

import winston from 'winston';
import path from 'path';
import fs from 'fs';
import { PATHS } from './constants';

const formatMeta = (meta: Record<string, unknown>): string => {
  const keys = Object.keys(meta).filter((key) => key !== 'stack');
  if (keys.length === 0) return '';
  const picked: Record<string, unknown> = {};
  for (const key of keys) picked[key] = meta[key];
  return ` ${JSON.stringify(picked)}`;
};

const fileFormat = winston.format.combine(
  winston.format.timestamp(),
  winston.format.errors({ stack: true }),
  winston.format.json()
);

const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.printf(({ level, message, timestamp, stack, ...meta }) => {
    const line = `${String(timestamp)} [${level.toUpperCase()}]: ${String(message)}${formatMeta(meta)}`;
    return typeof stack === 'string' ? `${line}\n${stack}` : line;
  })
);

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  silent: process.env.NODE_ENV === 'test',
  transports: [
    // Runbook hosts capture stderr/stdout, keep stdout free for the result record
    new winston.transports.Console({
      format: consoleFormat,
      stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'],
    }),
  ],
});

const logDir = PATHS.LOG_DIR;
if (logDir) {
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }

  logger.add(
    new winston.transports.File({
      filename: path.join(logDir, 'combined.log'),
      format: fileFormat,
      maxsize: 10 * 1024 * 1024, // 10MB
      maxFiles: 5,
    })
  );
  logger.add(
    new winston.transports.File({
      filename: path.join(logDir, 'error.log'),
      format: fileFormat,
      level: 'error',
      maxsize: 10 * 1024 * 1024,
      maxFiles: 5,
    })
  );
}

export function setLogLevel(level: string): void {
  logger.level = level;
}

/**
 * Raise console verbosity for interactive runs.
 */
export function enableConsoleLogging(verbose: boolean = false): void {
  logger.silent = false;
  logger.level = verbose ? 'debug' : 'info';
}
