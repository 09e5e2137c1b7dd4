// Structured component loggers shared by the fetcher, validator and CLIs
import winston from 'winston';

import { config } from '../config/index.js';

const { createLogger, format, transports } = winston;

export type Logger = winston.Logger;

/**
 * Create a logger whose lines are prefixed with a component tag, e.g. `[fetcher]`.
 * Level comes from the validated LOG_LEVEL setting (default: info).
 */
export function createComponentLogger(component: string, level?: string): Logger {
  return createLogger({
    level: level ?? config.logLevel,
    defaultMeta: { component },
    format: format.combine(
      format.timestamp(),
      format.errors({ stack: true }),
      format.json()
    ),
    transports: [
      // stdout carries command output (wire payloads, reports); logs go to stderr
      new transports.Console({
        stderrLevels: Object.keys(winston.config.npm.levels),
        format: format.combine(
          format.printf(({ timestamp, level, message, component: tag, ...meta }) => {
            const metaStr = Object.keys(meta).length > 0
              ? ` ${JSON.stringify(meta)}`
              : '';
            return `${String(timestamp)} [${level}] [${String(tag)}] ${String(message)}${metaStr}`;
          })
        )
      })
    ]
  });
}

/**
 * Mask sensitive parts of an RPC URL (API keys) before it reaches a log line
 */
export function maskUrl(url: string): string {
  return url.replace(/([a-zA-Z0-9]{20,})/g, '***');
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
