/**
 * src/shared/logger/logger.ts
 *
 * WHY:
 * - Structured JSON logs with a stable `{ service, env }` on every line.
 * - buildDeps creates the logger from AppConfig; the default instance below
 *   covers entrypoint failures that happen before config is loaded.
 *
 * HOW TO USE:
 * - Receive `logger` through deps (see app/di.ts).
 * - Message is a dotted event name: logger.info('users.cache_hit', { userId }).
 * - Pass errors as `{ err }` so the stack is kept.
 */

import winston from 'winston';
import type { Logger as WinstonLogger } from 'winston';

export type Logger = WinstonLogger;

export type LoggerOptions = {
  level: string;
  service: string;
  env: string;
};

const jsonFormat = winston.format.combine(
  winston.format.timestamp(),
  winston.format.errors({ stack: true }),
  winston.format.json(),
);

export function createLogger(opts: LoggerOptions): Logger {
  return winston.createLogger({
    level: opts.level,
    silent: opts.env === 'test',
    format: jsonFormat,
    defaultMeta: { service: opts.service, env: opts.env },
    transports: [new winston.transports.Console()],
  });
}

export const logger: Logger = createLogger({
  level: process.env.LOG_LEVEL ?? 'info',
  service: process.env.SERVICE_NAME ?? 'user-directory',
  env: process.env.NODE_ENV ?? 'development',
});
