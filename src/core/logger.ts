/**
 * Structured Logger (Pino)
 * Layer: Core
 *
 * One JSON object per log line, so the audit trail (validation, provider
 * calls, retries, normalization) can be filtered by `stage` and `reqId` in
 * whatever log tool sits downstream.
 *
 * In development, raw JSON is hard to read, so we pipe it through `pino-pretty`
 * which adds colors, readable timestamps, and strips noisy fields like pid.
 *
 * The exported `Logger` type lets other modules declare "I need a logger"
 * without coupling to Pino directly — useful for testing with a mock logger.
 * Request-scoped child loggers (from pino-http) share the same type.
 *
 * Credentials never reach the log: the request's Authorization and Cookie
 * headers are replaced by "[Redacted]" before a line is written.
 */
import pino from 'pino';
import { config } from './config';

export const REDACTED_PATHS = ['req.headers.authorization', 'req.headers.cookie'];

export const loggerOptions: pino.LoggerOptions = {
  level: config.log.level,
  redact: REDACTED_PATHS,
  transport: config.isDev
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      }
    : undefined,
};

export const logger = pino(loggerOptions);

export type Logger = pino.Logger;
