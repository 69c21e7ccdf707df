/**
 * Server Entry Point — Startup & Graceful Shutdown
 * Layer: Entry Point (top of the dependency tree)
 *
 * This is the file that starts when you run `npm start` or `npm run dev`.
 *
 * One process only: the rate limiter's request budget lives in this
 * process's memory, and every outbound call must pass through it.
 *
 * Graceful shutdown:
 *   On SIGTERM/SIGINT (e.g., Ctrl+C or container stop):
 *     1. Stop accepting new connections (server.close()).
 *     2. Wait for in-flight requests to finish.
 *     3. Exit with code 0, or 1 if closing failed.
 */
import { config } from '@core/config';
import { logger } from '@core/logger';
import { createApp } from '@interfaces/http/app';

const app = createApp();

const server = app.listen(config.port, () => {
  logger.info(
    { pid: process.pid, port: config.port, provider: config.provider.name },
    `Listening on :${config.port}`,
  );
});

const shutdown = (signal: string): void => {
  logger.info({ pid: process.pid, signal }, 'Graceful shutdown initiated');
  server.close((err) => {
    if (err) {
      logger.error({ err }, 'Error while closing the HTTP server');
      process.exit(1);
    }
    process.exit(0);
  });
};

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
