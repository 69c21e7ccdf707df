/**
 * Express Application Factory
 * Layer: Interfaces (HTTP)
 * Pattern: Factory Function
 *
 * This function assembles the Express application by wiring together
 * middleware and routes. It's a factory rather than a singleton so
 * integration tests can build a fresh app after overriding container
 * registrations.
 *
 * Middleware ordering matters — it's an assembly line:
 *   1. helmet()      — Sets security headers.
 *   2. cors()        — Allows cross-origin requests from frontend apps.
 *   3. compression() — Gzips response bodies.
 *   4. express.json()— Parses JSON request bodies into req.body.
 *   5. requestLogger — Assigns the request id (may read req.body) and logs.
 *   6. Routes        — The actual API endpoints, under /api/v1.
 *   7. notFound      — Anything no route matched.
 *   8. errorHandler  — MUST be last; catches errors from everything above.
 *
 * The `import '@core/container'` side-effect import ensures the DI
 * container is bootstrapped before any route module resolves from it.
 */
import '@core/container';

import { errorHandler } from '@interfaces/http/middleware/errorHandler';
import { notFound } from '@interfaces/http/middleware/notFound';
import { requestLogger } from '@interfaces/http/middleware/requestLogger';
import { healthRoutes } from '@interfaces/http/routes/healthRoutes';
import { operationRoutes } from '@interfaces/http/routes/operationRoutes';
import { proxyRoutes } from '@interfaces/http/routes/proxyRoutes';
import compression from 'compression';
import cors from 'cors';
import express from 'express';
import helmet from 'helmet';

export function createApp(): express.Express {
  const app = express();

  // Security & compression
  app.use(helmet());
  app.use(cors());
  app.use(compression());

  // Body parsing
  app.use(express.json());

  // Request id + logging
  app.use(requestLogger);

  // Routes
  app.use('/api/v1', healthRoutes);
  app.use('/api/v1', operationRoutes);
  app.use('/api/v1', proxyRoutes);

  // Fallbacks (must be registered last)
  app.use(notFound);
  app.use(errorHandler);

  return app;
}
