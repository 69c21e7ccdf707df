/**
 * Health Check Route
 * Layer: Interfaces (HTTP)
 *
 * A lightweight endpoint that returns 200 OK when the server is alive:
 *
 *   GET /api/v1/health  →  { status: 'healthy', provider: 'openliga', uptime: 123.4, timestamp: '...' }
 *
 * Health checks are used by load balancers, container liveness probes and
 * monitoring dashboards.
 *
 * This endpoint does NOT call the upstream provider — it only confirms the
 * HTTP server process is running.
 */
import { config } from '@core/config';
import { Router } from 'express';

const router = Router();

router.get('/health', (_req, res) => {
  res.status(200).json({
    status: 'healthy',
    provider: config.provider.name,
    uptime: process.uptime(),
    timestamp: new Date().toISOString(),
  });
});

export { router as healthRoutes };
