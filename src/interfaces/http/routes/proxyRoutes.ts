/**
 * Proxy Routes
 * Layer: Interfaces (HTTP)
 *
 * Mounted under `/api/v1` in app.ts:
 *
 *   POST /api/v1/proxy/execute   →  validate(body) → controller.execute
 *   *    /api/v1/proxy/execute   →  405 METHOD_NOT_ALLOWED
 */
import { ProxyController } from '@interfaces/http/controllers/ProxyController';
import { proxyExecuteBodySchema, validate } from '@interfaces/http/middleware/validation';
import { Router } from 'express';

const router = Router();
const controller = new ProxyController();

router.post('/proxy/execute', validate(proxyExecuteBodySchema, 'body'), controller.execute);
router.all('/proxy/execute', controller.methodNotAllowed);

export { router as proxyRoutes };
