/**
 * Operation Catalog Route
 * Layer: Interfaces (HTTP)
 *
 *   GET /api/v1/operations  →  { supported_operations: [...], schemas: {...} }
 */
import { OperationsController } from '@interfaces/http/controllers/OperationsController';
import { Router } from 'express';

const router = Router();
const controller = new OperationsController();

router.get('/operations', controller.list);

export { router as operationRoutes };
