/**
 * Request Validation Middleware Factory
 * Layer: Interfaces (HTTP)
 *
 * This middleware acts as a **bouncer at a club**: before a request reaches
 * the controller, the bouncer checks its ID (data) against the guest list
 * (Zod schema). If the data is valid, the request proceeds; if not, it gets
 * turned away with one entry per failing field.
 *
 * It's a "factory" because `validate(schema, source)` returns a NEW middleware
 * function tailored to a specific schema and request part:
 *
 *   router.post('/proxy/execute', validate(proxyExecuteBodySchema, 'body'), controller.execute);
 *
 * Only the body can be replaced with the parsed value: in Express 5,
 * `req.query` is a getter and cannot be reassigned, so query and params are
 * checked but left as they are.
 *
 * On failure: throws a ValidationError which the global error handler turns
 * into a 400. The controller is never reached.
 */
import { toFieldViolations } from '@application/operations/Operation';
import { ValidationError } from '@shared/errors/AppError';
import type { NextFunction, Request, Response } from 'express';
import { z } from 'zod/v4';

export const proxyExecuteBodySchema = z.object({
  operationType: z.string().min(1),
  payload: z.record(z.string(), z.unknown()),
  requestId: z.string().min(1).optional(),
});

export type ProxyExecuteBody = z.infer<typeof proxyExecuteBodySchema>;

export function validate<T extends z.ZodType>(schema: T, source: 'query' | 'body' | 'params') {
  return (req: Request, _res: Response, next: NextFunction): void => {
    const input: unknown = req[source];
    const result = schema.safeParse(input);

    if (!result.success) {
      throw new ValidationError('Request validation failed', toFieldViolations(result.error, input));
    }

    if (source === 'body') {
      req.body = result.data;
    }
    next();
  };
}
