/**
 * Proxy Controller — HTTP Boundary for Operation Execution
 * Layer: Interfaces (HTTP)
 *
 * I keep this thin: build the request context, call the dispatcher, send
 * JSON. The body has already been checked by the `validate` middleware, so
 * `operationType` and `payload` are typed here.
 *
 * The context carries an AbortSignal that fires if the client disconnects
 * before the response is written; the rate limiter and the retrying caller
 * stop waiting when it does.
 *
 * A failed execution is thrown, not sent: the global error handler owns the
 * mapping from error code to status and the error body format.
 */
import type { OperationDispatcher } from '@application/services/OperationDispatcher';
import { audit } from '@core/audit';
import { container } from '@core/container';
import { TOKENS } from '@core/types';
import { MethodNotAllowedError } from '@shared/errors/AppError';
import type { ProxyExecuteResponse, RequestContext } from '@shared/types';
import type { Request, Response } from 'express';

import { USAGE_HINT } from '../middleware/notFound';
import { resolveRequestId } from '../middleware/requestLogger';
import type { ProxyExecuteBody } from '../middleware/validation';

export class ProxyController {
  private dispatcher: OperationDispatcher;

  constructor() {
    this.dispatcher = container.resolve<OperationDispatcher>(TOKENS.OperationDispatcher);
  }

  execute = async (req: Request<Record<string, string>, unknown, ProxyExecuteBody>, res: Response): Promise<void> => {
    const { operationType, payload } = req.body;
    const requestId = resolveRequestId(req);

    const abort = new AbortController();
    res.on('close', () => {
      if (!res.writableFinished) abort.abort();
    });

    const ctx: RequestContext = { requestId, log: req.log, signal: abort.signal };
    audit(ctx.log, { stage: 'proxy_start', operationType });

    const result = await this.dispatcher.execute(operationType, payload, ctx);
    if (result.isErr()) {
      audit(ctx.log, {
        stage: 'proxy_complete',
        outcome: 'error',
        operationType,
        errorCode: result.error.code,
      });
      throw result.error;
    }

    audit(ctx.log, { stage: 'proxy_complete', outcome: 'success', operationType });
    const body: ProxyExecuteResponse = { requestId, operationType, data: result.value };
    res.status(200).json(body);
  };

  methodNotAllowed = (_req: Request, _res: Response): void => {
    throw new MethodNotAllowedError(USAGE_HINT);
  };
}
