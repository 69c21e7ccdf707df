/**
 * Operations Controller — Catalog Introspection
 * Layer: Interfaces (HTTP)
 *
 * Lists every registered operation with its provider method and the JSON
 * schemas of its payload and response, straight from the dispatcher.
 */
import type { OperationDispatcher } from '@application/services/OperationDispatcher';
import { container } from '@core/container';
import { TOKENS } from '@core/types';
import type { Request, Response } from 'express';

export class OperationsController {
  private dispatcher: OperationDispatcher;

  constructor() {
    this.dispatcher = container.resolve<OperationDispatcher>(TOKENS.OperationDispatcher);
  }

  list = (_req: Request, res: Response): void => {
    res.status(200).json({
      supported_operations: this.dispatcher.operationNames,
      schemas: this.dispatcher.describe(),
    });
  };
}
