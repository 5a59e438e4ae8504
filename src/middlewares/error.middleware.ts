import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { logger } from '../utils/logging';
import { ResponseHandler } from '../utils/response';
import { DuplicateSkuError } from '../modules/products/products.errors';

export const errorHandler = (
  err: unknown,
  req: Request,
  res: Response,
  // Express recognises error middleware by its four parameters
  _next: NextFunction
) => {
  logger.error('[Error Handler]', {
    message: err instanceof Error ? err.message : String(err),
    stack: err instanceof Error ? err.stack : undefined,
    url: req.originalUrl,
    method: req.method,
    body: req.body,
    params: req.params,
    query: req.query,
  });

  if (err instanceof ZodError) {
    return ResponseHandler.validationError(res, err.issues);
  }

  if (err instanceof DuplicateSkuError) {
    return ResponseHandler.conflict(res, err.message, { sku: err.sku });
  }

  // express.json() parse failures carry a status
  if (err instanceof SyntaxError && 'status' in err && err.status === 400) {
    return ResponseHandler.error(res, 'Malformed JSON body', 400, { code: 'BAD_REQUEST' });
  }

  return ResponseHandler.internalError(res, 'Internal server error', err);
};

export const notFoundHandler = (req: Request, res: Response) => {
  logger.warn('[Not Found]', {
    url: req.originalUrl,
    method: req.method,
  });

  ResponseHandler.notFound(res, 'Route not found');
};
