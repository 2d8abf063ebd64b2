/**
 * Error Handler Middleware
 *
 * Express middleware for catching and formatting errors raised by
 * application routes. Converts all errors to the ApiErrorResponse format.
 */

import { Request, Response, NextFunction, RequestHandler } from 'express';
import { ApiError, InternalError, NotFoundError } from './ApiError';
import { createLogger } from '../utils/logger';
import { requestContext } from '../utils/requestContext';

const log = createLogger('ErrorHandler');

/**
 * Main error handler middleware
 *
 * Should be registered last in the middleware chain.
 *
 * ```typescript
 * app.use(errorHandler);
 * ```
 */
export function errorHandler(
  error: Error,
  req: Request,
  res: Response,
  // Express identifies error handlers by arity
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  _next: NextFunction
): void {
  const requestId = requestContext.getRequestId();

  if (error instanceof ApiError) {
    // Operational errors at warn level, programming errors at error level
    if (error.isOperational) {
      log.warn(`API Error: ${error.code}`, {
        message: error.message,
        statusCode: error.statusCode,
        details: error.details,
      });
    } else {
      log.error(`Unexpected API Error: ${error.code}`, {
        message: error.message,
        stack: error.stack,
        details: error.details,
      });
    }

    res.status(error.statusCode).json(error.toResponse(requestId));
    return;
  }

  log.error('Unhandled error', {
    name: error.name,
    message: error.message,
    stack: error.stack,
    path: req.path,
  });

  const internalError = new InternalError();
  res.status(500).json(internalError.toResponse(requestId));
}

/**
 * Catch-all for requests that matched no route
 */
export function notFoundHandler(req: Request, res: Response): void {
  const notFound = new NotFoundError(`No route for ${req.method} ${req.path}`);
  res.status(404).json(notFound.toResponse(requestContext.getRequestId()));
}

/**
 * Async handler wrapper
 *
 * Wraps async route handlers to forward rejections to the error handler.
 *
 * ```typescript
 * router.get('/', asyncHandler(async (req, res) => {
 *   res.send(await renderer.render('index', getRequestI18n(req)));
 * }));
 * ```
 */
export function asyncHandler<T>(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<T>
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}
