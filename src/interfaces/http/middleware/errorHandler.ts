/**
 * Global Error Handler & Fallback 404
 * Layer: Interfaces (HTTP)
 *
 * Express 5 forwards rejected promises from async handlers here, so
 * controllers just throw.
 *
 *   - AppError (operational): logged at "warn", answered with its statusCode
 *     and message.
 *   - Body-parser failures (malformed JSON and the like) carry a 4xx `status`
 *     and are answered as a 400-class ValidationError.
 *   - Anything else: logged at "error", answered 500 without details.
 *
 * Requests under /api get `{ status: 'error', message }`; everything else gets
 * an HTML error page. Must be registered last, with all four parameters.
 */
import { logger } from '@core/logger';
import { errorView } from '@interfaces/http/views/bankViews';
import { layout } from '@interfaces/http/views/layout';
import { AppError, NotFoundError, ValidationError } from '@shared/errors/AppError';
import type { NextFunction, Request, Response } from 'express';

const PAGE_TITLES: Record<number, string> = {
  400: 'Bad request',
  404: 'Not found',
  500: 'Something went wrong',
};

/** http-errors instances thrown by express.json() / express.urlencoded(). */
function isClientHttpError(err: Error): err is Error & { status: number } {
  return 'status' in err && typeof err.status === 'number' && err.status >= 400 && err.status < 500;
}

function toAppError(err: Error): AppError | null {
  if (err instanceof AppError) return err;
  if (isClientHttpError(err)) {
    return err instanceof SyntaxError
      ? new ValidationError('Request body is not valid JSON')
      : new AppError(err.message, err.status);
  }
  return null;
}

function send(req: Request, res: Response, statusCode: number, message: string): void {
  if (req.originalUrl.startsWith('/api')) {
    res.status(statusCode).json({ status: 'error', message });
    return;
  }

  const title = PAGE_TITLES[statusCode] ?? 'Error';
  res.status(statusCode).type('html').send(layout({ title, body: errorView(message) }));
}

export function errorHandler(err: Error, req: Request, res: Response, _next: NextFunction): void {
  const appError = toAppError(err);

  if (appError) {
    logger.warn({ statusCode: appError.statusCode, message: appError.message }, 'Operational error');
    send(req, res, appError.statusCode, appError.message);
    return;
  }

  logger.error({ err }, 'Unhandled error');
  send(req, res, 500, 'Internal server error');
}

/** Registered after every router: no route matched. */
export function notFoundHandler(req: Request, _res: Response, next: NextFunction): void {
  next(new NotFoundError('Route', `${req.method} ${req.path}`));
}
