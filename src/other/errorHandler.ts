import { NextFunction, Request, Response } from 'express';
import logger from 'jet-logger';
import HttpStatusCodes from '../constants/HttpStatusCodes';
import { RetrievalError, ValidationError } from '../lib/realestate/errors';

/**
 * Error with the status code the route should answer with.
 */
export class RouteError extends Error {
  public status: HttpStatusCodes;

  public constructor(status: HttpStatusCodes, message: string) {
    super(message);
    this.name = 'RouteError';
    this.status = status;
  }
}

/**
 * Map domain errors to route errors. Anything unknown becomes a 500.
 */
export function toRouteError(error: unknown, fallbackMessage = 'Internal Server Error'): RouteError {
  if (error instanceof RouteError) return error;
  if (error instanceof ValidationError) {
    return new RouteError(HttpStatusCodes.BAD_REQUEST, error.message);
  }
  if (error instanceof RetrievalError) {
    return new RouteError(HttpStatusCodes.BAD_GATEWAY, error.message);
  }
  const message = error instanceof Error && error.message ? error.message : fallbackMessage;
  return new RouteError(HttpStatusCodes.INTERNAL_SERVER_ERROR, message);
}

// body-parser and other http-errors style failures (malformed JSON, too large)
function isClientHttpError(err: unknown): err is Error & { status: number } {
  return (
    err instanceof Error &&
    'status' in err &&
    typeof err.status === 'number' &&
    err.status >= 400 &&
    err.status < 500
  );
}

export function errorHandler(err: unknown, _req: Request, res: Response, next: NextFunction) {
  if (res.headersSent) return next(err);

  if (!(err instanceof RouteError) && isClientHttpError(err)) {
    logger.warn(`[${err.status}] ${err.message}`);
    return res.status(err.status).json({ error: err.message });
  }

  const routeError = toRouteError(err);
  if (routeError.status >= HttpStatusCodes.INTERNAL_SERVER_ERROR) {
    logger.err(err, true);
  } else {
    logger.warn(`[${routeError.status}] ${routeError.message}`);
  }

  return res.status(routeError.status).json({ error: routeError.message });
}
