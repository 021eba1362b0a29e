import { NextFunction, Request, Response } from 'express';
import ApiError from '../utils/ApiError';
import { getRequestLogger } from '../utils/logger';

function resolveErrorCode(statusCode: number): string {
  switch (statusCode) {
    case 400:
      return 'BAD_REQUEST';
    case 404:
      return 'NOT_FOUND';
    case 413:
      return 'PAYLOAD_TOO_LARGE';
    case 415:
      return 'UNSUPPORTED_MEDIA_TYPE';
    case 422:
      return 'VALIDATION_FAILED';
    case 503:
      return 'SERVICE_UNAVAILABLE';
    default:
      return statusCode >= 500 ? 'INTERNAL_ERROR' : 'UNKNOWN_ERROR';
  }
}

// body-parser and http-errors report client failures through `status`/`statusCode`.
function readHttpStatus(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null) {
    return undefined;
  }
  const candidate = 'status' in err ? err.status : 'statusCode' in err ? err.statusCode : undefined;
  if (typeof candidate === 'number' && candidate >= 400 && candidate < 600) {
    return candidate;
  }
  return undefined;
}

export function notFoundHandler(_req: Request, _res: Response, next: NextFunction): void {
  next(new ApiError(404, 'Route not found', undefined, 'NOT_FOUND'));
}

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  const isApiError = err instanceof ApiError;
  const statusCode = isApiError ? err.statusCode : readHttpStatus(err) ?? 500;
  const code = isApiError && err.code ? err.code : resolveErrorCode(statusCode);

  let message = 'Internal Server Error';
  if (isApiError) {
    message = err.message;
  } else if (statusCode < 500 && err instanceof Error) {
    message = err.message;
  }

  const payload: Record<string, unknown> = {
    code,
    message,
    detail: message,
  };

  if (isApiError && err.details !== undefined) {
    payload.details = err.details;
  }

  if (!isApiError && statusCode >= 500 && err instanceof Error && process.env.NODE_ENV !== 'production') {
    payload.details = {
      message: err.message,
      stack: err.stack,
    };
  }

  const requestLogger = getRequestLogger(req);
  const requestId = req.id;
  const level = statusCode >= 500 ? 'error' : 'warn';
  if (err instanceof Error) {
    requestLogger[level]({ err, requestId, code, statusCode }, err.message);
  } else {
    requestLogger[level]({ requestId, code, statusCode, err }, 'Unhandled error');
  }

  if (res.headersSent) {
    return;
  }

  res.status(statusCode).json(payload);
}
