import type { NextFunction, Request, Response } from 'express';
import logger from '../logger.js';

export type ErrorParams = Record<string, string | number | boolean | null | string[] | number[]>;

export interface AppErrorOptions {
  code?: string;
  params?: ErrorParams;
  isOperational?: boolean;
  cause?: unknown;
}

function buildErrorCode(message: string): string {
  const normalized = message
    .toUpperCase()
    .replace(/[^A-Z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
  return normalized || 'ERROR';
}

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly params?: ErrorParams;
  public readonly isOperational: boolean;

  constructor(statusCode: number, message: string, options: AppErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = new.target.name;

    this.statusCode = statusCode;
    this.code = options.code || buildErrorCode(message);
    this.params = options.params;
    this.isOperational = options.isOperational ?? true;
  }
}

/** Bad user input: negative amounts, malformed dates, empty required fields. */
export class ValidationError extends AppError {
  constructor(message: string, params?: ErrorParams) {
    super(400, message, { code: 'VALIDATION_ERROR', params });
  }
}

export class NotFoundError extends AppError {
  constructor(message: string, params?: ErrorParams) {
    super(404, message, { code: 'NOT_FOUND', params });
  }
}

/** A backing file could not be read, parsed or written. */
export class StorageError extends AppError {
  constructor(message: string, path: string, cause?: unknown) {
    super(500, message, { code: 'STORAGE_ERROR', params: { path }, cause });
  }
}

/** An optional collaborator (e.g. the PDF library) is not installed. */
export class DependencyUnavailableError extends AppError {
  constructor(dependency: string, cause?: unknown) {
    super(503, `Optional dependency "${dependency}" is not available`, {
      code: 'DEPENDENCY_UNAVAILABLE',
      params: { dependency },
      cause,
    });
  }
}

export function asyncHandler(fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>) {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}

export function errorHandler(err: Error, req: Request, res: Response, _next: NextFunction) {
  if (err instanceof AppError) {
    const logContext = {
      statusCode: err.statusCode,
      code: err.code,
      params: err.params,
      message: err.message,
      path: req.path,
      method: req.method,
    };
    if (err.statusCode >= 500) {
      logger.error({ ...logContext, cause: err.cause }, 'Operational failure');
    } else {
      logger.warn(logContext, 'Operational error');
    }

    return res.status(err.statusCode).json({
      error: err.message,
      code: err.code,
      params: err.params,
    });
  }

  // Malformed JSON bodies surface from express.json() as SyntaxError with a status
  if (err instanceof SyntaxError && 'status' in err && err.status === 400) {
    logger.warn({ path: req.path, method: req.method }, 'Malformed JSON body');
    return res.status(400).json({
      error: 'Request body is not valid JSON',
      code: 'INVALID_JSON',
    });
  }

  // Unexpected errors - log only metadata, not the body (it may contain financial data)
  logger.error(
    {
      err,
      path: req.path,
      method: req.method,
      bodyKeys: req.body && typeof req.body === 'object' ? Object.keys(req.body) : [],
    },
    'Unexpected error'
  );

  return res.status(500).json({
    error: 'Internal server error',
    code: 'INTERNAL_SERVER_ERROR',
  });
}

export function notFoundHandler(req: Request, res: Response) {
  logger.warn({ path: req.path, method: req.method }, 'Route not found');
  res.status(404).json({
    error: 'Not found',
    code: 'ROUTE_NOT_FOUND',
  });
}
