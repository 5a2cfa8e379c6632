import type { NextFunction, Request, Response } from 'express';
import multer from 'multer';
import { ZodError } from 'zod';

import { AppError, InternalError, isAppError, ValidationError } from '../errors';
import { logger } from '../utils/logger';

export interface ErrorBody {
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
  };
}

export function fromZodError(error: ZodError, message = 'Request validation failed.'): ValidationError {
  return new ValidationError(
    message,
    error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`)
  );
}

function normalize(error: unknown): AppError {
  if (isAppError(error)) {
    return error;
  }
  if (error instanceof ZodError) {
    return fromZodError(error);
  }
  if (error instanceof multer.MulterError) {
    return new ValidationError(error.message, [error.code]);
  }
  if (error instanceof SyntaxError && 'body' in error) {
    return new ValidationError('Request body is not valid JSON.');
  }
  return new InternalError();
}

export function toErrorBody(error: AppError): ErrorBody {
  const details = error.details();
  return {
    error: details ? { code: error.code, message: error.message, details } : { code: error.code, message: error.message }
  };
}

export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({ error: { code: 'NotFound', message: `No route for ${req.method} ${req.path}.` } });
}

// Express recognises error middleware by its four parameters.
export function errorHandler(error: unknown, req: Request, res: Response, _next: NextFunction): void {
  const appError = normalize(error);
  if (appError instanceof InternalError) {
    logger.error('http', `${req.method} ${req.originalUrl} failed`, error);
  } else {
    logger.debug('http', `${req.method} ${req.originalUrl} -> ${appError.statusCode} ${appError.code}`);
  }

  if (res.headersSent) {
    res.end();
    return;
  }
  res.status(appError.statusCode).json(toErrorBody(appError));
}
