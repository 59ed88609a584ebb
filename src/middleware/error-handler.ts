/**
 * Error Handling Middleware
 */

import { Request, Response, NextFunction, RequestHandler } from 'express';
import { env } from '../config/env';

export class ApiError extends Error {
  constructor(
    public readonly statusCode: number,
    message: string,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

/**
 * Forward rejections from async route handlers to the error handler
 */
export const asyncHandler = (
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
): RequestHandler => {
  return (req, res, next) => {
    fn(req, res, next).catch(next);
  };
};

export const errorHandler = (
  error: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void => {
  const statusCode = error instanceof ApiError ? error.statusCode : 500;

  if (statusCode >= 500) {
    console.error(`Error on ${req.method} ${req.originalUrl}:`, error);
  }

  const body: { success: false; error: string; details?: unknown; stack?: string } = {
    success: false,
    error: statusCode >= 500 && env.NODE_ENV === 'production' ? 'Internal server error' : error.message,
  };

  if (error instanceof ApiError && error.details !== undefined) {
    body.details = error.details;
  }
  if (env.NODE_ENV === 'development' && statusCode >= 500) {
    body.stack = error.stack;
  }

  res.status(statusCode).json(body);
};
