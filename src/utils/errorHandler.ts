import type { Request, Response, NextFunction } from 'express';
import multer from 'multer';
import { ZodError } from 'zod';
import { logger } from './logger';

export class AppError extends Error {
  public statusCode: number;
  public isOperational: boolean;

  constructor(message: string, statusCode: number, isOperational = true) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    Error.captureStackTrace(this, this.constructor);
  }
}

/** Malformed or empty required fields in a candidate profile or job listing. */
export class InvalidInputError extends AppError {
  constructor(message: string) {
    super(message, 400);
  }
}

/** Scoring configuration that cannot be used (bad weights or match mode). */
export class InvalidConfigError extends AppError {
  constructor(message: string) {
    super(message, 400);
  }
}

export const handleError = (err: Error, req: Request, res: Response, next: NextFunction) => {
  if (err instanceof AppError) {
    logger.error('Application error', { name: err.name, message: err.message, statusCode: err.statusCode });
    return res.status(err.statusCode).json({
      error: err.message
    });
  }

  if (err instanceof ZodError) {
    logger.warn('Request validation failed', { issues: err.issues.length });
    return res.status(400).json({
      error: 'Invalid request body',
      details: err.issues.map(issue => ({
        path: issue.path.join('.'),
        message: issue.message
      }))
    });
  }

  if (err instanceof multer.MulterError) {
    return res.status(400).json({
      error: err.message
    });
  }

  if (err instanceof SyntaxError && 'body' in err) {
    return res.status(400).json({
      error: 'Malformed JSON body'
    });
  }

  // Log unexpected errors
  logger.error('Unexpected error', err);

  res.status(500).json({
    error: 'Internal server error'
  });
};

export const notFoundHandler = (req: Request, res: Response) => {
  res.status(404).json({
    error: 'Route not found'
  });
};
