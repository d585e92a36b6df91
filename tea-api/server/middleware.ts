import type { Request, Response, NextFunction } from 'express';

import logger from './logger';
import { ApiError, ValidationError, apiError, INTERNAL_ERROR_MESSAGE } from './errors';

// HTTP request logging middleware
export const requestLogger = (slowRequestThreshold: number) =>
  (req: Request, res: Response, next: NextFunction): void => {
    const startTime = Date.now();
    let logged = false;

    const logRequest = () => {
      if (logged) return; // finish and close can both fire
      logged = true;

      const duration = Date.now() - startTime;
      const logMessage = `${req.method} ${req.originalUrl} ${res.statusCode} ${duration}ms`;

      if (duration > slowRequestThreshold) {
        logger.warn(`${logMessage} (slow request)`);
      } else {
        logger.info(logMessage);
      }
    };

    res.on('finish', logRequest);
    res.on('close', logRequest);

    next();
  };

export const notFoundHandler = (req: Request, res: Response): void => {
  logger.warn(`No route for ${req.method} ${req.originalUrl}`);
  res.status(404).json(apiError('NOT_FOUND', 'Resource not found'));
};

// body-parser rejects bad input with an exposed 4xx http-errors error whose `type` names the reason
const BODY_ERROR_REASONS: Readonly<Record<string, string>> = {
  'entity.parse.failed': 'Malformed JSON',
  'entity.too.large': 'Request body too large',
  'charset.unsupported': 'Unsupported charset',
  'encoding.unsupported': 'Unsupported content encoding',
  'request.aborted': 'Request aborted',
  'request.size.invalid': 'Request size did not match content length'
};

const bodyErrorReason = (error: unknown): string | undefined => {
  if (!(error instanceof Error) || !('expose' in error) || error.expose !== true) {
    return undefined;
  }
  const status = 'status' in error ? error.status : 'statusCode' in error ? error.statusCode : undefined;
  if (typeof status !== 'number' || status < 400 || status >= 500) {
    return undefined;
  }
  const type = 'type' in error && typeof error.type === 'string' ? error.type : undefined;
  return (type !== undefined ? BODY_ERROR_REASONS[type] : undefined) ?? error.message;
};

export const errorHandler = (error: unknown, req: Request, res: Response, _next: NextFunction): void => {
  if (error instanceof ValidationError) {
    logger.warn(`Validation failed - ${req.method} ${req.originalUrl}: ${JSON.stringify(error.details)}`);
    res.status(error.statusCode).json(error.toResponse());
    return;
  }

  if (error instanceof ApiError) {
    res.status(error.statusCode).json(error.toResponse());
    return;
  }

  const bodyReason = bodyErrorReason(error);
  if (bodyReason !== undefined) {
    logger.warn(`Rejected request body - ${req.method} ${req.originalUrl}: ${bodyReason}`);
    res.status(400).json(apiError('VALIDATION_ERROR', 'Invalid request body', { body: bodyReason }));
    return;
  }

  logger.error(
    `Unexpected error in ${req.method} ${req.originalUrl}`,
    error instanceof Error ? error : new Error(String(error))
  );
  res.status(500).json(apiError('INTERNAL_ERROR', INTERNAL_ERROR_MESSAGE));
};
