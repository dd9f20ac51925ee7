import { Request, Response, NextFunction } from 'express';
import { logger } from '@/utils/logger';

interface IError extends Error {
  statusCode?: number;
  status?: number;
  code?: string;
  type?: string;   // set by body-parser
}

export const errorHandler = (err: IError, req: Request, res: Response, next: NextFunction) => {
  let statusCode = err.statusCode || 500;
  let code = err.code || 'SERVER_ERROR';
  let message = err.message || 'Server Error';

  // Body is not valid JSON
  if (err.type === 'entity.parse.failed') {
    statusCode = 400;
    code = 'INVALID_JSON';
    message = 'Request body is not valid JSON';
  }

  // Body larger than JSON_BODY_LIMIT
  if (err.type === 'entity.too.large') {
    statusCode = 413;
    code = 'PAYLOAD_TOO_LARGE';
    message = 'Request body exceeds the configured size limit';
  }

  if (statusCode >= 500) {
    logger.error(`Unhandled error on ${req.method} ${req.originalUrl}: ${err.message}`);
    message = 'Server Error';
  } else {
    logger.warn(`Rejected ${req.method} ${req.originalUrl}: ${message}`);
  }

  if (res.headersSent) {
    next(err);
    return;
  }

  res.status(statusCode).json({
    success: false,
    error: {
      code,
      message,
    },
  });
};
