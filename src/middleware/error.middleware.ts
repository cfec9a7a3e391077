import { Request, Response, NextFunction } from 'express';
import logger from '../utils/logger';
import { ApiError, PremiumError } from '../utils/errors';
import { sendError, sendPremiumError } from '../utils/response';

const isBodyParseError = (err: Error): boolean =>
  'type' in err && err.type === 'entity.parse.failed';

export const errorHandler = (
  err: Error,
  req: Request,
  res: Response,
  next: NextFunction
): void => {
  if (err instanceof PremiumError) {
    logger.warn('Request rejected', {
      code: err.code,
      error: err.message,
      path: req.path,
      method: req.method,
    });
    sendPremiumError(res, err);
    return;
  }

  if (isBodyParseError(err)) {
    logger.warn('Malformed JSON body', { error: err.message, path: req.path, method: req.method });
    sendPremiumError(res, PremiumError.invalidInput());
    return;
  }

  if (err instanceof ApiError) {
    sendError(res, err.message, err.statusCode);
    return;
  }

  logger.error('Error occurred:', {
    error: err.message,
    stack: err.stack,
    path: req.path,
    method: req.method,
  });

  // Default to 500 server error
  sendPremiumError(res, PremiumError.internal());
};

export const notFoundHandler = (req: Request, res: Response): void => {
  sendError(res, `Route ${req.originalUrl} not found`, 404);
};
