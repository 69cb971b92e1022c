import { Request, Response, NextFunction } from 'express';
import { HttpError, ValidationError } from '../domain/errors';
import logger from '../utils/logger';

const bodyParserStatus = (err: unknown): number | undefined => {
  if (err instanceof SyntaxError && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return undefined;
};

export const errorHandler = (err: unknown, _req: Request, res: Response, _next: NextFunction): void => {
  if (err instanceof ValidationError) {
    res.status(err.status).json({ message: err.message, errors: err.errors });
    return;
  }
  if (err instanceof HttpError) {
    res.status(err.status).json({ message: err.message });
    return;
  }
  const status = bodyParserStatus(err);
  if (status) {
    res.status(status).json({ message: 'Malformed request body.' });
    return;
  }

  logger.error({ err }, 'Unhandled error');
  res.status(500).json({ message: 'Server Error' });
};
