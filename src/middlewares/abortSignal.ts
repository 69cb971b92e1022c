import { NextFunction, Request, Response } from 'express';

/** Exposes an AbortSignal on `res.locals` that fires when the client goes away mid-request. */
export const abortSignalMiddleware = (_req: Request, res: Response, next: NextFunction): void => {
  const controller = new AbortController();
  res.once('close', () => {
    if (!res.writableEnded) {
      controller.abort();
    }
  });
  res.locals.abortSignal = controller.signal;
  next();
};
