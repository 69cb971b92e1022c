import { NextFunction, RequestHandler, Response } from 'express';
import { AuthorizationGate } from '../services/authorizationGate';
import { AuthenticatedRequest } from './authMiddleware';

const signalFrom = (res: Response): AbortSignal | undefined => {
  const candidate: unknown = res.locals?.abortSignal;
  return candidate instanceof AbortSignal ? candidate : undefined;
};

/**
 * Guards a route with a named permission. Must run before the handler does
 * anything else; a denial is forwarded to the error handler as a 403 and an
 * infrastructure failure as a 500, never as an allow.
 */
export const requirePermission = (gate: Pick<AuthorizationGate, 'require'>, permission: string): RequestHandler => {
  return async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    const user = req.user;
    if (!user) {
      res.status(401).json({ message: 'Unauthenticated.' });
      return;
    }

    try {
      await gate.require(user.id, permission, { signal: signalFrom(res) });
    } catch (error) {
      next(error);
      return;
    }
    next();
  };
};
