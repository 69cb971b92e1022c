import { Request, Response, NextFunction, RequestHandler } from 'express';
import { ActorId } from '../domain/types';
import { UserRepository } from '../repositories/interfaces';
import { AuthService } from '../services/authService';

export const ACCESS_COOKIE_NAME = 'access_token';

export interface AuthenticatedUser {
  id: ActorId;
  name: string;
  email: string;
}

export interface AuthenticatedRequest extends Request {
  user?: AuthenticatedUser;
}

const UNAUTHENTICATED = { message: 'Unauthenticated.' };

const extractToken = (req: Request): string | undefined => {
  const authHeader = req.headers.authorization;
  if (authHeader) {
    const [scheme, value] = authHeader.split(' ');
    if (scheme?.toLowerCase() === 'bearer' && value) {
      return value;
    }
  }
  const cookieToken: unknown = req.cookies?.[ACCESS_COOKIE_NAME];
  return typeof cookieToken === 'string' && cookieToken ? cookieToken : undefined;
};

export const createAuthMiddleware = (deps: {
  authService: Pick<AuthService, 'verifyAccessToken'>;
  users: Pick<UserRepository, 'getUserById'>;
}): RequestHandler => {
  return async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    const token = extractToken(req);
    if (!token) {
      res.status(401).json(UNAUTHENTICATED);
      return;
    }

    let subject: ActorId;
    try {
      subject = deps.authService.verifyAccessToken(token).sub;
    } catch (error) {
      res.status(401).json(UNAUTHENTICATED);
      return;
    }

    try {
      const user = await deps.users.getUserById(subject);
      if (!user) {
        res.status(401).json(UNAUTHENTICATED);
        return;
      }
      req.user = { id: user.id, name: user.name, email: user.email };
      next();
    } catch (error) {
      next(error);
    }
  };
};
