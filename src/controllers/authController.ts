import { RequestHandler, Router } from 'express';
import { AuthService } from '../services/authService';
import { extractRequestMetadata } from '../utils/requestContext';

export const createAuthController = (authService: Pick<AuthService, 'login'>, loginRateLimiter: RequestHandler) => {
  const router = Router();

  router.post('/login', loginRateLimiter, async (req, res, next) => {
    try {
      const result = await authService.login(req.body, extractRequestMetadata(req));
      res.json({
        access_token: result.accessToken,
        token_type: result.tokenType,
        expires_in: result.expiresIn
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
};
