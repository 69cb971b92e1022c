import { RequestHandler, Router } from 'express';
import { AppConfig } from '../config/config';
import { createAccessController } from '../controllers/accessController';
import { createAuthController } from '../controllers/authController';
import { createBookController } from '../controllers/bookController';
import { createSystemController } from '../controllers/systemController';
import { createAuthMiddleware } from '../middlewares/authMiddleware';
import { Container } from '../services/container';

export const createRouter = (
  container: Container,
  config: Pick<AppConfig, 'env' | 'metrics'>,
  loginRateLimiter: RequestHandler
): Router => {
  const router = Router();
  const authMiddleware = createAuthMiddleware({
    authService: container.authService,
    users: container.repositories.users
  });

  const v1 = Router();
  v1.use('/', createAuthController(container.authService, loginRateLimiter));
  v1.use('/books', authMiddleware, createBookController(container.bookService, container.gate));
  v1.use('/access', authMiddleware, createAccessController(container.accessAdminService, container.gate));

  router.use('/v1', v1);
  router.use('/', createSystemController(config, container.engine));
  return router;
};
