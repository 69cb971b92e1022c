import { Router } from 'express';
import { AppConfig } from '../config/config';
import { AuthorizationEngine } from '../services/authorizationEngine';
import { register } from '../utils/metrics';

export const createSystemController = (
  config: Pick<AppConfig, 'env' | 'metrics'>,
  engine: Pick<AuthorizationEngine, 'state'>
) => {
  const router = Router();

  router.get('/health', (_req, res) => {
    res.json({ status: 'ok', environment: config.env, authorization: engine.state });
  });

  router.get('/metrics', async (_req, res, next) => {
    if (!config.metrics.enabled) {
      res.status(404).send('metrics disabled');
      return;
    }
    try {
      res.set('Content-Type', register.contentType);
      res.send(await register.metrics());
    } catch (error) {
      next(error);
    }
  });

  return router;
};
