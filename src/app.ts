import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import cookieParser from 'cookie-parser';
import { AppConfig } from './config/config';
import { createRouter } from './routes';
import { abortSignalMiddleware } from './middlewares/abortSignal';
import { errorHandler } from './middlewares/errorHandler';
import { requestLogger } from './middlewares/requestLogger';
import { createGlobalRateLimiter, createLoginRateLimiter } from './middlewares/rateLimiter';
import { metricsMiddleware } from './middlewares/metricsMiddleware';
import { Container } from './services/container';

export type AppSettings = Pick<AppConfig, 'env' | 'appBaseUrl' | 'metrics' | 'rateLimits'>;

export const createApp = (container: Container, config: AppSettings) => {
  const app = express();
  app.set('trust proxy', 1);
  const corsOptions: cors.CorsOptions = {
    origin: config.appBaseUrl,
    credentials: true,
    methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization']
  };
  app.use(cors(corsOptions));
  app.use(createGlobalRateLimiter(config.rateLimits));
  app.use(cookieParser());
  app.use(helmet());
  app.use(express.json());
  app.use(requestLogger);
  app.use(metricsMiddleware);
  app.use(abortSignalMiddleware);

  app.get('/', (_req, res) => {
    res.json({ name: 'Book Catalog API', version: '1.0.0', environment: config.env });
  });
  app.use('/api', createRouter(container, config, createLoginRateLimiter(config.rateLimits)));
  app.use((_req, res) => {
    res.status(404).json({ message: 'Not Found' });
  });
  app.use(errorHandler);

  return app;
};
