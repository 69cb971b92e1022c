import pinoHttp from 'pino-http';
import { v4 as uuid } from 'uuid';
import logger from '../utils/logger';

export const requestLogger = pinoHttp({
  logger,
  genReqId: (req) => req.headers['x-request-id']?.toString() || uuid(),
  customSuccessMessage: (_req, res) => `Completed ${res.statusCode}`
});
