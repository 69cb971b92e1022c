import { Request, Response, NextFunction } from 'express';
import { trackRequest } from '../utils/metrics';

// Label by route template (`/api/v1/books/:id`) so ids never become label values.
const routeLabel = (req: Request): string => {
  const path: unknown = req.route?.path;
  return typeof path === 'string' ? `${req.baseUrl}${path}` : 'unmatched';
};

export const metricsMiddleware = (req: Request, res: Response, next: NextFunction): void => {
  const start = process.hrtime.bigint();
  res.on('finish', () => {
    const duration = Number(process.hrtime.bigint() - start) / 1e9;
    trackRequest({ method: req.method, route: routeLabel(req), status: String(res.statusCode) }, duration);
  });
  next();
};
