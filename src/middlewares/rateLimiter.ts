import rateLimit from 'express-rate-limit';
import { AppConfig } from '../config/config';

type RateLimitSettings = AppConfig['rateLimits'];

export const createGlobalRateLimiter = (settings: RateLimitSettings) =>
  rateLimit({
    windowMs: settings.globalWindowMs,
    max: settings.globalMax,
    standardHeaders: true,
    legacyHeaders: false
  });

export const createLoginRateLimiter = (settings: RateLimitSettings) =>
  rateLimit({
    windowMs: settings.loginWindowMs,
    max: settings.loginMax,
    standardHeaders: true,
    legacyHeaders: false,
    message: { message: 'Too many login attempts. Please try again later.' }
  });
