import type { Request } from 'express';
import type { LoginMetadata } from '../services/authService';

const pickHeaderValue = (value: string | string[] | undefined): string | undefined => {
  if (!value) {
    return undefined;
  }
  if (Array.isArray(value)) {
    return value.find((item) => item && item.trim().length > 0)?.trim();
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
};

const extractClientIp = (req: Request): string | undefined => {
  const forwarded = pickHeaderValue(req.headers['x-forwarded-for']);
  if (forwarded) {
    return forwarded.split(',')[0]?.trim() || forwarded;
  }
  const ip = req.ip;
  if (ip && ip.trim().length > 0) {
    return ip.trim();
  }
  return undefined;
};

export const extractRequestMetadata = (req: Request): LoginMetadata => ({
  ip: extractClientIp(req),
  userAgent: pickHeaderValue(req.headers['user-agent'])
});
