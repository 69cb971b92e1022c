import dotenv from 'dotenv';
import { assertValidHttpUrl } from '../utils/validators';

dotenv.config();

export const OPTIONAL_DEFAULTS = Object.freeze({
  port: 8080,
  nodeEnv: 'development',
  appBaseUrl: 'http://localhost:3000',
  jwtTtlMinutes: 60,
  bcryptCost: 12,
  loginMaxAttempts: 10,
  loginLockMinutes: 15,
  cacheTtlSeconds: 60,
  storageTimeoutMs: 5_000,
  timezone: 'UTC',
  metricsEnabled: true,
  logLevel: 'info',
  rateLimitGlobalWindowMs: 60_000,
  rateLimitGlobalMax: 300,
  rateLimitLoginWindowMs: 60_000,
  rateLimitLoginMax: 20
});

export interface AppConfig {
  port: number;
  env: string;
  appBaseUrl: string;
  jwt: {
    secret: string;
    algorithm: 'HS256';
    ttlMinutes: number;
  };
  password: {
    bcryptCost: number;
  };
  auth: {
    loginMaxAttempts: number;
    loginLockMinutes: number;
  };
  storage: {
    googleServiceAccountJson: string;
    spreadsheetId: string;
    cacheTtlSeconds: number;
    timeoutMs: number;
  };
  timezone: string;
  metrics: {
    enabled: boolean;
  };
  logLevel: string;
  rateLimits: {
    globalWindowMs: number;
    globalMax: number;
    loginWindowMs: number;
    loginMax: number;
  };
}

type Env = Record<string, string | undefined>;

const required = (value: string | undefined, name: string): string => {
  if (!value) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  return value;
};

const numeric = (value: string | undefined, fallback: number): number => {
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
};

const toBoolean = (value: string | undefined, fallback: boolean): boolean => {
  const normalized = (value ?? String(fallback)).toLowerCase();
  return normalized === 'true';
};

const decodeBase64 = (value: string): string => {
  const decoded = Buffer.from(value, 'base64').toString('utf8');
  if (!decoded.trim().startsWith('{')) {
    throw new Error('Failed to decode GOOGLE_SERVICE_ACCOUNT_JSON_BASE64 - ensure it is valid base64 JSON');
  }
  return decoded;
};

const normalizeAppBaseUrl = (value: string): string => {
  assertValidHttpUrl(value, 'APP_BASE_URL');
  return new URL(value).origin;
};

export const loadConfig = (env: Env = process.env): AppConfig => ({
  port: numeric(env.PORT, OPTIONAL_DEFAULTS.port),
  env: env.NODE_ENV || OPTIONAL_DEFAULTS.nodeEnv,
  appBaseUrl: normalizeAppBaseUrl(env.APP_BASE_URL || OPTIONAL_DEFAULTS.appBaseUrl),
  jwt: {
    secret: required(env.JWT_SECRET, 'JWT_SECRET'),
    algorithm: 'HS256',
    ttlMinutes: Math.max(1, numeric(env.JWT_TTL_MINUTES, OPTIONAL_DEFAULTS.jwtTtlMinutes))
  },
  password: {
    bcryptCost: numeric(env.BCRYPT_COST, OPTIONAL_DEFAULTS.bcryptCost)
  },
  auth: {
    loginMaxAttempts: Math.max(1, numeric(env.LOGIN_MAX_ATTEMPTS, OPTIONAL_DEFAULTS.loginMaxAttempts)),
    loginLockMinutes: Math.max(1, numeric(env.LOGIN_LOCK_MINUTES, OPTIONAL_DEFAULTS.loginLockMinutes))
  },
  storage: {
    googleServiceAccountJson: decodeBase64(
      required(env.GOOGLE_SERVICE_ACCOUNT_JSON_BASE64, 'GOOGLE_SERVICE_ACCOUNT_JSON_BASE64')
    ),
    spreadsheetId: required(env.SHEETS_SPREADSHEET_ID, 'SHEETS_SPREADSHEET_ID'),
    cacheTtlSeconds: numeric(env.CACHE_TTL_SECONDS, OPTIONAL_DEFAULTS.cacheTtlSeconds),
    timeoutMs: numeric(env.STORAGE_TIMEOUT_MS, OPTIONAL_DEFAULTS.storageTimeoutMs)
  },
  timezone: env.TZ || OPTIONAL_DEFAULTS.timezone,
  metrics: {
    enabled: toBoolean(env.METRICS_ENABLED, OPTIONAL_DEFAULTS.metricsEnabled)
  },
  logLevel: env.LOG_LEVEL || OPTIONAL_DEFAULTS.logLevel,
  rateLimits: {
    globalWindowMs: numeric(env.RATE_LIMIT_GLOBAL_WINDOW_MS, OPTIONAL_DEFAULTS.rateLimitGlobalWindowMs),
    globalMax: numeric(env.RATE_LIMIT_GLOBAL_MAX, OPTIONAL_DEFAULTS.rateLimitGlobalMax),
    loginWindowMs: numeric(env.RATE_LIMIT_LOGIN_WINDOW_MS, OPTIONAL_DEFAULTS.rateLimitLoginWindowMs),
    loginMax: numeric(env.RATE_LIMIT_LOGIN_MAX, OPTIONAL_DEFAULTS.rateLimitLoginMax)
  }
});
