import { DateTime } from 'luxon';
import pino from 'pino';
import { OPTIONAL_DEFAULTS } from '../config/config';

const timezone = process.env.TZ || OPTIONAL_DEFAULTS.timezone;

const formatTimestamp = (): string => {
  const zoned = DateTime.now().setZone(timezone, { keepLocalTime: false });
  const target = zoned.isValid ? zoned : DateTime.now();
  const iso = target.toISO() ?? new Date().toISOString();
  return `,"time":"${iso}"`;
};

const logger = pino({
  level: process.env.LOG_LEVEL || OPTIONAL_DEFAULTS.logLevel,
  base: undefined,
  timestamp: formatTimestamp
});

export default logger;
