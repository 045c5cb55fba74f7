// =============================================================================
// Logger — winston, with credential redaction on every meta object
// =============================================================================
import winston from 'winston';

const REDACT_KEYS = new Set([
  'token', 'accesstoken', 'apitoken', 'authorization', 'secret',
  'password', 'cookie', 'apikey', 'jwtsecret',
  'wrikeapitoken', 'hubspotaccesstoken', 'mongodburi',
]);

export function redactSensitive(value: unknown, depth = 0): unknown {
  if (depth > 6 || value === null || typeof value !== 'object') return value;
  if (Array.isArray(value)) return value.map((item) => redactSensitive(item, depth + 1));

  const clean: Record<string, unknown> = {};
  for (const [key, inner] of Object.entries(value)) {
    const normKey = key.toLowerCase().replace(/[_\-.\s]/g, '');
    clean[key] = REDACT_KEYS.has(normKey) ? '[REDACTED]' : redactSensitive(inner, depth + 1);
  }
  return clean;
}

const logger = winston.createLogger({
  level: process.env.LOG_LEVEL ?? 'info',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.printf(({ timestamp, level, message, ...meta }) => {
      const safe = redactSensitive(meta);
      const metaStr =
        safe !== null && typeof safe === 'object' && Object.keys(safe).length
          ? ` ${JSON.stringify(safe)}`
          : '';
      return `[${String(timestamp)}] ${level.toUpperCase()}: ${String(message)}${metaStr}`;
    }),
  ),
  transports: [
    new winston.transports.Console(),
    ...(process.env.NODE_ENV !== 'production'
      ? [new winston.transports.File({ filename: 'logs/sync.log', maxsize: 5_000_000, maxFiles: 3 })]
      : []),
  ],
});

export default logger;
