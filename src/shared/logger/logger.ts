/**
 * src/shared/logger/logger.ts
 *
 * WHY:
 * - One structured JSON logger for the whole service, with `service` and `env` on every line.
 * - Account documents carry password hashes, salts and bearer tokens. Those keys are
 *   masked here, once, whatever the caller passed in.
 *
 * HOW TO USE:
 * - `logger.info({ msg: 'users.account.created', flow: 'users.create', username })`
 * - Inside request handlers prefer `withRequestContext(req)` (adds requestId/username).
 * - Pass errors as `{ err }`; the stack is kept.
 */

import winston from 'winston';

const nodeEnv = process.env.NODE_ENV ?? 'development';
const service = process.env.SERVICE_NAME ?? 'workify-backend';
const level = process.env.LOG_LEVEL ?? 'info';

export const SENSITIVE_KEYS: ReadonlySet<string> = new Set([
  'token',
  'password',
  'oldPassword',
  'newPassword',
  'passwordHash',
  'password_hash',
  'salt',
  'pepper',
  'authorization',
]);

export const REDACTED = '[REDACTED]';

/** Shallow copy with sensitive keys masked. Non-objects pass through. */
export function redactSensitive(meta: unknown): unknown {
  if (!meta || typeof meta !== 'object' || Array.isArray(meta)) return meta;

  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(meta)) {
    out[key] = SENSITIVE_KEYS.has(key) ? REDACTED : value;
  }
  return out;
}

const redact = winston.format((info) => {
  for (const key of Object.keys(info)) {
    if (SENSITIVE_KEYS.has(key)) info[key] = REDACTED;
  }
  if (info.meta !== undefined) info.meta = redactSensitive(info.meta);
  return info;
});

export const logger = winston.createLogger({
  level,
  format: winston.format.combine(
    redact(),
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json(),
  ),
  defaultMeta: {
    service,
    env: nodeEnv,
  },
  transports: [new winston.transports.Console()],
});

export type Logger = typeof logger;
