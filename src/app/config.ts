/**
 * src/app/config.ts
 *
 * WHY:
 * - Central place for env parsing + validation (12-factor friendly).
 * - Prevents "undefined env var" bugs at runtime.
 *
 * HOW TO USE:
 * - In dev, we load .env via dotenv.
 * - In prod, the platform injects env vars (no file).
 *
 * TYPING:
 * - nodeEnv is a union ('development' | 'test' | 'production'), not a plain string,
 *   so invalid values ('prod', 'staging') are caught at startup by Zod.
 * - directoryIndex is a union so di.ts can switch on it exhaustively.
 */

import 'dotenv/config';
import { z } from 'zod';

const NodeEnvSchema = z.enum(['development', 'test', 'production']).default('development');
const DirectoryIndexSchema = z.enum(['scan', 'memory']).default('memory');

const ConfigSchema = z.object({
  NODE_ENV: NodeEnvSchema,
  PORT: z.coerce.number().default(3000),

  // Root of the document corpus (<root>/<Role>/<username>/user_data.json + collections)
  DATA_ROOT: z.string().min(1).default('./data'),

  // Logging / service identity
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
  SERVICE_NAME: z.string().default('workify-backend'),

  // Credentials
  PASSWORD_PEPPER: z.string().min(16, 'PASSWORD_PEPPER must be at least 16 characters'),
  ARGON2_TIME_COST: z.coerce.number().int().min(2).max(10).default(4),
  ARGON2_MEMORY_COST: z.coerce
    .number()
    .int()
    .min(1024)
    .max(1024 * 1024)
    .default(102400),
  ARGON2_PARALLELISM: z.coerce.number().int().min(1).max(16).default(8),
  ARGON2_HASH_LENGTH: z.coerce.number().int().min(32).max(128).default(64),

  // Bearer tokens: random bytes after the role prefix (16 bytes = 128 bits)
  TOKEN_BYTES: z.coerce.number().int().min(16).max(64).default(16),

  DIRECTORY_INDEX: DirectoryIndexSchema,

  DEFAULT_AVATAR_URL: z.string().default('default_avatar_url'),

  // Login attempts per username
  LOGIN_RATE_LIMIT: z.coerce.number().int().min(1).default(10),
  LOGIN_RATE_WINDOW_SECONDS: z.coerce.number().int().min(1).default(900),
});

export type NodeEnv = z.infer<typeof NodeEnvSchema>;
export type DirectoryIndexMode = z.infer<typeof DirectoryIndexSchema>;

export type AppConfig = {
  nodeEnv: NodeEnv;
  port: number;
  dataRoot: string;

  logLevel: string;
  serviceName: string;

  passwordPepper: string;
  argon2: {
    timeCost: number;
    memoryCost: number;
    parallelism: number;
    hashLength: number;
  };

  tokenBytes: number;
  directoryIndex: DirectoryIndexMode;
  defaultAvatarUrl: string;

  loginRateLimit: {
    limit: number;
    windowSeconds: number;
  };
};

export function buildConfig(): AppConfig {
  const parsed = ConfigSchema.parse(process.env);

  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,
    dataRoot: parsed.DATA_ROOT,

    logLevel: parsed.LOG_LEVEL,
    serviceName: parsed.SERVICE_NAME,

    passwordPepper: parsed.PASSWORD_PEPPER,
    argon2: {
      timeCost: parsed.ARGON2_TIME_COST,
      memoryCost: parsed.ARGON2_MEMORY_COST,
      parallelism: parsed.ARGON2_PARALLELISM,
      hashLength: parsed.ARGON2_HASH_LENGTH,
    },

    tokenBytes: parsed.TOKEN_BYTES,
    directoryIndex: parsed.DIRECTORY_INDEX,
    defaultAvatarUrl: parsed.DEFAULT_AVATAR_URL,

    loginRateLimit: {
      limit: parsed.LOGIN_RATE_LIMIT,
      windowSeconds: parsed.LOGIN_RATE_WINDOW_SECONDS,
    },
  };
}
