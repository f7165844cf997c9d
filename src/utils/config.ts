import dotenv from 'dotenv';
import { z } from 'zod';
import { UsageError } from './errors.js';

// Load environment variables
dotenv.config();

/**
 * Scope requested for read-only access to the user's photo library.
 */
export const PHOTOS_READONLY_SCOPE = 'https://www.googleapis.com/auth/photoslibrary.readonly';

const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'] as const;

/**
 * Schema for the environment variables the application reads.
 * Credentials are trimmed because they are usually pasted from the Cloud Console.
 */
const envSchema = z.object({
  GOOGLE_CLIENT_ID: z.string().trim().default(''),
  GOOGLE_CLIENT_SECRET: z.string().trim().default(''),
  GOOGLE_REFRESH_TOKEN: z.string().trim().default(''),
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  LOG_FILE: z.string().trim().min(1).optional(),
});

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface AppConfig {
  /**
   * Google OAuth configuration.
   */
  google: {
    /** Google Cloud Project Client ID */
    clientId: string;
    /** Google Cloud Project Client Secret */
    clientSecret: string;
    /** Previously issued refresh token; empty when the user must authorize again */
    refreshToken: string;
    scopes: string[];
  };
  http: {
    /** Timeout applied by the transport to every request */
    timeoutMs: number;
  };
  logger: {
    level: LogLevel;
    /** Optional file that receives a copy of every log line */
    file?: string;
  };
}

/**
 * Builds the application configuration from a set of environment variables.
 *
 * @param env - Variables to read, `process.env` by default.
 * @throws Error if a variable is present but malformed.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.errors
      .map(e => `${e.path.join('.')}: ${e.message}`)
      .join(', ');
    throw new Error(`Invalid environment configuration: ${issues}`);
  }

  const vars = result.data;
  return {
    google: {
      clientId: vars.GOOGLE_CLIENT_ID,
      clientSecret: vars.GOOGLE_CLIENT_SECRET,
      refreshToken: vars.GOOGLE_REFRESH_TOKEN,
      scopes: [PHOTOS_READONLY_SCOPE],
    },
    http: {
      timeoutMs: vars.HTTP_TIMEOUT_MS,
    },
    logger: {
      level: vars.LOG_LEVEL,
      file: vars.LOG_FILE,
    },
  };
}

/**
 * Ensures the OAuth client credentials are present before any request is made.
 *
 * @throws UsageError naming every missing variable.
 */
export function assertCredentials(cfg: AppConfig): void {
  const missing: string[] = [];
  if (!cfg.google.clientId) {
    missing.push('GOOGLE_CLIENT_ID');
  }
  if (!cfg.google.clientSecret) {
    missing.push('GOOGLE_CLIENT_SECRET');
  }

  if (missing.length > 0) {
    throw new UsageError(`Required environment variable(s) not set: ${missing.join(', ')}`);
  }
}

/**
 * Global configuration object for the application.
 */
export const config = loadConfig();

export default config;
