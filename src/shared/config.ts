import { z } from 'zod';

export const SIGNING_ALGORITHMS = ['HS256', 'HS384', 'HS512'] as const;
export type SigningAlgorithm = (typeof SIGNING_ALGORITHMS)[number];

const MINUTE_MS = 60 * 1000;
const DAY_MS = 24 * 60 * MINUTE_MS;

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  NODE_ENV: z.string().default('development'),
  PORT: positiveInt(3000),
  REDIS_URL: z
    .string()
    .default('redis://localhost:6379')
    .refine(url => url.startsWith('redis://') || url.startsWith('rediss://'), {
      message: 'must use redis:// or rediss://',
    }),
  CACHE_KEY_PREFIX: z.string().default('rescue:'),
  JWT_SECRET: z.string().min(16).optional(),
  JWT_ALGORITHM: z.enum(SIGNING_ALGORITHMS).default('HS256'),
  JWT_ISSUER: z.string().min(1).default('rescue-api'),
  JWT_AUDIENCE: z.string().min(1).default('rescue-api'),
  ACCESS_TOKEN_EXPIRE_MINS: positiveInt(30),
  REFRESH_TOKEN_EXPIRE_DAYS: positiveInt(7),
  INVITATION_TOKEN_EXPIRE_DAYS: positiveInt(7),
  RESET_PASSWORD_EXPIRE_MINS: positiveInt(15),
  CRM_EDITING_LOCK_EXPIRE_MINUTES: positiveInt(15),
  CORS_ALLOWED_ORIGINS: z.string().optional(),
  IDENTITY_SEED_FILE: z.string().min(1).optional(),
});

export interface TokenDurations {
  access: number;
  refresh: number;
  invitation: number;
  reset: number;
}

export interface SigningConfig {
  secret: string;
  algorithm: SigningAlgorithm;
  issuer: string;
  audience: string;
}

export interface AppConfig {
  port: number;
  redisUrl: string;
  keyPrefix: string;
  signing: SigningConfig;
  /** Token lifetimes in milliseconds, keyed by token kind. */
  durations: TokenDurations;
  leaseDurationMs: number;
  corsAllowedOrigins: string[];
  /** JSON file of identities for the in-memory identity store (dev only). */
  identitySeedFile?: string;
  isTest: boolean;
}

// Test mode falls back to a fixed secret and the local dev origins
const TEST_SECRET = 'test-secret-for-signing-tokens';
const TEST_ORIGINS = ['http://localhost:3000', 'http://localhost:8080'];

function parseOrigins(raw: string | undefined, isTest: boolean): string[] {
  if (!raw) {
    return isTest ? TEST_ORIGINS : [];
  }
  return raw.split(',').map(o => o.trim()).filter(Boolean);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  const vars = parsed.data;
  const isTest = vars.NODE_ENV === 'test';

  const secret = vars.JWT_SECRET ?? (isTest ? TEST_SECRET : undefined);
  if (!secret) {
    throw new ConfigError(['JWT_SECRET: required outside test mode']);
  }

  return Object.freeze({
    port: vars.PORT,
    redisUrl: vars.REDIS_URL,
    keyPrefix: vars.CACHE_KEY_PREFIX,
    signing: Object.freeze({
      secret,
      algorithm: vars.JWT_ALGORITHM,
      issuer: vars.JWT_ISSUER,
      audience: vars.JWT_AUDIENCE,
    }),
    durations: Object.freeze({
      access: vars.ACCESS_TOKEN_EXPIRE_MINS * MINUTE_MS,
      refresh: vars.REFRESH_TOKEN_EXPIRE_DAYS * DAY_MS,
      invitation: vars.INVITATION_TOKEN_EXPIRE_DAYS * DAY_MS,
      reset: vars.RESET_PASSWORD_EXPIRE_MINS * MINUTE_MS,
    }),
    leaseDurationMs: vars.CRM_EDITING_LOCK_EXPIRE_MINUTES * MINUTE_MS,
    corsAllowedOrigins: parseOrigins(vars.CORS_ALLOWED_ORIGINS, isTest),
    identitySeedFile: vars.IDENTITY_SEED_FILE,
    isTest,
  });
}

export const config: AppConfig = loadConfig();
