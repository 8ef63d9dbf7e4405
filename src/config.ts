import { z } from 'zod';
import { ConfigError } from './errors.js';

export type RateLimitRule = {
  max: number;
  windowMs: number;
};

export type DbDriver = 'sqlite' | 'postgres' | 'mysql';

export type EncryptionKey = {
  id: string;
  key: Buffer;
};

export type GoogleOAuthSettings = {
  clientId: string;
  clientSecret: string;
  redirectUri: string;
  authorizeEndpoint: string;
  tokenEndpoint: string;
  revokeEndpoint: string;
  scopes: readonly string[];
};

export type ServiceConfig = Readonly<{
  port: number;
  google: Readonly<GoogleOAuthSettings>;
  allowedRedirectHosts: readonly string[];
  internalApiKey: string;
  stateSecret: string;
  stateTtlMs: number;
  stateSingleUse: boolean;
  internalAllowedIps: readonly string[];
  trustProxy: boolean;
  encryption: Readonly<{ primary: EncryptionKey; previous: readonly EncryptionKey[] }>;
  rateLimits: Readonly<{ perKey: RateLimitRule; perUser: RateLimitRule }>;
  refreshMarginMs: number;
  upstreamTimeoutMs: number;
  database: Readonly<{ driver?: DbDriver; url?: string; sqlitePath?: string }>;
  corsOrigins: readonly string[];
}>;

export const GOOGLE_AUTHORIZE_ENDPOINT = 'https://accounts.google.com/o/oauth2/v2/auth';
export const GOOGLE_TOKEN_ENDPOINT = 'https://oauth2.googleapis.com/token';
export const GOOGLE_REVOKE_ENDPOINT = 'https://oauth2.googleapis.com/revoke';

export const GOOGLE_READONLY_SCOPES = [
  'https://www.googleapis.com/auth/drive.readonly',
  'https://www.googleapis.com/auth/documents.readonly',
  'https://www.googleapis.com/auth/spreadsheets.readonly',
  'https://www.googleapis.com/auth/presentations.readonly',
] as const;

export const CALLBACK_PATH = '/auth/google/callback';

const MIN_STATE_TTL_SECONDS = 30;
const KEY_ID_PATTERN = /^[A-Za-z0-9_-]{1,16}$/;
const BASE64_PATTERN = /^[A-Za-z0-9+/_-]+={0,2}$/;

function parseIntEnv(
  value: string | undefined,
  fallback: number,
  envVar: string,
  opts: { min: number; max: number },
): number {
  if (value === undefined) {
    return fallback;
  }
  const trimmed = value.trim();
  if (!trimmed) {
    return fallback;
  }
  const parsed = Number.parseInt(trimmed, 10);
  if (!Number.isFinite(parsed) || parsed < opts.min || parsed > opts.max) {
    console.warn(`${envVar} is invalid ("${value}"); using default of ${fallback}.`);
    return fallback;
  }
  return parsed;
}

function parseBooleanEnv(value: string | undefined, fallback: boolean, envVar: string): boolean {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  console.warn(`${envVar} is invalid ("${value}"); using default of ${fallback}.`);
  return fallback;
}

export function splitCsv(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export function decodeEncryptionKey(raw: string): Buffer | null {
  const trimmed = raw.trim();
  if (!BASE64_PATTERN.test(trimmed)) {
    return null;
  }
  // Node's base64 decoder accepts the URL-safe alphabet as well.
  const key = Buffer.from(trimmed, 'base64');
  return key.length === 32 ? key : null;
}

const encryptionKeySchema = z
  .string({ required_error: 'ENCRYPTION_KEY is required' })
  .transform((value, ctx) => {
    const key = decodeEncryptionKey(value);
    if (!key) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'ENCRYPTION_KEY must be base64 of exactly 32 bytes',
      });
      return z.NEVER;
    }
    return key;
  });

const previousKeysSchema = z
  .string()
  .optional()
  .transform((value, ctx) => {
    const keys: EncryptionKey[] = [];
    for (const entry of splitCsv(value)) {
      const separator = entry.indexOf(':');
      const id = separator > 0 ? entry.slice(0, separator) : '';
      const key = separator > 0 ? decodeEncryptionKey(entry.slice(separator + 1)) : null;
      if (!KEY_ID_PATTERN.test(id) || !key) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: 'ENCRYPTION_PREVIOUS_KEYS entries must look like <id>:<base64 32-byte key>',
        });
        return z.NEVER;
      }
      keys.push({ id, key });
    }
    return keys;
  });

const configSchema = z.object({
  port: z
    .string()
    .optional()
    .transform((value) => parseIntEnv(value, 8000, 'PORT', { min: 1, max: 65_535 })),
  googleClientId: z
    .string({ required_error: 'GOOGLE_CLIENT_ID is required' })
    .trim()
    .min(1, 'GOOGLE_CLIENT_ID is required'),
  googleClientSecret: z
    .string({ required_error: 'GOOGLE_CLIENT_SECRET is required' })
    .trim()
    .min(1, 'GOOGLE_CLIENT_SECRET is required'),
  redirectBase: z.string().url().default('http://localhost:8000'),
  allowedRedirectHosts: z
    .string()
    .optional()
    .transform((value) => (value === undefined ? ['localhost', '127.0.0.1'] : splitCsv(value))),
  internalApiKey: z
    .string({ required_error: 'API_INTERNAL_KEY is required' })
    .min(16, 'API_INTERNAL_KEY must be at least 16 characters'),
  stateSecret: z.string().min(16, 'STATE_SIGNING_SECRET must be at least 16 characters').optional(),
  stateTtlSeconds: z
    .string()
    .optional()
    .transform((value) =>
      Math.max(
        parseIntEnv(value, 300, 'STATE_TTL_SECONDS', { min: 1, max: 60 * 60 }),
        MIN_STATE_TTL_SECONDS,
      ),
    ),
  stateSingleUse: z
    .string()
    .optional()
    .transform((value) => parseBooleanEnv(value, true, 'STATE_SINGLE_USE')),
  internalAllowedIps: z.string().optional().transform(splitCsv),
  trustProxy: z
    .string()
    .optional()
    .transform((value) => parseBooleanEnv(value, false, 'TRUST_PROXY')),
  encryptionKey: encryptionKeySchema,
  encryptionKeyId: z
    .string()
    .regex(KEY_ID_PATTERN, 'ENCRYPTION_KEY_ID must be 1-16 of [A-Za-z0-9_-]')
    .default('k1'),
  previousKeys: previousKeysSchema,
  rateLimitWindowSeconds: z
    .string()
    .optional()
    .transform((value) =>
      parseIntEnv(value, 60, 'RATE_LIMIT_WINDOW_SECONDS', { min: 1, max: 24 * 60 * 60 }),
    ),
  rateLimitMaxPerKey: z
    .string()
    .optional()
    .transform((value) =>
      parseIntEnv(value, 120, 'RATE_LIMIT_MAX_PER_KEY', { min: 1, max: 100_000 }),
    ),
  rateLimitMaxPerUser: z
    .string()
    .optional()
    .transform((value) =>
      parseIntEnv(value, 60, 'RATE_LIMIT_MAX_PER_USER', { min: 1, max: 100_000 }),
    ),
  refreshMarginSeconds: z
    .string()
    .optional()
    .transform((value) =>
      parseIntEnv(value, 60, 'TOKEN_REFRESH_MARGIN_SECONDS', { min: 0, max: 30 * 60 }),
    ),
  upstreamTimeoutMs: z
    .string()
    .optional()
    .transform((value) =>
      parseIntEnv(value, 15_000, 'UPSTREAM_TIMEOUT_MS', { min: 100, max: 120_000 }),
    ),
  dbDriver: z
    .string()
    .optional()
    .transform((value) => value?.trim().toLowerCase() || undefined)
    .pipe(z.enum(['sqlite', 'postgres', 'mysql']).optional()),
  dbUrl: z.string().optional(),
  dbSqlitePath: z.string().optional(),
  corsOrigins: z.string().optional().transform(splitCsv),
});

function emptyToUndefined(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const parsed = configSchema.safeParse({
    port: env.PORT,
    googleClientId: env.GOOGLE_CLIENT_ID,
    googleClientSecret: env.GOOGLE_CLIENT_SECRET,
    redirectBase: emptyToUndefined(env.GOOGLE_REDIRECT_BASE),
    allowedRedirectHosts: env.ALLOWED_REDIRECT_HOSTS,
    internalApiKey: env.API_INTERNAL_KEY,
    stateSecret: emptyToUndefined(env.STATE_SIGNING_SECRET),
    stateTtlSeconds: env.STATE_TTL_SECONDS,
    stateSingleUse: env.STATE_SINGLE_USE,
    internalAllowedIps: env.INTERNAL_ALLOWED_IPS,
    trustProxy: env.TRUST_PROXY,
    encryptionKey: env.ENCRYPTION_KEY,
    encryptionKeyId: emptyToUndefined(env.ENCRYPTION_KEY_ID),
    previousKeys: env.ENCRYPTION_PREVIOUS_KEYS,
    rateLimitWindowSeconds: env.RATE_LIMIT_WINDOW_SECONDS,
    rateLimitMaxPerKey: env.RATE_LIMIT_MAX_PER_KEY,
    rateLimitMaxPerUser: env.RATE_LIMIT_MAX_PER_USER,
    refreshMarginSeconds: env.TOKEN_REFRESH_MARGIN_SECONDS,
    upstreamTimeoutMs: env.UPSTREAM_TIMEOUT_MS,
    dbDriver: env.TOKEN_DB_DRIVER,
    dbUrl: emptyToUndefined(env.TOKEN_DB_URL ?? env.DATABASE_URL),
    dbSqlitePath: emptyToUndefined(env.TOKEN_DB_SQLITE_PATH),
    corsOrigins: env.CORS_ORIGINS,
  });

  if (!parsed.success) {
    throw new ConfigError('Invalid configuration', parsed.error.flatten().fieldErrors);
  }

  const data = parsed.data;
  const windowMs = data.rateLimitWindowSeconds * 1000;
  if (data.previousKeys.some((entry) => entry.id === data.encryptionKeyId)) {
    throw new ConfigError('Invalid configuration', {
      previousKeys: ['ENCRYPTION_PREVIOUS_KEYS must not reuse ENCRYPTION_KEY_ID'],
    });
  }

  const config: ServiceConfig = {
    port: data.port,
    google: Object.freeze({
      clientId: data.googleClientId,
      clientSecret: data.googleClientSecret,
      redirectUri: `${data.redirectBase.replace(/\/+$/, '')}${CALLBACK_PATH}`,
      authorizeEndpoint: GOOGLE_AUTHORIZE_ENDPOINT,
      tokenEndpoint: GOOGLE_TOKEN_ENDPOINT,
      revokeEndpoint: GOOGLE_REVOKE_ENDPOINT,
      scopes: GOOGLE_READONLY_SCOPES,
    }),
    allowedRedirectHosts: data.allowedRedirectHosts.map((host) => host.toLowerCase()),
    internalApiKey: data.internalApiKey,
    stateSecret: data.stateSecret ?? data.internalApiKey,
    stateTtlMs: data.stateTtlSeconds * 1000,
    stateSingleUse: data.stateSingleUse,
    internalAllowedIps: data.internalAllowedIps,
    trustProxy: data.trustProxy,
    encryption: Object.freeze({
      primary: { id: data.encryptionKeyId, key: data.encryptionKey },
      previous: data.previousKeys,
    }),
    rateLimits: Object.freeze({
      perKey: { max: data.rateLimitMaxPerKey, windowMs },
      perUser: { max: data.rateLimitMaxPerUser, windowMs },
    }),
    refreshMarginMs: data.refreshMarginSeconds * 1000,
    upstreamTimeoutMs: data.upstreamTimeoutMs,
    database: Object.freeze({
      driver: data.dbDriver,
      url: data.dbUrl,
      sqlitePath: data.dbSqlitePath,
    }),
    corsOrigins: data.corsOrigins,
  };
  return Object.freeze(config);
}
