import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';
import { ConfigError } from './errors';

const MiB = 1024 * 1024;

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim().length > 0 ? v.trim() : undefined));

// ── Env Schema ────────────────────────────────────────────────────────────────

const EnvSchema = z
  .object({
    PORT:                     z.coerce.number().int().positive().default(3000),
    DATA_FILE:                z.string().min(1).default('./data/db.json'),

    // Logging
    LOG_LEVEL:                z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    LOG_FORMAT:               z.enum(['text', 'json']).default('text'),

    // TikTok API
    TIKTOK_API_BASE:          z.string().url().default('https://open.tiktokapis.com'),
    TIKTOK_ACCESS_TOKEN:      optionalString,
    TIKTOK_CLIENT_KEY:        optionalString,
    TIKTOK_CLIENT_SECRET:     optionalString,
    TIKTOK_REDIRECT_URI:      optionalString,
    TIKTOK_SCOPE:             z.string().min(1).default('user.info.basic,video.publish'),
    TIKTOK_PRIVACY_LEVEL:     z.string().min(1).default('SELF_ONLY'),

    // Sessions
    JWT_SECRET_KEY:           optionalString,
    JWT_EXPIRATION_HOURS:     z.coerce.number().positive().default(24),

    // Publish protocol
    UPLOAD_CHUNK_SIZE:        z.coerce.number().int().min(5 * MiB).max(64 * MiB).default(10 * MiB),
    STATUS_POLL_ATTEMPTS:     z.coerce.number().int().positive().default(10),
    STATUS_POLL_INTERVAL_MS:  z.coerce.number().int().nonnegative().default(3000),
    REQUEST_TIMEOUT_MS:       z.coerce.number().int().positive().default(30_000),
    TOKEN_REFRESH_MARGIN_MS:  z.coerce.number().int().nonnegative().default(60_000),
    MAX_UPLOAD_BYTES:         z.coerce.number().int().positive().default(64 * MiB),
  })
  .superRefine((env, ctx) => {
    if (!env.TIKTOK_ACCESS_TOKEN && !env.TIKTOK_CLIENT_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['TIKTOK_ACCESS_TOKEN'],
        message: 'set TIKTOK_ACCESS_TOKEN, or TIKTOK_CLIENT_KEY for per-user linking',
      });
    }
    if (env.TIKTOK_CLIENT_KEY) {
      for (const key of ['TIKTOK_CLIENT_SECRET', 'TIKTOK_REDIRECT_URI', 'JWT_SECRET_KEY'] as const) {
        if (!env[key]) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [key],
            message: 'required when TIKTOK_CLIENT_KEY is set',
          });
        }
      }
    }
  });

export type Env = z.infer<typeof EnvSchema>;

// ── Typed config ──────────────────────────────────────────────────────────────

export interface OAuthConfig {
  clientKey: string;
  clientSecret: string;
  redirectUri: string;
  scope: string;
}

export interface PublishConfig {
  apiBase: string;
  chunkSize: number;
  maxStatusPolls: number;
  statusPollIntervalMs: number;
  requestTimeoutMs: number;
  privacyLevel: string;
}

export interface Config {
  port: number;
  dataFile: string;
  log: { level: Env['LOG_LEVEL']; format: Env['LOG_FORMAT'] };
  staticAccessToken?: string;
  oauth?: OAuthConfig;
  jwt: { secret?: string; expirationHours: number };
  publish: PublishConfig;
  tokenRefreshMarginMs: number;
  maxUploadBytes: number;
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): Config {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((i) => `${i.path.join('.')} (${i.message})`)
      .join(', ');
    throw new ConfigError(`Missing or invalid environment variables: ${problems}`);
  }
  const env = parsed.data;

  const oauth =
    env.TIKTOK_CLIENT_KEY && env.TIKTOK_CLIENT_SECRET && env.TIKTOK_REDIRECT_URI
      ? {
          clientKey: env.TIKTOK_CLIENT_KEY,
          clientSecret: env.TIKTOK_CLIENT_SECRET,
          redirectUri: env.TIKTOK_REDIRECT_URI,
          scope: env.TIKTOK_SCOPE,
        }
      : undefined;

  return {
    port: env.PORT,
    dataFile: env.DATA_FILE,
    log: { level: env.LOG_LEVEL, format: env.LOG_FORMAT },
    staticAccessToken: env.TIKTOK_ACCESS_TOKEN,
    oauth,
    jwt: { secret: env.JWT_SECRET_KEY, expirationHours: env.JWT_EXPIRATION_HOURS },
    publish: {
      apiBase: env.TIKTOK_API_BASE.replace(/\/+$/, ''),
      chunkSize: env.UPLOAD_CHUNK_SIZE,
      maxStatusPolls: env.STATUS_POLL_ATTEMPTS,
      statusPollIntervalMs: env.STATUS_POLL_INTERVAL_MS,
      requestTimeoutMs: env.REQUEST_TIMEOUT_MS,
      privacyLevel: env.TIKTOK_PRIVACY_LEVEL,
    },
    tokenRefreshMarginMs: env.TOKEN_REFRESH_MARGIN_MS,
    maxUploadBytes: env.MAX_UPLOAD_BYTES,
  };
}

// Loads .env into process.env, then validates it.
export function loadConfigFromEnv(): Config {
  dotenvConfig();
  return loadConfig(process.env);
}
