import { z } from 'zod';

// -----------------------------------------------------------------------------
// Environment Schema
// -----------------------------------------------------------------------------

const positiveInt = (fallback: number) =>
  z
    .string()
    .optional()
    .transform((value, ctx) => {
      if (!value) return fallback;
      const parsed = Number.parseInt(value, 10);
      if (Number.isNaN(parsed) || parsed <= 0) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected a positive integer, got '${value}'` });
        return z.NEVER;
      }
      return parsed;
    });

const flag = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((value) => (value === undefined || value === '' ? fallback : ['1', 'true', 'yes'].includes(value.toLowerCase())));

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: positiveInt(3000),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z.string().optional(),
  LOG_PRETTY: flag(false),
  CORS_ORIGIN: z.string().optional(),

  KEY_EXCHANGE_TTL_MS: positiveInt(5 * 60 * 1000),
  KEY_EXCHANGE_RETENTION_MS: positiveInt(24 * 60 * 60 * 1000),
  KEY_EXCHANGE_REPLAY_ON_CONNECT: flag(false),
  EXPIRY_SWEEP_INTERVAL_MS: positiveInt(30 * 1000),

  PUSH_PROVIDER: z
    .string()
    .optional()
    .transform((value) => (value ? value.toLowerCase() : 'none'))
    .pipe(z.enum(['none', 'apns', 'relay'])),
  PUSH_TIMEOUT_MS: positiveInt(5000),
  PUSH_PRUNE_INVALID_TOKENS: flag(true),

  APNS_TEAM_ID: z.string().min(1).optional(),
  APNS_KEY_ID: z.string().min(1).optional(),
  APNS_PRIVATE_KEY: z.string().min(1).optional(),
  APNS_BUNDLE_ID: z.string().min(1).optional(),
  APNS_PRODUCTION: flag(false),

  RELAY_BASE_URL: z.string().url('RELAY_BASE_URL must be a valid URL').optional(),
  RELAY_APP_NAME: z.string().min(1).optional(),
  RELAY_APP_KEY: z.string().min(1).optional(),
});

// -----------------------------------------------------------------------------
// Config Types
// -----------------------------------------------------------------------------

export interface APNsConfig {
  teamId: string;        // Apple Developer Team ID
  keyId: string;         // APNs Auth Key ID
  privateKey: string;    // APNs Auth Key (.p8 file contents)
  bundleId: string;      // iOS app bundle ID
  production: boolean;   // true for production, false for sandbox
}

export interface RelayConfig {
  baseUrl: string;
  appName: string;
  appKey: string;
}

export type PushConfig =
  | { provider: 'none'; timeoutMs: number; pruneInvalidTokens: boolean }
  | { provider: 'apns'; timeoutMs: number; pruneInvalidTokens: boolean; apns: APNsConfig }
  | { provider: 'relay'; timeoutMs: number; pruneInvalidTokens: boolean; relay: RelayConfig };

export interface AppConfig {
  env: 'development' | 'test' | 'production';
  port: number;
  host: string;
  logLevel?: string;
  logPretty: boolean;
  corsOrigin?: string;
  keyExchange: {
    ttlMs: number;
    retentionMs: number;
    sweepIntervalMs: number;
    replayOnConnect: boolean;
  };
  push: PushConfig;
}

// -----------------------------------------------------------------------------
// Loader
// -----------------------------------------------------------------------------

/**
 * Parse configuration from the environment. Throws with the first problem
 * found when a variable is malformed or a selected push provider is missing
 * its credentials.
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    const issue = result.error.issues[0];
    const variable = issue?.path.join('.');
    throw new Error(
      issue ? `Invalid environment variable ${variable}: ${issue.message}` : 'Invalid environment configuration'
    );
  }

  const env = result.data;

  return {
    env: env.NODE_ENV,
    port: env.PORT,
    host: env.HOST,
    logLevel: env.LOG_LEVEL,
    logPretty: env.LOG_PRETTY,
    corsOrigin: env.CORS_ORIGIN,
    keyExchange: {
      ttlMs: env.KEY_EXCHANGE_TTL_MS,
      retentionMs: env.KEY_EXCHANGE_RETENTION_MS,
      sweepIntervalMs: env.EXPIRY_SWEEP_INTERVAL_MS,
      replayOnConnect: env.KEY_EXCHANGE_REPLAY_ON_CONNECT,
    },
    push: buildPushConfig(env),
  };
}

function buildPushConfig(env: z.infer<typeof envSchema>): PushConfig {
  const common = { timeoutMs: env.PUSH_TIMEOUT_MS, pruneInvalidTokens: env.PUSH_PRUNE_INVALID_TOKENS };

  switch (env.PUSH_PROVIDER) {
    case 'apns': {
      const { APNS_TEAM_ID, APNS_KEY_ID, APNS_PRIVATE_KEY, APNS_BUNDLE_ID } = env;
      if (!APNS_TEAM_ID || !APNS_KEY_ID || !APNS_PRIVATE_KEY || !APNS_BUNDLE_ID) {
        throw new Error(
          'PUSH_PROVIDER=apns requires APNS_TEAM_ID, APNS_KEY_ID, APNS_PRIVATE_KEY and APNS_BUNDLE_ID'
        );
      }
      return {
        ...common,
        provider: 'apns',
        apns: {
          teamId: APNS_TEAM_ID,
          keyId: APNS_KEY_ID,
          // .p8 keys passed through env vars usually have escaped newlines
          privateKey: APNS_PRIVATE_KEY.replace(/\\n/g, '\n'),
          bundleId: APNS_BUNDLE_ID,
          production: env.APNS_PRODUCTION,
        },
      };
    }

    case 'relay': {
      const { RELAY_BASE_URL, RELAY_APP_NAME, RELAY_APP_KEY } = env;
      if (!RELAY_BASE_URL || !RELAY_APP_NAME || !RELAY_APP_KEY) {
        throw new Error('PUSH_PROVIDER=relay requires RELAY_BASE_URL, RELAY_APP_NAME and RELAY_APP_KEY');
      }
      return {
        ...common,
        provider: 'relay',
        relay: { baseUrl: RELAY_BASE_URL, appName: RELAY_APP_NAME, appKey: RELAY_APP_KEY },
      };
    }

    default:
      return { ...common, provider: 'none' };
  }
}
