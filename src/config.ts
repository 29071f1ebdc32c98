/**
 * config.ts — environment-driven settings for the CLI and for applications
 * that prefer configuring the client through variables.
 *
 * The library never reads process.env on import; callers pass the
 * environment in (the CLI loads .env through dotenv first).
 */

import type { LevelWithSilent, Logger } from 'pino';
import { z } from 'zod';
import type { Authentication } from './auth/authentication.js';
import { DEFAULT_OAUTH_URL, OAuthAuthentication } from './auth/oauth.js';
import { TokenAuthentication } from './auth/token.js';
import { DEFAULT_API_URL } from './client/MoneybirdClient.js';

export class ConfigError extends Error {
  readonly code = 'INVALID_CONFIG';
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid MoneyBird configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

// `FOO=` in a .env file means "not set"
const optionalString = z.preprocess(
  (value) => (value === '' ? undefined : value),
  z.string().optional(),
);

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const satisfies readonly LevelWithSilent[];

const EnvSchema = z
  .object({
    MONEYBIRD_API_TOKEN: optionalString,
    MONEYBIRD_CLIENT_ID: optionalString,
    MONEYBIRD_CLIENT_SECRET: optionalString,
    MONEYBIRD_REDIRECT_URI: optionalString.pipe(z.string().url().optional()),
    MONEYBIRD_API_URL: optionalString.pipe(z.string().url().default(DEFAULT_API_URL)),
    MONEYBIRD_OAUTH_URL: optionalString.pipe(z.string().url().default(DEFAULT_OAUTH_URL)),
    LOG_LEVEL: optionalString.pipe(z.enum(LOG_LEVELS).default('info')),
  })
  .superRefine((env, ctx) => {
    const oauthKeys = ['MONEYBIRD_CLIENT_ID', 'MONEYBIRD_CLIENT_SECRET', 'MONEYBIRD_REDIRECT_URI'] as const;
    const missing = oauthKeys.filter((key) => env[key] === undefined);
    if (missing.length > 0 && missing.length < oauthKeys.length) {
      for (const key of missing) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: 'required when OAuth authentication is configured',
        });
      }
    }
  });

export interface OAuthClientConfig {
  clientId: string;
  clientSecret: string;
  redirectUri: string;
}

export interface MoneybirdConfig {
  apiToken?: string;
  oauth?: OAuthClientConfig;
  apiUrl: string;
  oauthUrl: string;
  logLevel: LevelWithSilent;
}

/**
 * loadConfig — validates the MONEYBIRD_* variables (and LOG_LEVEL).
 *
 * Throws ConfigError listing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): MoneybirdConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }

  const values = parsed.data;
  const config: MoneybirdConfig = {
    apiUrl: values.MONEYBIRD_API_URL,
    oauthUrl: values.MONEYBIRD_OAUTH_URL,
    logLevel: values.LOG_LEVEL,
  };
  if (values.MONEYBIRD_API_TOKEN !== undefined) {
    config.apiToken = values.MONEYBIRD_API_TOKEN;
  }
  if (
    values.MONEYBIRD_CLIENT_ID !== undefined &&
    values.MONEYBIRD_CLIENT_SECRET !== undefined &&
    values.MONEYBIRD_REDIRECT_URI !== undefined
  ) {
    config.oauth = {
      clientId: values.MONEYBIRD_CLIENT_ID,
      clientSecret: values.MONEYBIRD_CLIENT_SECRET,
      redirectUri: values.MONEYBIRD_REDIRECT_URI,
    };
  }
  return config;
}

/**
 * createAuthentication — OAuth when a client identity is configured (seeded
 * with MONEYBIRD_API_TOKEN if present), plain token authentication otherwise.
 */
export function createAuthentication(config: MoneybirdConfig, logger?: Logger): Authentication {
  if (config.oauth) {
    return new OAuthAuthentication({
      redirectUrl: config.oauth.redirectUri,
      clientId: config.oauth.clientId,
      clientSecret: config.oauth.clientSecret,
      authToken: config.apiToken,
      oauthBaseUrl: config.oauthUrl,
      logger,
    });
  }
  return new TokenAuthentication(config.apiToken);
}
