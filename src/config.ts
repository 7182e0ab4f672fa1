import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import type { Credentials } from './types.js';

// An empty variable counts as unset, so a blank `.env` line falls back to the default.
function unsetWhenEmpty<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((value) => (value === '' ? undefined : value), schema);
}

const optionalString = unsetWhenEmpty(z.string().optional());

const EnvSchema = z.object({
  ZOOM_API_KEY: optionalString,
  ZOOM_API_SECRET: optionalString,
  ZOOM_ACCESS_TOKEN: optionalString,
  ZOOM_BASE_URL: unsetWhenEmpty(z.string().url().optional()),
  ZOOM_TIMEZONE: unsetWhenEmpty(z.string().default('UTC')),
  ZOOM_USER_ID: unsetWhenEmpty(z.string().default('me')),
  PORT: unsetWhenEmpty(z.coerce.number().int().positive().default(8080)),
});

export interface ZoomConfig {
  credentials: Credentials;
  baseUrl?: string;
  timezone: string;
  userId: string;
  port: number;
}

/**
 * Read the client configuration from environment variables. An OAuth access
 * token takes precedence over the API key pair.
 *
 * @throws ConfigurationError when credentials are missing or a value is invalid
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ZoomConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }
  const vars = parsed.data;

  let credentials: Credentials;
  if (vars.ZOOM_ACCESS_TOKEN) {
    credentials = { type: 'oauth', accessToken: vars.ZOOM_ACCESS_TOKEN };
  } else if (vars.ZOOM_API_KEY && vars.ZOOM_API_SECRET) {
    credentials = { type: 'jwt', apiKey: vars.ZOOM_API_KEY, apiSecret: vars.ZOOM_API_SECRET };
  } else {
    throw new ConfigurationError([
      'ZOOM_API_KEY and ZOOM_API_SECRET (or ZOOM_ACCESS_TOKEN) environment variables are required',
    ]);
  }

  return {
    credentials,
    baseUrl: vars.ZOOM_BASE_URL,
    timezone: vars.ZOOM_TIMEZONE,
    userId: vars.ZOOM_USER_ID,
    port: vars.PORT,
  };
}
