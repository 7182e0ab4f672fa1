import axios, { AxiosAdapter } from 'axios';
import { z } from 'zod';
import { ApiError } from './errors.js';

export const OAUTH_TOKEN_URL = 'https://zoom.us/oauth/token';

/**
 * Shape of a successful token response. The exchange functions return the
 * body as received; parse with this schema where the typed fields are needed.
 */
export const OAuthTokensSchema = z
  .object({
    access_token: z.string(),
    refresh_token: z.string().optional(),
    token_type: z.string().optional(),
    expires_in: z.number().optional(),
    scope: z.string().optional(),
  })
  .passthrough();

export type OAuthTokens = z.infer<typeof OAuthTokensSchema>;

export interface OAuthRequestOptions {
  tokenUrl?: string;
  adapter?: AxiosAdapter;
}

function makeHeaders(clientId: string, clientSecret: string): Record<string, string> {
  const credentials = Buffer.from(`${clientId}:${clientSecret}`).toString('base64');
  return {
    Authorization: `Basic ${credentials}`,
    'Content-Type': 'application/x-www-form-urlencoded',
  };
}

async function oauthRequest(
  headers: Record<string, string>,
  form: URLSearchParams,
  options: OAuthRequestOptions,
): Promise<unknown> {
  const response = await axios.post<unknown>(options.tokenUrl ?? OAUTH_TOKEN_URL, form, {
    headers,
    adapter: options.adapter,
    validateStatus: () => true,
  });

  if (response.status === 200) {
    return response.data;
  }
  console.error(`[oauth] Token request failed with status ${response.status}`);
  throw new ApiError('Failed to refresh tokens', { status: response.status, body: response.data });
}

/**
 * Exchange a refresh token for a new access/refresh token pair.
 */
export async function refreshTokens(
  clientId: string,
  clientSecret: string,
  refreshToken: string,
  options: OAuthRequestOptions = {},
): Promise<unknown> {
  const form = new URLSearchParams({
    refresh_token: refreshToken,
    grant_type: 'refresh_token',
  });
  return oauthRequest(makeHeaders(clientId, clientSecret), form, options);
}

/**
 * Exchange the authorization code delivered to `redirectUri` for tokens.
 * `redirectUri` must match the one used in the authorization request.
 */
export async function requestTokens(
  clientId: string,
  clientSecret: string,
  redirectUri: string,
  code: string,
  options: OAuthRequestOptions = {},
): Promise<unknown> {
  const form = new URLSearchParams({
    code,
    redirect_uri: redirectUri,
    grant_type: 'authorization_code',
  });
  return oauthRequest(makeHeaders(clientId, clientSecret), form, options);
}
