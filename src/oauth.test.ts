import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ApiError } from './errors.js';
import { OAUTH_TOKEN_URL, OAuthTokensSchema, refreshTokens, requestTokens } from './oauth.js';
import { stubTransport } from './test-helpers.js';

const tokens = {
  access_token: 'test-access-token',
  refresh_token: 'test-refresh-token',
  token_type: 'bearer',
  expires_in: 3599,
  scope: 'meeting:write user:read',
};

const basicAuth = `Basic ${Buffer.from('test-client:test-secret').toString('base64')}`;

describe('oauth', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('refreshTokens', () => {
    it('returns the token response body unchanged', async () => {
      const { adapter } = stubTransport([{ status: 200, json: tokens }]);

      const result = await refreshTokens('test-client', 'test-secret', 'old-refresh-token', { adapter });

      expect(result).toEqual(tokens);
    });

    it('posts a refresh_token grant with basic auth', async () => {
      const { adapter, requests } = stubTransport([{ status: 200, json: tokens }]);

      await refreshTokens('test-client', 'test-secret', 'old-refresh-token', { adapter });

      const [sent] = requests;
      expect(sent.method).toBe('post');
      expect(sent.url).toBe(OAUTH_TOKEN_URL);
      expect(sent.authorization).toBe(basicAuth);
      expect(String(sent.contentType)).toContain('application/x-www-form-urlencoded');
      expect(String(sent.data)).toBe('refresh_token=old-refresh-token&grant_type=refresh_token');
    });

    it.each([400, 401, 500])('throws "Failed to refresh tokens" on status %i', async (status) => {
      const { adapter } = stubTransport([{ status, json: { reason: 'Invalid Token!' } }]);

      const error = await refreshTokens('test-client', 'test-secret', 'stale', { adapter }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ApiError);
      expect(error).toMatchObject({ message: 'Failed to refresh tokens', kind: 'Generic', status });
    });

    it('treats any status other than 200 as a failure', async () => {
      const { adapter } = stubTransport([{ status: 201, json: tokens }]);

      await expect(refreshTokens('test-client', 'test-secret', 'r', { adapter })).rejects.toThrow(
        'Failed to refresh tokens',
      );
    });

    it.each([{}, { access_token: 'test-access-token', expires_in: '3599' }])(
      'returns a 200 body unchanged whatever fields it carries: %o',
      async (body) => {
        const { adapter } = stubTransport([{ status: 200, json: body }]);

        const result = await refreshTokens('test-client', 'test-secret', 'r', { adapter });

        expect(result).toEqual(body);
      },
    );

    it('leaves typed parsing of the body to the caller', async () => {
      const { adapter } = stubTransport([{ status: 200, json: tokens }]);

      const result = OAuthTokensSchema.parse(await refreshTokens('test-client', 'test-secret', 'r', { adapter }));

      expect(result.access_token).toBe('test-access-token');
      expect(result.expires_in).toBe(3599);
    });
  });

  describe('requestTokens', () => {
    it('posts an authorization_code grant with the redirect URI', async () => {
      const { adapter, requests } = stubTransport([{ status: 200, json: tokens }]);

      const result = await requestTokens(
        'test-client',
        'test-secret',
        'http://localhost:8080/callback',
        'auth-code',
        { adapter },
      );

      expect(result).toEqual(tokens);
      const form = new URLSearchParams(String(requests[0].data));
      expect(form.get('code')).toBe('auth-code');
      expect(form.get('redirect_uri')).toBe('http://localhost:8080/callback');
      expect(form.get('grant_type')).toBe('authorization_code');
      expect(requests[0].authorization).toBe(basicAuth);
    });

    it('posts to a custom token URL', async () => {
      const { adapter, requests } = stubTransport([{ status: 200, json: tokens }]);

      await requestTokens('test-client', 'test-secret', 'http://localhost/cb', 'c', {
        adapter,
        tokenUrl: 'https://oauth.test/token',
      });

      expect(requests[0].url).toBe('https://oauth.test/token');
    });
  });
});
