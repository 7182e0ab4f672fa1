import { describe, it, expect } from 'vitest';
import { loadConfig } from './config.js';
import { ConfigurationError } from './errors.js';
import { ZoomClient } from './zoom-client.js';

describe('loadConfig', () => {
  it('uses the API key pair with defaults', () => {
    const config = loadConfig({ ZOOM_API_KEY: 'test-key', ZOOM_API_SECRET: 'test-secret' });

    expect(config).toEqual({
      credentials: { type: 'jwt', apiKey: 'test-key', apiSecret: 'test-secret' },
      baseUrl: undefined,
      timezone: 'UTC',
      userId: 'me',
      port: 8080,
    });
  });

  it('prefers an OAuth access token over the key pair', () => {
    const config = loadConfig({
      ZOOM_API_KEY: 'test-key',
      ZOOM_API_SECRET: 'test-secret',
      ZOOM_ACCESS_TOKEN: 'test-access-token',
    });

    expect(config.credentials).toEqual({ type: 'oauth', accessToken: 'test-access-token' });
  });

  it('reads the optional settings', () => {
    const config = loadConfig({
      ZOOM_ACCESS_TOKEN: 'test-access-token',
      ZOOM_BASE_URL: 'https://zoom.test/v2',
      ZOOM_TIMEZONE: 'Asia/Tokyo',
      ZOOM_USER_ID: 'host@example.com',
      PORT: '3000',
    });

    expect(config).toMatchObject({
      baseUrl: 'https://zoom.test/v2',
      timezone: 'Asia/Tokyo',
      userId: 'host@example.com',
      port: 3000,
    });
  });

  it('requires credentials', () => {
    expect(() => loadConfig({ ZOOM_API_KEY: 'test-key' })).toThrow(ConfigurationError);
  });

  it('treats empty variables as missing', () => {
    expect(() => loadConfig({ ZOOM_API_KEY: '', ZOOM_API_SECRET: '', ZOOM_ACCESS_TOKEN: '' })).toThrow(
      'ZOOM_API_KEY and ZOOM_API_SECRET (or ZOOM_ACCESS_TOKEN) environment variables are required',
    );
  });

  it('falls back to the defaults for empty settings', () => {
    const config = loadConfig({
      ZOOM_ACCESS_TOKEN: 'test-access-token',
      ZOOM_BASE_URL: '',
      ZOOM_TIMEZONE: '',
      ZOOM_USER_ID: '',
      PORT: '',
    });

    expect(config).toEqual({
      credentials: { type: 'oauth', accessToken: 'test-access-token' },
      baseUrl: undefined,
      timezone: 'UTC',
      userId: 'me',
      port: 8080,
    });
  });

  it('lists invalid values', () => {
    const error = (() => {
      try {
        loadConfig({ ZOOM_ACCESS_TOKEN: 't', ZOOM_BASE_URL: 'not a url', PORT: '-1' });
      } catch (e) {
        return e;
      }
      return undefined;
    })();

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error).toMatchObject({
      problems: ['ZOOM_BASE_URL: Invalid url', 'PORT: Number must be greater than 0'],
    });
  });
});

describe('ZoomClient.fromEnvironment', () => {
  it('builds a client from the environment', () => {
    const client = ZoomClient.fromEnvironment({
      ZOOM_API_KEY: 'test-key',
      ZOOM_API_SECRET: 'test-secret',
      ZOOM_TIMEZONE: 'Europe/Paris',
      ZOOM_USER_ID: 'host@example.com',
    });

    expect(client.raw.baseUrl).toBe('https://api.zoom.us/v2');
    expect(client.meetings.timezone).toBe('Europe/Paris');
    expect(client.meetings.userId).toBe('host@example.com');
  });

  it('fails without credentials', () => {
    expect(() => ZoomClient.fromEnvironment({})).toThrow(ConfigurationError);
  });
});
