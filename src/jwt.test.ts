import { describe, it, expect, vi, afterEach } from 'vitest';
import jwt from 'jsonwebtoken';
import { generateJwt, JWT_LIFETIME_SECONDS } from './jwt.js';

describe('generateJwt', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('signs {iss, exp} with HS256 and expires an hour from now', () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-01-01T00:00:00Z'));

    const token = generateJwt('test-key', 'test-secret');
    const payload = jwt.verify(token, 'test-secret', { algorithms: ['HS256'] });

    expect(payload).toEqual({ iss: 'test-key', exp: Date.UTC(2026, 0, 1) / 1000 + 3600 });
  });

  it('writes the standard JWT header', () => {
    const decoded = jwt.decode(generateJwt('test-key', 'test-secret'), { complete: true });

    expect(decoded?.header).toEqual({ alg: 'HS256', typ: 'JWT' });
  });

  it('rounds the expiry down to whole seconds', () => {
    const token = generateJwt('test-key', 'test-secret', 1_700_000_000_999);

    expect(jwt.decode(token)).toEqual({ iss: 'test-key', exp: 1_700_000_000 + JWT_LIFETIME_SECONDS });
  });

  it('does not verify with another secret', () => {
    const token = generateJwt('test-key', 'test-secret');

    expect(() => jwt.verify(token, 'other-secret')).toThrow(jwt.JsonWebTokenError);
  });
});
