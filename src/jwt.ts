import jwt from 'jsonwebtoken';

export const JWT_LIFETIME_SECONDS = 3600;

/**
 * Sign an HS256 token the API accepts as a bearer credential. A new token is
 * produced on every call; nothing is cached.
 */
export function generateJwt(apiKey: string, apiSecret: string, now: number = Date.now()): string {
  const payload = {
    iss: apiKey,
    exp: Math.floor(now / 1000) + JWT_LIFETIME_SECONDS,
  };

  return jwt.sign(payload, apiSecret, {
    algorithm: 'HS256',
    header: { alg: 'HS256', typ: 'JWT' },
    noTimestamp: true,
  });
}
