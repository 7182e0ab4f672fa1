import { describe, it, expect } from 'vitest';
import {
  ApiError,
  apiErrorFor,
  BadRequestError,
  ConfigurationError,
  ConflictError,
  InvalidMethodError,
  NotAllowedError,
  NotAuthorizedError,
  NotFoundError,
  ZoomError,
} from './errors.js';

describe('apiErrorFor', () => {
  it.each([
    [400, BadRequestError, 'BadRequestError'],
    [401, NotAuthorizedError, 'NotAuthorizedError'],
    [404, NotFoundError, 'NotFoundError'],
    [405, NotAllowedError, 'NotAllowedError'],
    [409, ConflictError, 'ConflictError'],
  ] as const)('builds the %i error', (status, ErrorClass, name) => {
    const error = apiErrorFor(status, 'boom', { detail: 1 });

    expect(error).toBeInstanceOf(ErrorClass);
    expect(error.name).toBe(name);
    expect(error.status).toBe(status);
    expect(error.body).toEqual({ detail: 1 });
  });

  it('falls back to a generic ApiError', () => {
    const error = apiErrorFor(418, 'teapot');

    expect(error.constructor).toBe(ApiError);
    expect(error.kind).toBe('Generic');
    expect(error.message).toBe('teapot');
  });
});

describe('error hierarchy', () => {
  it('roots every error at ZoomError', () => {
    expect(new NotFoundError('x')).toBeInstanceOf(ZoomError);
    expect(new InvalidMethodError('HEAD', ['GET'])).toBeInstanceOf(ZoomError);
    expect(new ConfigurationError(['missing'])).toBeInstanceOf(ZoomError);
  });

  it('lets callers switch on kind', () => {
    const kinds = [new BadRequestError('a'), new ConflictError('b'), new ApiError('c')].map((e) => e.kind);

    expect(kinds).toEqual(['BadRequest', 'Conflict', 'Generic']);
  });

  it('joins configuration problems into the message', () => {
    const error = new ConfigurationError(['PORT: Expected number', 'ZOOM_BASE_URL: Invalid url']);

    expect(error.message).toBe('Invalid configuration: PORT: Expected number; ZOOM_BASE_URL: Invalid url');
  });
});
