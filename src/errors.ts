/**
 * Base class for every error raised by the client.
 */
export class ZoomError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ZoomError';
  }
}

/**
 * A request was attempted with an HTTP verb the client does not send.
 * Thrown before any network I/O.
 */
export class InvalidMethodError extends ZoomError {
  readonly method: string;

  constructor(method: string, allowed: readonly string[]) {
    super(`Invalid method: ${method}. Must be one of ${allowed.join(', ')}`);
    this.name = 'InvalidMethodError';
    this.method = method;
  }
}

export interface DataIssue {
  path: string;
  message: string;
}

/**
 * A payload did not have the shape of the record it was decoded into.
 */
export class InvalidDataError extends ZoomError {
  readonly issues: DataIssue[];

  constructor(message: string, issues: DataIssue[] = []) {
    super(message);
    this.name = 'InvalidDataError';
    this.issues = issues;
  }
}

export class ConfigurationError extends ZoomError {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid configuration: ${problems.join('; ')}`);
    this.name = 'ConfigurationError';
    this.problems = problems;
  }
}

export type ApiErrorKind =
  | 'BadRequest'
  | 'NotAuthorized'
  | 'NotFound'
  | 'NotAllowed'
  | 'Conflict'
  | 'Generic';

export interface ApiErrorDetails {
  status?: number;
  /** Parsed response body (JSON value or raw text) */
  body?: unknown;
}

/**
 * The API answered with a non-2xx status. Subclasses narrow the failure by
 * status code; `kind` carries the same information for callers that switch
 * on a value rather than a class.
 */
export class ApiError extends ZoomError {
  readonly kind: ApiErrorKind;
  readonly status?: number;
  readonly body?: unknown;

  constructor(message: string, details: ApiErrorDetails = {}, kind: ApiErrorKind = 'Generic') {
    super(message);
    this.name = 'ApiError';
    this.kind = kind;
    this.status = details.status;
    this.body = details.body;
  }
}

export class BadRequestError extends ApiError {
  constructor(message: string, details?: ApiErrorDetails) {
    super(message, details, 'BadRequest');
    this.name = 'BadRequestError';
  }
}

export class NotAuthorizedError extends ApiError {
  constructor(message: string, details?: ApiErrorDetails) {
    super(message, details, 'NotAuthorized');
    this.name = 'NotAuthorizedError';
  }
}

export class NotFoundError extends ApiError {
  constructor(message: string, details?: ApiErrorDetails) {
    super(message, details, 'NotFound');
    this.name = 'NotFoundError';
  }
}

export class NotAllowedError extends ApiError {
  constructor(message: string, details?: ApiErrorDetails) {
    super(message, details, 'NotAllowed');
    this.name = 'NotAllowedError';
  }
}

export class ConflictError extends ApiError {
  constructor(message: string, details?: ApiErrorDetails) {
    super(message, details, 'Conflict');
    this.name = 'ConflictError';
  }
}

type ApiErrorClass = new (message: string, details?: ApiErrorDetails) => ApiError;

const HTTP_ERRORS: Record<number, ApiErrorClass> = {
  400: BadRequestError,
  401: NotAuthorizedError,
  404: NotFoundError,
  405: NotAllowedError,
  409: ConflictError,
};

/**
 * Pick the error class for a failed response's status code.
 */
export function apiErrorFor(status: number, message: string, body?: unknown): ApiError {
  const ErrorClass = HTTP_ERRORS[status];
  if (ErrorClass) {
    return new ErrorClass(message, { status, body });
  }
  return new ApiError(message, { status, body });
}
