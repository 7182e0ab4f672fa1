export { ApiClient, DEFAULT_BASE_URL, DEFAULT_TIMEOUT_MS, isHttpMethod } from './api-client.js';
export { loadConfig } from './config.js';
export type { ZoomConfig } from './config.js';
export {
  ApiError,
  apiErrorFor,
  BadRequestError,
  ConfigurationError,
  ConflictError,
  InvalidDataError,
  InvalidMethodError,
  NotAllowedError,
  NotAuthorizedError,
  NotFoundError,
  ZoomError,
} from './errors.js';
export type { ApiErrorDetails, ApiErrorKind, DataIssue } from './errors.js';
export { generateJwt, JWT_LIFETIME_SECONDS } from './jwt.js';
export { MeetingsComponent } from './meetings.js';
export type { CreateMeetingParams, RegistrantStatusUpdate, RegistrationRef } from './meetings.js';
export { OAUTH_TOKEN_URL, OAuthTokensSchema, refreshTokens, requestTokens } from './oauth.js';
export type { OAuthRequestOptions, OAuthTokens } from './oauth.js';
export { generateMeetingPassword } from './password.js';
export * from './schemas.js';
export { HTTP_METHODS } from './types.js';
export type {
  ApiClientOptions,
  ApiResponse,
  Credentials,
  HttpMethod,
  JsonBody,
  MeetingListType,
  QueryParams,
  RegistrantAction,
  RequestOptions,
  UserDeleteAction,
  UserStatus,
  ZoomClientOptions,
} from './types.js';
export { UsersComponent } from './users.js';
export { ZoomClient } from './zoom-client.js';
