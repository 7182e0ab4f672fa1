import type { AxiosAdapter } from 'axios';

export const HTTP_METHODS = ['GET', 'POST', 'PATCH', 'DELETE', 'PUT'] as const;

export type HttpMethod = (typeof HTTP_METHODS)[number];

export type Credentials =
  | { type: 'jwt'; apiKey: string; apiSecret: string }
  | { type: 'oauth'; accessToken: string };

export type QueryParams = Record<string, string | number | boolean | undefined>;

export type JsonBody = Record<string, unknown>;

export interface RequestOptions {
  query?: QueryParams;
  body?: JsonBody;
  /** Return failed responses instead of throwing. Defaults to true. */
  raiseOnError?: boolean;
}

export interface ApiResponse {
  status: number;
  /** Parsed JSON, or the raw text when the body is not JSON */
  body: unknown;
  headers: Record<string, string>;
}

export interface ApiClientOptions {
  credentials: Credentials;
  baseUrl?: string;
  /** Request timeout in milliseconds */
  timeout?: number;
  /** Transport override, e.g. an in-process stub */
  adapter?: AxiosAdapter;
}

export interface ZoomClientOptions extends ApiClientOptions {
  /** Default timezone for created meetings */
  timezone?: string;
  /** User whose meetings are listed and created */
  userId?: string;
}

export type MeetingListType = 'scheduled' | 'live' | 'upcoming';

export type RegistrantAction = 'approve' | 'cancel' | 'deny';

export type UserStatus = 'active' | 'inactive' | 'pending';

export type UserDeleteAction = 'disassociate' | 'delete';
