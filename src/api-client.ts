import axios, { AxiosInstance, RawAxiosResponseHeaders, AxiosResponseHeaders } from 'axios';
import { apiErrorFor, InvalidDataError, InvalidMethodError } from './errors.js';
import { generateJwt } from './jwt.js';
import { isNonEmptyString, isRecord } from './type-guards.js';
import {
  ApiClientOptions,
  ApiResponse,
  Credentials,
  HTTP_METHODS,
  HttpMethod,
  JsonBody,
  QueryParams,
  RequestOptions,
} from './types.js';

export const DEFAULT_BASE_URL = 'https://api.zoom.us/v2';
export const DEFAULT_TIMEOUT_MS = 30000;

/**
 * Authenticated access to the REST API: one `request` per HTTP round trip,
 * plus `getAllPages` for list endpoints that paginate with `next_page_token`.
 */
export class ApiClient {
  private client: AxiosInstance;
  private credentials: Credentials;
  readonly baseUrl: string;

  constructor(options: ApiClientOptions) {
    this.credentials = options.credentials;
    this.baseUrl = options.baseUrl ?? DEFAULT_BASE_URL;
    this.client = axios.create({
      baseURL: this.baseUrl,
      headers: {
        'Content-Type': 'application/json'
      },
      timeout: options.timeout ?? DEFAULT_TIMEOUT_MS,
      // Bodies are decoded here so that non-JSON error text survives intact
      responseType: 'text',
      validateStatus: () => true,
      adapter: options.adapter,
    });
  }

  bearerToken(): string {
    switch (this.credentials.type) {
      case 'jwt':
        return generateJwt(this.credentials.apiKey, this.credentials.apiSecret);
      case 'oauth':
        return this.credentials.accessToken;
    }
  }

  async request(endpoint: string, method: string, options: RequestOptions = {}): Promise<ApiResponse> {
    if (!isHttpMethod(method)) {
      throw new InvalidMethodError(method, HTTP_METHODS);
    }
    const { query, body, raiseOnError = true } = options;

    const response = await this.client.request<unknown>({
      url: endpoint,
      method,
      params: query,
      data: body,
      headers: { Authorization: `Bearer ${this.bearerToken()}` },
    });

    const result: ApiResponse = {
      status: response.status,
      body: parseBody(response.data),
      headers: flattenHeaders(response.headers),
    };

    if (result.status >= 200 && result.status < 300) {
      return result;
    }

    const message = errorMessage(result.body);
    console.error(`[request] Unsuccessful request to ${method} ${endpoint}: [${result.status}] ${message}`);

    if (!raiseOnError) {
      console.error(`[request] raiseOnError is false, returning the failed response`);
      return result;
    }

    throw apiErrorFor(result.status, message, result.body);
  }

  async get(endpoint: string, query?: QueryParams, raiseOnError = true): Promise<ApiResponse> {
    return this.request(endpoint, 'GET', { query, raiseOnError });
  }

  async post(endpoint: string, body?: JsonBody, query?: QueryParams, raiseOnError = true): Promise<ApiResponse> {
    return this.request(endpoint, 'POST', { query, body, raiseOnError });
  }

  async patch(endpoint: string, body?: JsonBody, query?: QueryParams, raiseOnError = true): Promise<ApiResponse> {
    return this.request(endpoint, 'PATCH', { query, body, raiseOnError });
  }

  async put(endpoint: string, body?: JsonBody, query?: QueryParams, raiseOnError = true): Promise<ApiResponse> {
    return this.request(endpoint, 'PUT', { query, body, raiseOnError });
  }

  async delete(endpoint: string, query?: QueryParams, body?: JsonBody, raiseOnError = true): Promise<ApiResponse> {
    return this.request(endpoint, 'DELETE', { query, body, raiseOnError });
  }

  /**
   * Fetch every page of a list endpoint and merge them into the first.
   *
   * Pages after the first are requested with only the continuation token;
   * the original query is not repeated. List-valued fields are concatenated
   * in fetch order, everything else keeps the first page's value. There is
   * no page cap: the loop ends only when the API stops returning a token.
   */
  async getAllPages(endpoint: string, query?: QueryParams, raiseOnError = true): Promise<Record<string, unknown>> {
    const first = await this.get(endpoint, query, raiseOnError);
    const accumulated: Record<string, unknown> = { ...expectObject(first.body, endpoint) };

    let nextPageToken = readPageToken(accumulated);
    while (nextPageToken) {
      const page = await this.get(endpoint, { next_page_token: nextPageToken }, raiseOnError);
      const pageBody = expectObject(page.body, endpoint);
      nextPageToken = readPageToken(pageBody);

      for (const [key, value] of Object.entries(pageBody)) {
        if (!Array.isArray(value)) continue;
        const existing = accumulated[key];
        accumulated[key] = Array.isArray(existing) ? [...existing, ...value] : [...value];
      }
    }

    accumulated.next_page_token = nextPageToken;
    return accumulated;
  }
}

export function isHttpMethod(method: string): method is HttpMethod {
  return HTTP_METHODS.some((allowed) => allowed === method);
}

function parseBody(raw: unknown): unknown {
  if (typeof raw !== 'string') {
    return raw ?? '';
  }
  if (raw.length === 0) {
    return raw;
  }
  try {
    return JSON.parse(raw);
  } catch {
    return raw;
  }
}

// Errors carry their text under `_error.message`; anything else is reported whole.
function errorMessage(body: unknown): string {
  if (typeof body === 'string') {
    return body;
  }
  const nested = isRecord(body) ? body._error : undefined;
  if (isRecord(nested) && typeof nested.message === 'string') {
    return nested.message;
  }
  return JSON.stringify(body);
}

function flattenHeaders(headers: RawAxiosResponseHeaders | AxiosResponseHeaders): Record<string, string> {
  const flat: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (typeof value === 'string') {
      flat[name.toLowerCase()] = value;
    } else if (Array.isArray(value)) {
      flat[name.toLowerCase()] = value.join(', ');
    } else if (typeof value === 'number' || typeof value === 'boolean') {
      flat[name.toLowerCase()] = String(value);
    }
  }
  return flat;
}

function expectObject(body: unknown, endpoint: string): Record<string, unknown> {
  if (!isRecord(body)) {
    throw new InvalidDataError(`Expected a JSON object from ${endpoint}, got ${typeof body}`);
  }
  return body;
}

function readPageToken(body: Record<string, unknown>): string {
  const token = body.next_page_token;
  if (isNonEmptyString(token)) return token;
  // 0 ends the walk like an absent token
  if (typeof token === 'number' && token !== 0) return String(token);
  return '';
}
