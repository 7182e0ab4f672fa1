import type { AxiosAdapter, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import type { Meeting, MeetingSummary, User } from './schemas.js';
import { defaultMeetingSettings } from './schemas.js';

export interface StubReply {
  status: number;
  /** Serialised as JSON */
  json?: unknown;
  /** Sent verbatim; wins over `json` */
  text?: string;
  headers?: Record<string, string>;
}

export interface RecordedRequest {
  method: string;
  url: string;
  baseURL?: string;
  params: unknown;
  data: unknown;
  authorization: unknown;
  contentType: unknown;
}

/**
 * An axios adapter that answers from a queue of canned replies and records
 * every request it receives. Throws when the queue runs dry.
 */
export function stubTransport(replies: StubReply[]) {
  const queue = [...replies];
  const requests: RecordedRequest[] = [];

  const adapter: AxiosAdapter = async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
    requests.push({
      method: config.method ?? 'get',
      url: config.url ?? '',
      baseURL: config.baseURL,
      params: config.params,
      data: config.data,
      authorization: config.headers.get('Authorization'),
      contentType: config.headers.get('Content-Type'),
    });

    const reply = queue.shift();
    if (!reply) {
      throw new Error(`Unexpected request: ${config.method} ${config.url}`);
    }

    return {
      data: reply.text ?? (reply.json === undefined ? '' : JSON.stringify(reply.json)),
      status: reply.status,
      statusText: '',
      headers: reply.headers ?? { 'content-type': 'application/json' },
      config,
    };
  };

  return { adapter, requests };
}

export function meetingSummaryFixture(overrides: Partial<MeetingSummary> = {}): MeetingSummary {
  return {
    uuid: 'aBcDeFgH==',
    id: 81234567890,
    host_id: 'host-1',
    topic: 'Weekly sync',
    type: 2,
    start_time: '2026-03-01T10:00:00Z',
    duration: 30,
    timezone: 'UTC',
    created_at: '2026-02-20T09:00:00Z',
    join_url: 'https://zoom.us/j/81234567890',
    ...overrides,
  };
}

export function meetingFixture(overrides: Partial<Meeting> = {}): Meeting {
  return {
    ...meetingSummaryFixture(),
    status: 'waiting',
    agenda: 'Roadmap review',
    start_url: 'https://zoom.us/s/81234567890',
    registration_url: null,
    password: 'pa55word',
    h323_password: '123456',
    pstn_password: '123456',
    encrypted_password: 'enc-placeholder',
    settings: defaultMeetingSettings(),
    ...overrides,
  };
}

export function userFixture(overrides: Partial<User> = {}): User {
  return {
    id: 'user-1',
    first_name: 'Ada',
    last_name: 'Example',
    email: 'ada@example.com',
    type: 2,
    pmi: 1234567890,
    timezone: 'Europe/London',
    verified: 1,
    created_at: '2025-01-01T00:00:00Z',
    status: 'active',
    role_id: '0',
    ...overrides,
  };
}
