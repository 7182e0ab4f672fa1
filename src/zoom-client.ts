import { ApiClient } from './api-client.js';
import { loadConfig } from './config.js';
import { MeetingsComponent } from './meetings.js';
import type { ZoomClientOptions } from './types.js';
import { UsersComponent } from './users.js';

/**
 * Entry point for the API. `raw` exposes the request executor for endpoints
 * the components do not cover.
 *
 * The timezone and user id are fixed at construction; build another client
 * to use different ones.
 */
export class ZoomClient {
  readonly raw: ApiClient;
  readonly meetings: MeetingsComponent;
  readonly users: UsersComponent;

  constructor(options: ZoomClientOptions) {
    this.raw = new ApiClient(options);
    this.meetings = new MeetingsComponent(this.raw, options.timezone, options.userId);
    this.users = new UsersComponent(this.raw);
  }

  static fromEnvironment(env: NodeJS.ProcessEnv = process.env): ZoomClient {
    const config = loadConfig(env);
    return new ZoomClient({
      credentials: config.credentials,
      baseUrl: config.baseUrl,
      timezone: config.timezone,
      userId: config.userId,
    });
  }
}
