import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ApiClient } from './api-client.js';
import { NotFoundError } from './errors.js';
import { stubTransport, StubReply, userFixture } from './test-helpers.js';
import { UsersComponent } from './users.js';

function usersWith(replies: StubReply[]) {
  const transport = stubTransport(replies);
  const client = new ApiClient({
    credentials: { type: 'jwt', apiKey: 'test-key', apiSecret: 'test-secret' },
    adapter: transport.adapter,
  });
  return { users: new UsersComponent(client), requests: transport.requests };
}

describe('UsersComponent', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('lists users across pages, filtering the first page by status', async () => {
    const pageFields = { page_count: 2, page_number: 1, page_size: 1, total_records: 2 };
    const { users, requests } = usersWith([
      { status: 200, json: { ...pageFields, users: [userFixture({ id: 'u1' })], next_page_token: 'more' } },
      { status: 200, json: { ...pageFields, users: [userFixture({ id: 'u2', group_ids: ['g1'] })] } },
    ]);

    const list = await users.listUsers('active');

    expect(list.users.map((u) => u.id)).toEqual(['u1', 'u2']);
    expect(list.users[1].group_ids).toEqual(['g1']);
    expect(requests.map((r) => r.params)).toEqual([{ status: 'active' }, { next_page_token: 'more' }]);
  });

  it('gets the authenticated user by default', async () => {
    const { users, requests } = usersWith([{ status: 200, json: userFixture() }]);

    const user = await users.getUser();

    expect(user.email).toBe('ada@example.com');
    expect(requests[0].url).toBe('/users/me');
  });

  it('disassociates a user by default', async () => {
    const { users, requests } = usersWith([{ status: 204 }]);

    expect(await users.deleteUser('u1')).toBe(true);
    expect(requests[0].method).toBe('delete');
    expect(requests[0].url).toBe('/users/u1');
    expect(requests[0].params).toEqual({ action: 'disassociate' });
  });

  it('deletes a user permanently when asked', async () => {
    const { users, requests } = usersWith([{ status: 204 }]);

    await users.deleteUser('u1', 'delete');

    expect(requests[0].params).toEqual({ action: 'delete' });
  });

  it('propagates NotFoundError for an unknown user', async () => {
    const { users } = usersWith([{ status: 404, json: { _error: { message: 'User does not exist: u9' } } }]);

    await expect(users.deleteUser('u9')).rejects.toThrow(NotFoundError);
  });
});
