import { ApiClient } from './api-client.js';
import { parseRecord, User, UserList, UserListSchema, UserSchema } from './schemas.js';
import type { UserDeleteAction, UserStatus } from './types.js';

export class UsersComponent {
  constructor(private client: ApiClient) {}

  async listUsers(status?: UserStatus): Promise<UserList> {
    const body = await this.client.getAllPages('/users', status ? { status } : undefined);
    return parseRecord(UserListSchema, body, 'user list');
  }

  async getUser(userId = 'me'): Promise<User> {
    const response = await this.client.get(`/users/${userId}`);
    return parseRecord(UserSchema, response.body, 'user');
  }

  /**
   * `disassociate` removes the user from the account but keeps their Zoom
   * account; `delete` removes it permanently.
   */
  async deleteUser(userId: string, action: UserDeleteAction = 'disassociate'): Promise<boolean> {
    const response = await this.client.delete(`/users/${userId}`, { action });
    return response.status === 204;
  }
}
