import { type PoolClient } from 'pg';
import { type UserRecord, type UserRepository } from '@tandem/domain';

export interface UserRow {
  id: string;
  username: string;
  display_name: string | null;
  avatar_url: string | null;
  is_active: boolean | null;
}

export class PgUserRepository implements UserRepository<PoolClient> {
  async findById(client: PoolClient, id: string): Promise<UserRecord | null> {
    const result = await client.query<UserRow>(
      `SELECT id, username, display_name, avatar_url, is_active
       FROM users
       WHERE id = $1`,
      [id],
    );
    return result.rows[0] ? mapUserRow(result.rows[0]) : null;
  }
}

export function mapUserRow(row: UserRow): UserRecord {
  return {
    id: row.id,
    username: row.username,
    displayName: row.display_name ?? row.username,
    avatarUrl: row.avatar_url,
    // the column defaults to true and is nullable
    isActive: row.is_active !== false,
  };
}
