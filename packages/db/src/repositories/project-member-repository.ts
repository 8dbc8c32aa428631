import { type PoolClient } from 'pg';
import { type ProjectMemberRepository } from '@tandem/domain';

export class PgProjectMemberRepository implements ProjectMemberRepository<PoolClient> {
  async isMember(client: PoolClient, projectId: string, userId: string): Promise<boolean> {
    const result = await client.query<{ exists: boolean }>(
      `SELECT EXISTS(
         SELECT 1 FROM project_members WHERE project_id = $1 AND user_id = $2
       )`,
      [projectId, userId],
    );
    return result.rows[0]?.exists === true;
  }
}
