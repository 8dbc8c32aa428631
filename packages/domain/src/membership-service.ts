import { type MembershipOracle, type ProjectMemberRepository, type WithTransaction } from './ports';

export interface MembershipServiceDeps<Tx> {
  memberRepo: ProjectMemberRepository<Tx>;
  withTransaction: WithTransaction<Tx>;
}

/**
 * Membership is checked once, when a subscription is requested. A user removed
 * from a project keeps receiving its events until they unsubscribe or disconnect.
 */
export class MembershipService<Tx> implements MembershipOracle {
  constructor(private readonly deps: MembershipServiceDeps<Tx>) {}

  async isProjectMember(projectId: string, userId: string): Promise<boolean> {
    return this.deps.withTransaction((tx) => this.deps.memberRepo.isMember(tx, projectId, userId));
  }
}
