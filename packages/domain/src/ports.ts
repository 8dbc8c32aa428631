import { type Identity, type UserRecord } from './identity';

export interface AccessTokenClaims {
  userId: string;
}

export interface TokenService {
  verifyAccessToken(token: string): Promise<AccessTokenClaims>;
}

export interface UserRepository<Tx> {
  findById(tx: Tx, id: string): Promise<UserRecord | null>;
}

export interface ProjectMemberRepository<Tx> {
  isMember(tx: Tx, projectId: string, userId: string): Promise<boolean>;
}

export type WithTransaction<Tx> = <T>(fn: (tx: Tx) => Promise<T>) => Promise<T>;

/** Turns a bearer credential into an identity, or rejects with an `IdentityError`. */
export interface IdentityVerifier {
  verify(credential: string | null | undefined): Promise<Identity>;
}

/** Answers whether a user may receive a project's events. */
export interface MembershipOracle {
  isProjectMember(projectId: string, userId: string): Promise<boolean>;
}
