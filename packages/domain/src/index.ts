export { isUuid, toIdentity, type Identity, type UserRecord } from './identity';
export type {
  AccessTokenClaims,
  TokenService,
  UserRepository,
  ProjectMemberRepository,
  WithTransaction,
  IdentityVerifier,
  MembershipOracle,
} from './ports';
export { IdentityService, IdentityError, type IdentityServiceDeps } from './identity-service';
export { MembershipService, type MembershipServiceDeps } from './membership-service';
