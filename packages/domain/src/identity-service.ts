import { isUuid, toIdentity, type Identity, type UserRecord } from './identity';
import {
  type IdentityVerifier,
  type TokenService,
  type UserRepository,
  type WithTransaction,
} from './ports';

export interface IdentityServiceDeps<Tx> {
  tokenService: TokenService;
  userRepo: UserRepository<Tx>;
  withTransaction: WithTransaction<Tx>;
}

export class IdentityService<Tx> implements IdentityVerifier {
  constructor(private readonly deps: IdentityServiceDeps<Tx>) {}

  async verify(credential: string | null | undefined): Promise<Identity> {
    const { tokenService, userRepo, withTransaction } = this.deps;

    if (!credential) {
      throw new IdentityError('MISSING_CREDENTIAL', 'No token provided');
    }

    let userId: string;
    try {
      ({ userId } = await tokenService.verifyAccessToken(credential));
    } catch {
      throw new IdentityError('INVALID_CREDENTIAL', 'Invalid token');
    }

    if (!isUuid(userId)) {
      throw new IdentityError('INVALID_CREDENTIAL', 'Invalid user ID in token');
    }

    let user: UserRecord | null;
    try {
      user = await withTransaction((tx) => userRepo.findById(tx, userId));
    } catch (err) {
      throw new IdentityError('UPSTREAM', 'Authentication failed', { cause: err });
    }

    if (!user || !user.isActive) {
      throw new IdentityError('INVALID_CREDENTIAL', 'Invalid token');
    }

    return toIdentity(user);
  }
}

export class IdentityError extends Error {
  constructor(
    public readonly kind: 'MISSING_CREDENTIAL' | 'INVALID_CREDENTIAL' | 'UPSTREAM',
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'IdentityError';
  }
}
