import { jwtVerify, type JWTHeaderParameters } from 'jose';
import { type AccessTokenClaims, type TokenService } from '@tandem/domain';

interface JwtKey {
  kid: string;
  secret: Uint8Array;
}

export interface TokenServiceConfig {
  activeKid: string;
  keys: Array<{ kid: string; secret: string }>;
  issuer?: string;
}

export class JoseTokenService implements TokenService {
  private readonly keys = new Map<string, JwtKey>();
  private readonly activeKey: JwtKey;
  private readonly issuer: string;

  constructor(config: TokenServiceConfig) {
    for (const key of config.keys) {
      this.keys.set(key.kid, { kid: key.kid, secret: new TextEncoder().encode(key.secret) });
    }

    const active = this.keys.get(config.activeKid);
    if (!active) {
      throw new Error(`Active JWT key '${config.activeKid}' not found in keys`);
    }
    this.activeKey = active;
    this.issuer = config.issuer ?? 'tandem';
  }

  async verifyAccessToken(token: string): Promise<AccessTokenClaims> {
    const { payload } = await jwtVerify(token, (header) => this.resolveKey(header), {
      issuer: this.issuer,
      algorithms: ['HS256'],
    });

    if (!payload.sub) {
      throw new Error('JWT missing sub claim');
    }

    return { userId: payload.sub };
  }

  // Tokens without a kid predate rotation and were signed with the active key.
  private resolveKey(header: JWTHeaderParameters): Uint8Array {
    if (!header.kid) return this.activeKey.secret;
    const key = this.keys.get(header.kid);
    if (!key) {
      throw new Error(`Unknown JWT key '${header.kid}'`);
    }
    return key.secret;
  }
}
