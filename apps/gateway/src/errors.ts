import { IdentityError } from '@tandem/domain';

export type RealtimeErrorKind = 'AUTHENTICATION' | 'AUTHORIZATION' | 'PROTOCOL' | 'DELIVERY' | 'UPSTREAM';

/** A failure inside a session. `message` is safe to send to the client. */
export class RealtimeError extends Error {
  constructor(
    public readonly kind: RealtimeErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'RealtimeError';
  }
}

export const AUTHENTICATION_FAILED = 'Authentication failed';

export function authenticationFailure(err: unknown): RealtimeError {
  if (err instanceof IdentityError && err.kind !== 'UPSTREAM') {
    return new RealtimeError('AUTHENTICATION', err.message, { cause: err });
  }
  return new RealtimeError('UPSTREAM', AUTHENTICATION_FAILED, { cause: err });
}

export function describeCause(err: RealtimeError): string | undefined {
  const { cause } = err;
  if (cause === undefined) return undefined;
  return cause instanceof Error ? cause.message : String(cause);
}
