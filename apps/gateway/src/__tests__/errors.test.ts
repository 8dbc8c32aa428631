import { describe, it, expect } from 'vitest';
import { IdentityError } from '@tandem/domain';
import { RealtimeError, authenticationFailure, describeCause } from '../errors';

describe('authenticationFailure', () => {
  it('passes credential problems through with their client-facing message', () => {
    const error = authenticationFailure(new IdentityError('INVALID_CREDENTIAL', 'Invalid token'));
    expect(error).toBeInstanceOf(RealtimeError);
    expect(error.kind).toBe('AUTHENTICATION');
    expect(error.message).toBe('Invalid token');
  });

  it('turns upstream and unknown failures into a generic upstream error', () => {
    const upstream = authenticationFailure(
      new IdentityError('UPSTREAM', 'Authentication failed', { cause: new Error('timeout') }),
    );
    const unknown = authenticationFailure('boom');

    expect(upstream.kind).toBe('UPSTREAM');
    expect(upstream.message).toBe('Authentication failed');
    expect(unknown.kind).toBe('UPSTREAM');
    expect(describeCause(unknown)).toBe('boom');
  });

  it('describes the underlying cause for logs only', () => {
    const error = new RealtimeError('UPSTREAM', 'Subscription failed', { cause: new Error('db down') });
    expect(describeCause(error)).toBe('db down');
    expect(describeCause(new RealtimeError('PROTOCOL', 'Invalid message format'))).toBeUndefined();
  });
});
