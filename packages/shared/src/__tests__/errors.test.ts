import { describe, it, expect } from 'vitest';
import { AppError, ErrorCode, wsCloseCodeFor } from '../errors';

describe('AppError', () => {
  it('creates an error with correct properties', () => {
    const err = new AppError(ErrorCode.FORBIDDEN, 'Not a project member', { projectId: 'p-1' });

    expect(err.code).toBe(ErrorCode.FORBIDDEN);
    expect(err.message).toBe('Not a project member');
    expect(err.httpStatus).toBe(403);
    expect(err.wsCloseCode).toBe(4003);
    expect(err.safeMeta).toEqual({ projectId: 'p-1' });
    expect(err.name).toBe('AppError');
  });

  it('maps gateway close reasons to distinct close codes', () => {
    const mappings: [ErrorCode, number][] = [
      [ErrorCode.INTERNAL, 4000],
      [ErrorCode.UNAUTHORIZED, 4002],
      [ErrorCode.RATE_LIMITED, 4005],
      [ErrorCode.IDLE_TIMEOUT, 4008],
      [ErrorCode.SESSION_REPLACED, 4009],
    ];

    for (const [code, expected] of mappings) {
      expect(wsCloseCodeFor(code)).toBe(expected);
      expect(new AppError(code, 'test').wsCloseCode).toBe(expected);
    }
  });

  it('keeps close codes inside the application range', () => {
    for (const code of Object.values(ErrorCode)) {
      const closeCode = wsCloseCodeFor(code);
      expect(closeCode).toBeGreaterThanOrEqual(4000);
      expect(closeCode).toBeLessThan(5000);
    }
  });

  it('serializes to JSON without internal details', () => {
    const err = new AppError(ErrorCode.UNAUTHORIZED, 'Invalid token', { reason: 'expired' });
    const json = err.toJSON();

    expect(json).toEqual({ code: 'UNAUTHORIZED', message: 'Invalid token', reason: 'expired' });
    expect(json).not.toHaveProperty('stack');
    expect(json).not.toHaveProperty('wsCloseCode');
  });

  it('is an instance of Error', () => {
    const err = new AppError(ErrorCode.BAD_REQUEST, 'bad');
    expect(err).toBeInstanceOf(Error);
    expect(err).toBeInstanceOf(AppError);
  });
});
