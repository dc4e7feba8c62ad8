import { describe, it, expect } from 'vitest';
import type { FastifyRequest } from 'fastify';
import { AppError } from '../../../../src/shared/http/errors';
import { requireSession } from '../../../../src/shared/http/require-auth-context';
import type { AuthContext } from '../../../../src/shared/http/auth-context';

function makeReq(authContext: AuthContext | null): FastifyRequest {
  return { authContext } as unknown as FastifyRequest;
}

function catchAppError(fn: () => unknown): AppError {
  try {
    fn();
  } catch (err) {
    if (err instanceof AppError) return err;
    throw err;
  }
  throw new Error('expected an AppError');
}

describe('requireSession', () => {
  it('throws 401 when no account was resolved', () => {
    const e = catchAppError(() => requireSession(makeReq(null)));
    expect(e.status).toBe(401);
    expect(e.message).toBe('Authentication required');
  });

  it('throws 401 for an empty context (token present but unknown)', () => {
    const e = catchAppError(() =>
      requireSession(makeReq({ username: null, role: null, token: null })),
    );
    expect(e.status).toBe(401);
  });

  it('throws 403 when the role requirement is not met', () => {
    const req = makeReq({
      username: 'org1',
      role: 'ORGANIZER',
      token: 'org_test-token',
    });

    const e = catchAppError(() => requireSession(req, { role: 'VOLUNTEER' }));
    expect(e.status).toBe(403);
    expect(e.message).toBe('Insufficient role.');
  });

  it('returns the session when it matches', () => {
    const req = makeReq({
      username: 'alice',
      role: 'VOLUNTEER',
      token: 'vol_test-token',
    });

    expect(requireSession(req, { role: 'VOLUNTEER' })).toEqual({
      username: 'alice',
      role: 'VOLUNTEER',
      token: 'vol_test-token',
    });
  });
});
