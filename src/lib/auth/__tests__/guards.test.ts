import { describe, it, expect } from 'vitest';
import { ApiError, ErrorCode } from '@/lib/error-logging';
import { assertAdmin, getCaller, hasAdminRole, requireCaller, type Caller } from '../guards';
import { createSessionToken } from '../session-token';

function bearer(token: string): Headers {
  return new Headers({ authorization: `Bearer ${token}` });
}

describe('Auth Guards', () => {
  describe('hasAdminRole', () => {
    it('should accept admin roles only', () => {
      expect(hasAdminRole(['MEMBER', 'ADMIN'])).toBe(true);
      expect(hasAdminRole(['SUPER_ADMIN'])).toBe(true);
      expect(hasAdminRole(['MEMBER'])).toBe(false);
      expect(hasAdminRole([])).toBe(false);
    });
  });

  describe('getCaller', () => {
    it('should build a caller from a valid token', () => {
      const headers = bearer(createSessionToken('user-1', { roles: ['ADMIN'] }));

      expect(getCaller(headers)).toEqual({ userId: 'user-1', roles: ['ADMIN'], isAdmin: true });
    });

    it('should return null when anonymous or the token is invalid', () => {
      expect(getCaller(new Headers())).toBeNull();
      expect(getCaller(bearer('not-a-token'))).toBeNull();
    });
  });

  describe('requireCaller', () => {
    it('should throw UNAUTHORIZED without a valid token', () => {
      expect(() => requireCaller(new Headers())).toThrow(ApiError);
      expect(() => requireCaller(new Headers())).toThrow('A valid session token is required');
    });

    it('should return the caller for a valid token', () => {
      const headers = bearer(createSessionToken('user-2'));

      expect(requireCaller(headers)).toEqual({ userId: 'user-2', roles: [], isAdmin: false });
    });
  });

  describe('assertAdmin', () => {
    it('should pass for administrators', () => {
      const caller: Caller = { userId: 'admin-1', roles: ['ADMIN'], isAdmin: true };

      expect(() => assertAdmin(caller)).not.toThrow();
    });

    it('should throw FORBIDDEN for other callers and for anonymous access', () => {
      const member: Caller = { userId: 'user-1', roles: ['MEMBER'], isAdmin: false };

      for (const caller of [member, null]) {
        let thrown: unknown;
        try {
          assertAdmin(caller);
        } catch (error) {
          thrown = error;
        }
        expect(thrown).toMatchObject({ code: ErrorCode.FORBIDDEN, statusCode: 403 });
      }
    });
  });
});
