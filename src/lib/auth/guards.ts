import { ApiError } from '@/lib/error-logging';
import { extractBearerToken, verifySessionToken } from './session-token';

export const ADMIN_ROLES = ['SUPER_ADMIN', 'ADMIN'] as const;

/**
 * Identity and capabilities of whoever issued the request
 */
export interface Caller {
  userId: string;
  roles: string[];
  isAdmin: boolean;
}

export function hasAdminRole(roles: readonly string[]): boolean {
  return roles.some((role) => ADMIN_ROLES.some((admin) => admin === role));
}

// Get the caller from the bearer session token, or null when anonymous
export function getCaller(headers: Headers): Caller | null {
  const token = extractBearerToken(headers);
  if (!token) {
    return null;
  }

  const payload = verifySessionToken(token);
  if (!payload) {
    return null;
  }

  return {
    userId: payload.sub,
    roles: payload.roles,
    isAdmin: hasAdminRole(payload.roles),
  };
}

// Require an authenticated caller
export function requireCaller(headers: Headers): Caller {
  const caller = getCaller(headers);
  if (!caller) {
    throw ApiError.unauthorized('A valid session token is required');
  }
  return caller;
}

// Require the administrator capability
export function assertAdmin(caller: Caller | null): asserts caller is Caller {
  if (!caller?.isAdmin) {
    throw ApiError.forbidden('Admin access required', caller ? { userId: caller.userId } : undefined);
  }
}
