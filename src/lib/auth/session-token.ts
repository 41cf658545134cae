import crypto from 'crypto';
import { z } from 'zod';
import { env } from '@/lib/env';

// =============================================================================
// Types
// =============================================================================

const sessionPayloadSchema = z.object({
  sub: z.string().min(1),
  roles: z.array(z.string()).default([]),
  exp: z.number().int(),
});

export type SessionPayload = z.infer<typeof sessionPayloadSchema>;

export interface SessionTokenOptions {
  roles?: string[];
  expiresIn?: number; // seconds, default 3600
  secret?: string;
}

const DEFAULT_EXPIRATION = 3600;
const MAX_EXPIRATION = 7 * 86400;

// =============================================================================
// Signing
// =============================================================================

function sign(payloadBase64: string, secret: string): string {
  return crypto.createHmac('sha256', secret).update(payloadBase64).digest('base64url');
}

/**
 * Issue a `payload.signature` session token for a user
 */
export function createSessionToken(userId: string, options: SessionTokenOptions = {}): string {
  const expiresIn = Math.min(options.expiresIn ?? DEFAULT_EXPIRATION, MAX_EXPIRATION);
  const payload: SessionPayload = {
    sub: userId,
    roles: options.roles ?? [],
    exp: Math.floor(Date.now() / 1000) + expiresIn,
  };

  const payloadBase64 = Buffer.from(JSON.stringify(payload)).toString('base64url');
  return `${payloadBase64}.${sign(payloadBase64, options.secret ?? env.AUTH_SECRET)}`;
}

/**
 * Verify signature and expiry; null for anything malformed, forged or expired
 */
export function verifySessionToken(token: string, secret: string = env.AUTH_SECRET): SessionPayload | null {
  const parts = token.split('.');
  if (parts.length !== 2) {
    return null;
  }

  const [payloadBase64, signature] = parts;
  const expected = Buffer.from(sign(payloadBase64, secret));
  const actual = Buffer.from(signature);
  if (actual.length !== expected.length || !crypto.timingSafeEqual(actual, expected)) {
    return null;
  }

  let decoded: unknown;
  try {
    decoded = JSON.parse(Buffer.from(payloadBase64, 'base64url').toString());
  } catch {
    return null;
  }

  const parsed = sessionPayloadSchema.safeParse(decoded);
  if (!parsed.success || parsed.data.exp < Math.floor(Date.now() / 1000)) {
    return null;
  }

  return parsed.data;
}

export function extractBearerToken(headers: Headers): string | null {
  const authorization = headers.get('authorization');
  if (!authorization?.startsWith('Bearer ')) {
    return null;
  }
  const token = authorization.slice('Bearer '.length).trim();
  return token || null;
}
