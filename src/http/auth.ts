import { createHash, timingSafeEqual } from 'node:crypto';

export type AuthFailureReason = 'missing' | 'invalid';

export type AuthResult = { ok: true; principal: string } | { ok: false; reason: AuthFailureReason };

export const MCP_CLIENT_PRINCIPAL = 'mcp-client';

export function extractBearerToken(authorizationHeader: string | string[] | undefined): string | undefined {
  if (!authorizationHeader) {
    return undefined;
  }

  const rawValue = Array.isArray(authorizationHeader) ? authorizationHeader[0] : authorizationHeader;
  const match = rawValue?.match(/^Bearer\s+(.+)$/i);
  if (!match) {
    return undefined;
  }
  const token = match[1]?.trim();
  return token || undefined;
}

function digest(value: string): Buffer {
  return createHash('sha256').update(value, 'utf8').digest();
}

export function authenticate(credential: string | undefined, expectedToken: string): AuthResult {
  if (!credential) {
    return { ok: false, reason: 'missing' };
  }
  // Equal-length digests keep the comparison constant-time regardless of input length.
  if (!timingSafeEqual(digest(credential), digest(expectedToken))) {
    return { ok: false, reason: 'invalid' };
  }
  return { ok: true, principal: MCP_CLIENT_PRINCIPAL };
}
