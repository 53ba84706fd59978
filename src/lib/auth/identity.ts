import { getAuth } from '@clerk/nextjs/server';
import type { NextRequest } from 'next/server';
import { describeError, logEvent } from '@/lib/logging/logger';

export interface AuthenticatedUser {
  id: string;
}

export interface RequestIdentity {
  userId: string | null;
  source: 'clerk' | 'authorization' | 'anonymous';
}

const DEV_TOKEN_PREFIX = 'dev:';

function isDevModeAllowed(): boolean {
  return process.env.NODE_ENV !== 'production';
}

function resolveFromAuthorization(header: string | null): RequestIdentity | null {
  if (!header || !header.startsWith('Bearer ')) {
    return null;
  }
  const token = header.slice('Bearer '.length).trim();
  if (!token.startsWith(DEV_TOKEN_PREFIX) || process.env.AUTH_DEV_TOKENS !== '1') {
    return null;
  }
  if (!isDevModeAllowed()) {
    logEvent('error', 'auth_dev_tokens_ignored', { reason: 'AUTH_DEV_TOKENS is set but ignored in production' });
    return null;
  }
  const userId = token.slice(DEV_TOKEN_PREFIX.length).trim();
  return userId ? { userId, source: 'authorization' } : null;
}

function resolveFromClerk(request: NextRequest): RequestIdentity | null {
  try {
    const userId = getAuth(request).userId?.trim();
    return userId ? { userId, source: 'clerk' } : null;
  } catch (error) {
    if (isDevModeAllowed()) {
      logEvent('warn', 'auth_clerk_resolution_failed', { error: describeError(error) });
    }
    return null;
  }
}

/**
 * Identifies the caller of a route handler: the Clerk session first, then,
 * outside production and only with `AUTH_DEV_TOKENS=1`, a `Bearer dev:<id>`
 * header.
 */
export function resolveRequestIdentity(request: NextRequest): RequestIdentity {
  return (
    resolveFromClerk(request) ??
    resolveFromAuthorization(request.headers.get('authorization')) ?? { userId: null, source: 'anonymous' }
  );
}

export function resolveAuthenticatedUser(request: NextRequest): AuthenticatedUser | null {
  const { userId } = resolveRequestIdentity(request);
  return userId ? { id: userId } : null;
}
