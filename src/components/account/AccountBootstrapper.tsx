'use client';

import { useEffect } from 'react';
import { useAuth } from '@clerk/nextjs';
import { syncAuthenticatedUser } from '@/lib/auth/client';

let lastSyncedUserId: string | null = null;

/** Mirrors the signed-in Clerk profile into the user store once per user. */
export function AccountBootstrapper() {
  const { isLoaded, isSignedIn, userId } = useAuth();

  useEffect(() => {
    if (!isLoaded || !isSignedIn || !userId || lastSyncedUserId === userId) {
      return;
    }
    lastSyncedUserId = userId;

    void syncAuthenticatedUser().catch((error: unknown) => {
      lastSyncedUserId = null;
      console.error('Failed to synchronize authenticated user', error);
    });
  }, [isLoaded, isSignedIn, userId]);

  return null;
}

export function __dangerous__resetAccountBootstrapper() {
  lastSyncedUserId = null;
}
