'use client';

import { isRecord } from '@/lib/utils/guards';
import { isUserRecord, type UserRecord } from '@/lib/users/types';

interface SyncUserResult {
  user: UserRecord | null;
}

let inFlightSync: Promise<SyncUserResult> | null = null;

/** Copies the signed-in Clerk profile into the user store; concurrent calls share one request. */
export async function syncAuthenticatedUser(): Promise<SyncUserResult> {
  if (inFlightSync) {
    return inFlightSync;
  }

  inFlightSync = (async () => {
    try {
      const response = await fetch('/api/auth/sync', {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
      });

      if (!response.ok) {
        const errorBody = await response.text().catch(() => '');
        throw new Error(`Failed to sync authenticated user (${response.status}): ${errorBody}`);
      }

      const body: unknown = await response.json();
      return { user: isRecord(body) && isUserRecord(body.user) ? body.user : null };
    } finally {
      inFlightSync = null;
    }
  })();

  return inFlightSync;
}
