import { NextResponse, type NextRequest } from 'next/server';
import { currentUser } from '@clerk/nextjs/server';
import { resolveAuthenticatedUser } from '@/lib/auth/identity';
import { describeError, logEvent } from '@/lib/logging/logger';
import type { UserProfileInput } from '@/lib/users/types';
import { getUserRepository } from './context';

export const dynamic = 'force-dynamic';

function normaliseEmail(email: string | null | undefined): string | undefined {
  const value = email?.trim();
  return value ? value.toLowerCase() : undefined;
}

const optionalString = (value: string | null | undefined): string | undefined => value?.trim() || undefined;

export async function POST(request: NextRequest) {
  const identity = resolveAuthenticatedUser(request);
  if (!identity) {
    return NextResponse.json({ error: 'Not authenticated' }, { status: 401 });
  }

  try {
    const profile = await currentUser();
    const payload: UserProfileInput = {
      id: identity.id,
      email: normaliseEmail(profile?.primaryEmailAddress?.emailAddress ?? profile?.emailAddresses[0]?.emailAddress),
      firstName: optionalString(profile?.firstName),
      lastName: optionalString(profile?.lastName),
      profileImageUrl: optionalString(profile?.imageUrl),
    };

    const user = await getUserRepository().upsert(payload);
    return NextResponse.json({ user });
  } catch (error) {
    logEvent('error', 'user_sync_failed', { userId: identity.id, error: describeError(error) });
    return NextResponse.json({ error: 'Unable to sync account' }, { status: 502 });
  }
}
