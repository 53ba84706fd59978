'use client';

import Link from 'next/link';
import { SignInButton, SignedIn, SignedOut, UserButton, useUser } from '@clerk/nextjs';
import { useMemo } from 'react';

function formatUserName(firstName?: string | null, lastName?: string | null, emailAddress?: string | null) {
  const name = [firstName?.trim(), lastName?.trim()].filter(Boolean).join(' ').trim();
  if (name) {
    return name;
  }
  return emailAddress || 'Signed in user';
}

export function AuthPanel() {
  const { user } = useUser();

  const displayName = useMemo(
    () => formatUserName(user?.firstName, user?.lastName, user?.primaryEmailAddress?.emailAddress ?? null),
    [user?.firstName, user?.lastName, user?.primaryEmailAddress?.emailAddress],
  );

  return (
    <section className="panel flex flex-col gap-3 sm:flex-row sm:items-center sm:justify-between" aria-label="Account">
      <div>
        <SignedOut>
          <p className="text-sm text-ink-600">Sign in to keep a history of your translations.</p>
        </SignedOut>
        <SignedIn>
          <p className="text-sm text-ink-600">
            Signed in as <span className="font-semibold text-ink-900">{displayName}</span>
          </p>
        </SignedIn>
      </div>
      <div className="flex items-center gap-3">
        <SignedIn>
          <Link href="/history" className="secondary-button">
            View history
          </Link>
          <UserButton afterSignOutUrl="/" />
        </SignedIn>
        <SignedOut>
          <SignInButton mode="modal">
            <button type="button" className="cta-button">
              Sign in
            </button>
          </SignInButton>
        </SignedOut>
      </div>
    </section>
  );
}
