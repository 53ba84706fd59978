'use client';

import { ClerkProvider } from '@clerk/nextjs';
import type { ReactNode } from 'react';

interface ProvidersProps {
  children: ReactNode;
}

function getClerkPublishableKey(): string {
  const key = process.env.NEXT_PUBLIC_CLERK_PUBLISHABLE_KEY?.trim();
  if (key) {
    return key;
  }

  if (process.env.NODE_ENV === 'production') {
    console.error('[AUTH] NEXT_PUBLIC_CLERK_PUBLISHABLE_KEY must be configured in production');
    return '';
  }

  return 'pk_test_Y2xlcmsuZXhhbXBsZS5jb20k';
}

export function Providers({ children }: ProvidersProps) {
  const clerkPublishableKey = getClerkPublishableKey();

  if (!clerkPublishableKey) {
    return (
      <main className="mx-auto max-w-xl px-4 py-16 text-center">
        <h1 className="text-2xl font-semibold">Sign-in is not configured</h1>
        <p className="mt-3 text-sm">Set NEXT_PUBLIC_CLERK_PUBLISHABLE_KEY to enable accounts and translation history.</p>
      </main>
    );
  }

  return (
    <ClerkProvider publishableKey={clerkPublishableKey} signInUrl="/sign-in" signUpUrl="/sign-up">
      {children}
    </ClerkProvider>
  );
}
