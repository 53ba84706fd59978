import Link from 'next/link';
import { redirect } from 'next/navigation';
import { auth } from '@clerk/nextjs/server';
import { HistoryList } from '@/components/history/HistoryList';
import { getTranslationRecordRepository } from '@/app/api/history/context';
import { describeError, logEvent } from '@/lib/logging/logger';
import { HISTORY_PAGE_SIZE } from '@/lib/translation/repository';
import type { TranslationRecord } from '@/lib/translation/types';

export const dynamic = 'force-dynamic';

async function loadRecords(userId: string): Promise<TranslationRecord[] | null> {
  try {
    return await getTranslationRecordRepository().listRecent(userId, HISTORY_PAGE_SIZE);
  } catch (error) {
    logEvent('error', 'history_load_failed', { userId, error: describeError(error) });
    return null;
  }
}

export default async function HistoryPage() {
  const { userId } = auth();
  if (!userId) {
    redirect('/sign-in?redirect_url=/history');
  }

  const records = await loadRecords(userId);

  return (
    <main className="mx-auto flex min-h-screen max-w-3xl flex-col gap-6 px-4 py-10 sm:px-6">
      <header className="flex items-center justify-between gap-3">
        <h1 className="text-2xl font-semibold text-ink-900">Your translations</h1>
        <Link href="/" className="secondary-button">
          New translation
        </Link>
      </header>
      {records ? (
        <HistoryList records={records} />
      ) : (
        <p role="alert" className="text-sm text-red-800">
          Unable to load history. Please try again later.
        </p>
      )}
    </main>
  );
}
