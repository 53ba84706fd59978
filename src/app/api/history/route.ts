import { NextResponse, type NextRequest } from 'next/server';
import { resolveAuthenticatedUser } from '@/lib/auth/identity';
import { describeError, logEvent } from '@/lib/logging/logger';
import { HISTORY_PAGE_SIZE } from '@/lib/translation/repository';
import { getTranslationRecordRepository } from './context';

export const dynamic = 'force-dynamic';

export async function GET(request: NextRequest) {
  const user = resolveAuthenticatedUser(request);
  if (!user) {
    return NextResponse.json({ error: 'Not authenticated' }, { status: 401 });
  }

  try {
    const records = await getTranslationRecordRepository().listRecent(user.id, HISTORY_PAGE_SIZE);
    return NextResponse.json({ records });
  } catch (error) {
    logEvent('error', 'history_load_failed', { userId: user.id, error: describeError(error) });
    return NextResponse.json({ error: 'Unable to load history' }, { status: 500 });
  }
}
