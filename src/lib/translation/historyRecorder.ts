import { describeError, logEvent } from '@/lib/logging/logger';
import type { AuthenticatedUser } from '@/lib/auth/identity';
import type { TranslationRecordRepository } from './repository';
import type { TranslationRecord, TranslationServiceName } from './types';

/**
 * Saves a successful translation to the signed-in user's history. Anonymous
 * callers are skipped. A failed write is logged and reported as `null`; it
 * never reaches the caller as an exception.
 */
export async function recordIfAuthenticated(
  repository: TranslationRecordRepository,
  user: AuthenticatedUser | null,
  originalText: string,
  translatedText: string,
  serviceUsed: TranslationServiceName,
): Promise<TranslationRecord | null> {
  if (!user) {
    return null;
  }

  try {
    return await repository.create({
      userId: user.id,
      originalText,
      translatedText,
      serviceUsed,
    });
  } catch (error) {
    logEvent('error', 'translation_history_write_failed', {
      userId: user.id,
      serviceUsed,
      error: describeError(error),
    });
    return null;
  }
}
