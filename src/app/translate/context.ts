import { resolveAuthenticatedUser } from '@/lib/auth/identity';
import { translateText } from '@/lib/translation/service';
import { getTranslationRecordRepository } from '@/app/api/history/context';
import type { TranslationAppContext } from './handler';

let context: TranslationAppContext | null = null;

export function getTranslationAppContext(): TranslationAppContext {
  if (!context) {
    context = {
      translate: (text) => translateText(text),
      repository: getTranslationRecordRepository(),
      resolveUser: resolveAuthenticatedUser,
    };
  }
  return context;
}

export function resetTranslationAppContextForTesting(): void {
  context = null;
}
