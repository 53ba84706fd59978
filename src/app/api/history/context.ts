import {
  ConvexTranslationRecordRepository,
  InMemoryTranslationRecordRepository,
  JsonFileTranslationRecordRepository,
  type TranslationRecordRepository,
} from '@/lib/translation/repository';
import { resolveConvexConnection } from '@/lib/convex/client';
import { describeError, logEvent } from '@/lib/logging/logger';

type TranslationRecordRepositoryKind = 'convex' | 'json-file' | 'in-memory';

let repository: TranslationRecordRepository | null = null;
let repositoryKind: TranslationRecordRepositoryKind | null = null;

function setRepository(
  instance: TranslationRecordRepository,
  kind: TranslationRecordRepositoryKind,
): TranslationRecordRepository {
  repository = instance;
  repositoryKind = kind;
  return instance;
}

function createLocalRepository(): TranslationRecordRepository {
  const historyPath = process.env.TRANSLATION_HISTORY_PATH?.trim();
  if (historyPath) {
    return setRepository(new JsonFileTranslationRecordRepository(historyPath), 'json-file');
  }
  return setRepository(new InMemoryTranslationRecordRepository(), 'in-memory');
}

function createRepository(): TranslationRecordRepository {
  if (repository) {
    return repository;
  }

  const connection = resolveConvexConnection();
  if (connection) {
    try {
      return setRepository(new ConvexTranslationRecordRepository(connection), 'convex');
    } catch (error) {
      logEvent('warn', 'repository_init_failed', {
        repository: 'translations',
        kind: 'convex',
        error: describeError(error),
      });
    }
  }

  return createLocalRepository();
}

export function getTranslationRecordRepository(): TranslationRecordRepository {
  return createRepository();
}

export function getTranslationRecordRepositoryKind(): TranslationRecordRepositoryKind | null {
  return repositoryKind;
}

export function resetTranslationRecordRepositoryForTesting(): void {
  repository = null;
  repositoryKind = null;
}

export type { TranslationRecordRepositoryKind };
