import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  HISTORY_PAGE_SIZE,
  InMemoryTranslationRecordRepository,
  JsonFileTranslationRecordRepository,
  type TranslationRecordRepository,
} from '@/lib/translation/repository';

async function seed(repository: TranslationRecordRepository, userId: string, count: number) {
  for (let index = 1; index <= count; index += 1) {
    await repository.create({
      userId,
      originalText: `text ${index}`,
      translatedText: `অনুবাদ ${index}`,
      serviceUsed: 'MyMemory',
    });
  }
}

describe('InMemoryTranslationRecordRepository', () => {
  it('lists only the owner records, newest first', async () => {
    const repository = new InMemoryTranslationRecordRepository();
    await seed(repository, 'user_a', 3);
    await seed(repository, 'user_b', 1);

    const records = await repository.listRecent('user_a');

    expect(records.map((record) => record.originalText)).toEqual(['text 3', 'text 2', 'text 1']);
    expect(records.every((record) => record.userId === 'user_a')).toBe(true);
  });

  it('caps listings at the history page size', async () => {
    const repository = new InMemoryTranslationRecordRepository();
    await seed(repository, 'user_a', HISTORY_PAGE_SIZE + 5);

    const records = await repository.listRecent('user_a', 500);

    expect(records).toHaveLength(HISTORY_PAGE_SIZE);
    expect(records[0]?.originalText).toBe('text 55');
    expect(records[HISTORY_PAGE_SIZE - 1]?.originalText).toBe('text 6');
  });

  it('honours smaller limits', async () => {
    const repository = new InMemoryTranslationRecordRepository();
    await seed(repository, 'user_a', 4);

    await expect(repository.listRecent('user_a', 2)).resolves.toHaveLength(2);
    await expect(repository.listRecent('user_a', 0)).resolves.toEqual([]);
  });

  it('returns copies that cannot mutate stored history', async () => {
    const repository = new InMemoryTranslationRecordRepository();
    await seed(repository, 'user_a', 1);

    const [first] = await repository.listRecent('user_a');
    if (first) {
      first.translatedText = 'changed';
    }

    const [reloaded] = await repository.listRecent('user_a');
    expect(reloaded?.translatedText).toBe('অনুবাদ 1');
  });
});

describe('JsonFileTranslationRecordRepository', () => {
  let tempDir: string;
  let filePath: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'translation-history-'));
    filePath = join(tempDir, 'nested', 'translations.json');
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('returns an empty history when the file does not exist', async () => {
    const repository = new JsonFileTranslationRecordRepository(filePath);

    await expect(repository.listRecent('user_a')).resolves.toEqual([]);
  });

  it('persists records to disk and reloads them', async () => {
    const repository = new JsonFileTranslationRecordRepository(filePath);
    const created = await repository.create({
      userId: 'user_a',
      originalText: 'Hello',
      translatedText: 'নমস্কাৰ',
      serviceUsed: 'LibreTranslate',
    });

    expect(created.id).toBe('1');

    const reopened = new JsonFileTranslationRecordRepository(filePath);
    await expect(reopened.listRecent('user_a')).resolves.toEqual([created]);
  });

  it('keeps every record when writes overlap', async () => {
    const repository = new JsonFileTranslationRecordRepository(filePath);

    await Promise.all(
      ['one', 'two', 'three', 'four'].map((word) =>
        repository.create({ userId: 'user_a', originalText: word, translatedText: word, serviceUsed: 'MyMemory' }),
      ),
    );

    const records = await repository.listRecent('user_a');
    expect(records.map((record) => record.id)).toEqual(['4', '3', '2', '1']);
    const stored = JSON.parse(readFileSync(filePath, 'utf8'));
    expect(stored.nextId).toBe(5);
  });

  it('ignores malformed rows in an existing file', async () => {
    const repository = new JsonFileTranslationRecordRepository(join(tempDir, 'existing.json'));
    writeFileSync(
      join(tempDir, 'existing.json'),
      JSON.stringify({
        nextId: 3,
        records: [
          {
            id: '1',
            userId: 'user_a',
            originalText: 'Hello',
            translatedText: 'নমস্কাৰ',
            serviceUsed: 'MyMemory',
            createdAt: '2024-01-01T00:00:00.000Z',
          },
          { id: '2', userId: 'user_a', originalText: 'Bad', serviceUsed: 'Unknown' },
        ],
      }),
    );

    const records = await repository.listRecent('user_a');

    expect(records).toHaveLength(1);
    expect(records[0]?.id).toBe('1');
  });
});
