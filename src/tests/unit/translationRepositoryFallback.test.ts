import { afterAll, beforeEach, describe, expect, it, vi } from 'vitest';

const convexCtorSpy = vi.fn();
const jsonFileCtorSpy = vi.fn();
const inMemoryCtorSpy = vi.fn();
let convexShouldThrow = false;

class MockConvexTranslationRecordRepository {
  constructor() {
    convexCtorSpy();
    if (convexShouldThrow) {
      throw new Error('Convex unavailable');
    }
  }
}

class MockJsonFileTranslationRecordRepository {
  constructor(filePath: string) {
    jsonFileCtorSpy(filePath);
  }
}

class MockInMemoryTranslationRecordRepository {
  constructor() {
    inMemoryCtorSpy();
  }
}

vi.mock('@/lib/translation/repository', () => ({
  ConvexTranslationRecordRepository: MockConvexTranslationRecordRepository,
  JsonFileTranslationRecordRepository: MockJsonFileTranslationRecordRepository,
  InMemoryTranslationRecordRepository: MockInMemoryTranslationRecordRepository,
}));

const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});

async function loadContext() {
  const context = await import('@/app/api/history/context');
  context.resetTranslationRecordRepositoryForTesting();
  return context;
}

describe('translation record repository selection', () => {
  const originalEnv = { ...process.env };

  beforeEach(() => {
    convexShouldThrow = false;
    convexCtorSpy.mockClear();
    jsonFileCtorSpy.mockClear();
    inMemoryCtorSpy.mockClear();
    warnSpy.mockClear();
    process.env = {
      ...originalEnv,
      CONVEX_URL: 'https://fake.convex.cloud',
      CONVEX_DEPLOYMENT_KEY: 'deployment-key',
      TRANSLATION_HISTORY_PATH: '',
    };
    vi.resetModules();
  });

  afterAll(() => {
    process.env = originalEnv;
    warnSpy.mockRestore();
  });

  it('uses Convex when a deployment is configured', async () => {
    const { getTranslationRecordRepository, getTranslationRecordRepositoryKind } = await loadContext();

    const repository = getTranslationRecordRepository();

    expect(repository).toBeInstanceOf(MockConvexTranslationRecordRepository);
    expect(getTranslationRecordRepositoryKind()).toBe('convex');
    expect(getTranslationRecordRepository()).toBe(repository);
    expect(convexCtorSpy).toHaveBeenCalledTimes(1);
    expect(warnSpy).not.toHaveBeenCalled();
  });

  it('falls back to memory with a warning when Convex initialisation fails', async () => {
    convexShouldThrow = true;
    const { getTranslationRecordRepository, getTranslationRecordRepositoryKind } = await loadContext();

    const repository = getTranslationRecordRepository();

    expect(repository).toBeInstanceOf(MockInMemoryTranslationRecordRepository);
    expect(getTranslationRecordRepositoryKind()).toBe('in-memory');
    expect(warnSpy).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(warnSpy.mock.calls[0]?.[0]))).toMatchObject({
      event: 'repository_init_failed',
      repository: 'translations',
      error: 'Error: Convex unavailable',
    });
  });

  it('uses the JSON file store when Convex is not configured and a path is set', async () => {
    process.env.CONVEX_URL = '';
    process.env.TRANSLATION_HISTORY_PATH = '/tmp/history/translations.json';
    const { getTranslationRecordRepository, getTranslationRecordRepositoryKind } = await loadContext();

    const repository = getTranslationRecordRepository();

    expect(repository).toBeInstanceOf(MockJsonFileTranslationRecordRepository);
    expect(getTranslationRecordRepositoryKind()).toBe('json-file');
    expect(jsonFileCtorSpy).toHaveBeenCalledWith('/tmp/history/translations.json');
    expect(convexCtorSpy).not.toHaveBeenCalled();
  });
});
