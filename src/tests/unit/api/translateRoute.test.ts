import { afterAll, beforeEach, describe, expect, it, vi } from 'vitest';
import { NextRequest } from 'next/server';
import { createTranslateHandler, type TranslationAppContext } from '@/app/translate/handler';
import { TranslationConnectionError, TranslationTimeoutError } from '@/lib/translation/errors';
import {
  InMemoryTranslationRecordRepository,
  type TranslationRecordRepository,
} from '@/lib/translation/repository';
import type { TranslationOutcome } from '@/lib/translation/types';

const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

const buildRequest = (body: string) =>
  new NextRequest('https://translator.test/translate', {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body,
  });

const jsonRequest = (payload: unknown) => buildRequest(JSON.stringify(payload));

function buildContext(overrides: Partial<TranslationAppContext> = {}) {
  const repository = new InMemoryTranslationRecordRepository();
  const translate = vi.fn(
    async (_text: string): Promise<TranslationOutcome> => ({
      success: true,
      translatedText: 'নমস্কাৰ',
      serviceUsed: 'MyMemory',
    }),
  );
  const context: TranslationAppContext = {
    translate,
    repository,
    resolveUser: () => ({ id: 'user_1' }),
    ...overrides,
  };
  return { context, repository, translate };
}

describe('POST /translate', () => {
  beforeEach(() => {
    errorSpy.mockClear();
  });

  afterAll(() => {
    errorSpy.mockRestore();
  });

  it('translates text and records it for a signed-in user', async () => {
    const { context, repository, translate } = buildContext();

    const response = await createTranslateHandler(context)(jsonRequest({ text: 'Hello' }));

    expect(response.status).toBe(200);
    await expect(response.json()).resolves.toEqual({
      success: true,
      translated_text: 'নমস্কাৰ',
      original_text: 'Hello',
      service: 'MyMemory',
    });
    expect(translate).toHaveBeenCalledWith('Hello');
    const records = await repository.listRecent('user_1');
    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({
      userId: 'user_1',
      originalText: 'Hello',
      translatedText: 'নমস্কাৰ',
      serviceUsed: 'MyMemory',
    });
  });

  it('trims the submitted text before translating', async () => {
    const { context, translate } = buildContext();

    const response = await createTranslateHandler(context)(jsonRequest({ text: '  Good morning \n' }));
    const payload = await response.json();

    expect(translate).toHaveBeenCalledWith('Good morning');
    expect(payload.original_text).toBe('Good morning');
  });

  it('does not record translations for anonymous callers', async () => {
    const { context, repository } = buildContext({ resolveUser: () => null });
    const createSpy = vi.spyOn(repository, 'create');

    const response = await createTranslateHandler(context)(jsonRequest({ text: 'Hello' }));

    expect(response.status).toBe(200);
    expect(createSpy).not.toHaveBeenCalled();
  });

  it.each([
    ['an empty string', jsonRequest({ text: '' })],
    ['whitespace only', jsonRequest({ text: '   ' })],
    ['a missing field', jsonRequest({})],
    ['a non-string field', jsonRequest({ text: 42 })],
    ['an unparseable body', buildRequest('{not json')],
  ])('rejects %s with 400 and never calls a provider', async (_label, request) => {
    const { context, translate, repository } = buildContext();

    const response = await createTranslateHandler(context)(request);

    expect(response.status).toBe(400);
    await expect(response.json()).resolves.toEqual({
      success: false,
      error: 'Please enter some text to translate',
    });
    expect(translate).not.toHaveBeenCalled();
    await expect(repository.listRecent('user_1')).resolves.toEqual([]);
  });

  it('answers 503 when every provider fails and records nothing', async () => {
    const { context, repository } = buildContext({
      translate: async () => ({
        success: false,
        failures: [
          { service: 'MyMemory', reason: 'timeout', detail: 'Request timed out after 10000ms' },
          { service: 'LibreTranslate', reason: 'http-status', detail: 'HTTP 502' },
        ],
      }),
    });

    const response = await createTranslateHandler(context)(jsonRequest({ text: 'Hello' }));

    expect(response.status).toBe(503);
    await expect(response.json()).resolves.toEqual({
      success: false,
      error: 'Translation services are currently unavailable. Please try again later.',
    });
    await expect(repository.listRecent('user_1')).resolves.toEqual([]);
  });

  it('still answers 200 when saving the history fails', async () => {
    const failingRepository: TranslationRecordRepository = {
      create: async () => {
        throw new Error('database offline');
      },
      listRecent: async () => [],
    };
    const { context } = buildContext({ repository: failingRepository });

    const response = await createTranslateHandler(context)(jsonRequest({ text: 'Hello' }));

    expect(response.status).toBe(200);
    const payload = await response.json();
    expect(payload.translated_text).toBe('নমস্কাৰ');
    expect(JSON.parse(String(errorSpy.mock.calls[0]?.[0]))).toMatchObject({
      event: 'translation_history_write_failed',
      userId: 'user_1',
    });
  });

  it('maps an escaped timeout to 504', async () => {
    const { context } = buildContext({
      translate: async () => {
        throw new TranslationTimeoutError('Request timed out after 10000ms');
      },
    });

    const response = await createTranslateHandler(context)(jsonRequest({ text: 'Hello' }));

    expect(response.status).toBe(504);
    await expect(response.json()).resolves.toEqual({
      success: false,
      error: 'Translation request timed out. Please try again.',
    });
  });

  it('maps an escaped connection failure to 503', async () => {
    const { context } = buildContext({
      translate: async () => {
        throw new TranslationConnectionError('Connection failed: fetch failed');
      },
    });

    const response = await createTranslateHandler(context)(jsonRequest({ text: 'Hello' }));

    expect(response.status).toBe(503);
    await expect(response.json()).resolves.toEqual({
      success: false,
      error: 'Unable to connect to translation service. Please check your internet connection.',
    });
  });

  it('hides unexpected errors behind a generic 500', async () => {
    const { context } = buildContext({
      translate: async () => {
        throw new Error('secret stack detail');
      },
    });

    const response = await createTranslateHandler(context)(jsonRequest({ text: 'Hello' }));

    expect(response.status).toBe(500);
    await expect(response.json()).resolves.toEqual({
      success: false,
      error: 'An unexpected error occurred. Please try again.',
    });
    expect(JSON.parse(String(errorSpy.mock.calls[0]?.[0]))).toMatchObject({
      event: 'translation_unexpected_error',
      error: 'Error: secret stack detail',
    });
  });
});
