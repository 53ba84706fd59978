import { z } from 'zod';
import { fetchWithTimeout } from '@/lib/fetch/timedFetch';
import { resolveProviderConfig, SOURCE_LANGUAGE, TARGET_LANGUAGE, type ProviderEndpointConfig } from '../config';
import type { ProviderOutcome, TranslationProvider } from '../types';
import {
  failure,
  logProviderFailure,
  outcomeFromError,
  parseJson,
  summariseIssues,
  type ProviderClientOptions,
} from './shared';

const myMemoryResponseSchema = z.object({
  responseData: z
    .object({
      translatedText: z.string().nullish(),
    })
    .nullish(),
  responseStatus: z.coerce.number(),
  responseDetails: z.string().nullish(),
});

/** Free MyMemory endpoint; needs no key, answers `GET ?q=…&langpair=en|as`. */
class MyMemoryProvider implements TranslationProvider {
  readonly name = 'MyMemory';
  private readonly config: ProviderEndpointConfig;
  private readonly fetchImpl?: typeof fetch;

  constructor(options: ProviderClientOptions) {
    this.config = options.config ?? resolveProviderConfig();
    this.fetchImpl = options.fetchImpl;
  }

  async translate(text: string): Promise<ProviderOutcome> {
    let outcome: ProviderOutcome;
    try {
      outcome = await this.attempt(text);
    } catch (error) {
      outcome = outcomeFromError(error);
    }
    logProviderFailure(this.name, outcome);
    return outcome;
  }

  private buildUrl(text: string): string {
    const url = new URL(this.config.myMemoryUrl);
    url.searchParams.set('q', text);
    url.searchParams.set('langpair', `${SOURCE_LANGUAGE}|${TARGET_LANGUAGE}`);
    return url.toString();
  }

  private async attempt(text: string): Promise<ProviderOutcome> {
    const response = await fetchWithTimeout(this.buildUrl(text), {
      method: 'GET',
      headers: { Accept: 'application/json' },
      timeoutMs: this.config.timeoutMs,
      fetchImpl: this.fetchImpl,
    });

    if (!response.ok) {
      return failure('http-status', `HTTP ${response.status}`);
    }

    const json = parseJson(response.body);
    if (!json.ok) {
      return failure('malformed-response', json.detail);
    }

    const parsed = myMemoryResponseSchema.safeParse(json.value);
    if (!parsed.success) {
      return failure('malformed-response', summariseIssues(parsed.error));
    }

    const { responseStatus, responseData, responseDetails } = parsed.data;
    if (responseStatus !== 200) {
      return failure('service-error', `responseStatus ${responseStatus}${responseDetails ? `: ${responseDetails}` : ''}`);
    }

    const translatedText = responseData?.translatedText?.trim();
    if (!translatedText) {
      return failure('empty-translation', 'responseData.translatedText is empty');
    }

    return { ok: true, translatedText };
  }
}

export const createMyMemoryProvider = (options: ProviderClientOptions = {}): TranslationProvider =>
  new MyMemoryProvider(options);
