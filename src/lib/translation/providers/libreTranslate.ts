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

const libreTranslateResponseSchema = z.object({
  translatedText: z.string().nullish(),
  error: z.string().nullish(),
});

class LibreTranslateProvider implements TranslationProvider {
  readonly name = 'LibreTranslate';
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

  private buildHeaders(): Record<string, string> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.config.libreTranslateApiKey) {
      headers.Authorization = `Bearer ${this.config.libreTranslateApiKey}`;
    }
    return headers;
  }

  private async attempt(text: string): Promise<ProviderOutcome> {
    const response = await fetchWithTimeout(this.config.libreTranslateUrl, {
      method: 'POST',
      headers: this.buildHeaders(),
      body: JSON.stringify({
        q: text,
        source: SOURCE_LANGUAGE,
        target: TARGET_LANGUAGE,
        format: 'text',
      }),
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

    const parsed = libreTranslateResponseSchema.safeParse(json.value);
    if (!parsed.success) {
      return failure('malformed-response', summariseIssues(parsed.error));
    }

    const translatedText = parsed.data.translatedText?.trim();
    if (translatedText) {
      return { ok: true, translatedText };
    }
    if (parsed.data.error) {
      return failure('service-error', parsed.data.error);
    }
    return failure('empty-translation', 'translatedText is empty');
  }
}

export const createLibreTranslateProvider = (options: ProviderClientOptions = {}): TranslationProvider =>
  new LibreTranslateProvider(options);
