import type { ZodError } from 'zod';
import { describeError, logEvent } from '@/lib/logging/logger';
import type { ProviderEndpointConfig } from '@/lib/translation/config';
import { TranslationConnectionError, TranslationTimeoutError } from '@/lib/translation/errors';
import type {
  ProviderFailureReason,
  ProviderOutcome,
  TranslationServiceName,
} from '@/lib/translation/types';

export interface ProviderClientOptions {
  config?: ProviderEndpointConfig;
  fetchImpl?: typeof fetch;
}

export const failure = (reason: ProviderFailureReason, detail: string): ProviderOutcome => ({
  ok: false,
  reason,
  detail,
});

export function outcomeFromError(error: unknown): ProviderOutcome {
  if (error instanceof TranslationTimeoutError) {
    return failure('timeout', error.message);
  }
  if (error instanceof TranslationConnectionError) {
    return failure('connection', error.message);
  }
  return failure('unexpected', describeError(error));
}

export function parseJson(body: string): { ok: true; value: unknown } | { ok: false; detail: string } {
  try {
    return { ok: true, value: JSON.parse(body) };
  } catch (error) {
    return { ok: false, detail: `Invalid JSON body: ${describeError(error)}` };
  }
}

export function summariseIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

export function logProviderFailure(service: TranslationServiceName, outcome: ProviderOutcome): void {
  if (outcome.ok) {
    return;
  }
  logEvent('warn', 'translation_provider_failed', {
    service,
    reason: outcome.reason,
    detail: outcome.detail,
  });
}
