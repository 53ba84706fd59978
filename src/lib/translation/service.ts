import { logEvent } from '@/lib/logging/logger';
import { createProviderChain, type ProviderChain } from './providers';
import type { ProviderFailure, TranslationOutcome } from './types';

let defaultChain: ProviderChain | null = null;

function getDefaultProviderChain(): ProviderChain {
  if (!defaultChain) {
    defaultChain = createProviderChain();
  }
  return defaultChain;
}

export function resetProviderChainForTesting(): void {
  defaultChain = null;
}

/**
 * Translates English text to Assamese, trying the primary provider and then
 * the secondary one. Each provider is attempted at most once and never in
 * parallel. Provider failures are reported in the outcome rather than thrown.
 */
export async function translateText(
  text: string,
  chain: ProviderChain = getDefaultProviderChain(),
): Promise<TranslationOutcome> {
  const failures: ProviderFailure[] = [];

  for (const provider of [chain.primary, chain.secondary]) {
    logEvent('info', 'translation_attempt', { service: provider.name, length: text.length });
    const outcome = await provider.translate(text);
    if (outcome.ok) {
      return { success: true, translatedText: outcome.translatedText, serviceUsed: provider.name };
    }
    failures.push({ service: provider.name, reason: outcome.reason, detail: outcome.detail });
  }

  logEvent('error', 'translation_all_providers_failed', { failures });
  return { success: false, failures };
}
