import { isRecord } from '@/lib/utils/guards';

export const TRANSLATION_SERVICES = ['MyMemory', 'LibreTranslate'] as const;

export type TranslationServiceName = (typeof TRANSLATION_SERVICES)[number];

export function isTranslationServiceName(value: unknown): value is TranslationServiceName {
  return TRANSLATION_SERVICES.some((service) => service === value);
}

export type ProviderFailureReason =
  | 'timeout'
  | 'connection'
  | 'http-status'
  | 'malformed-response'
  | 'service-error'
  | 'empty-translation'
  | 'unexpected';

export type ProviderOutcome =
  | { ok: true; translatedText: string }
  | { ok: false; reason: ProviderFailureReason; detail: string };

export interface TranslationProvider {
  readonly name: TranslationServiceName;
  translate(text: string): Promise<ProviderOutcome>;
}

export interface ProviderFailure {
  service: TranslationServiceName;
  reason: ProviderFailureReason;
  detail: string;
}

export type TranslationOutcome =
  | { success: true; translatedText: string; serviceUsed: TranslationServiceName }
  | { success: false; failures: ProviderFailure[] };

export interface TranslationRecord {
  id: string;
  userId: string | null;
  originalText: string;
  translatedText: string;
  serviceUsed: TranslationServiceName;
  createdAt: string;
}

export const isTranslationRecord = (value: unknown): value is TranslationRecord =>
  isRecord(value) &&
  typeof value.id === 'string' &&
  (value.userId === null || typeof value.userId === 'string') &&
  typeof value.originalText === 'string' &&
  typeof value.translatedText === 'string' &&
  isTranslationServiceName(value.serviceUsed) &&
  typeof value.createdAt === 'string';

// Type alias: Convex function arguments must be assignable to Record<string, Value>.
export type CreateTranslationRecordInput = {
  userId: string;
  originalText: string;
  translatedText: string;
  serviceUsed: TranslationServiceName;
};

export interface TranslateSuccessBody {
  success: true;
  translated_text: string;
  original_text: string;
  service: TranslationServiceName;
}

export interface TranslateErrorBody {
  success: false;
  error: string;
}

export type TranslateResponseBody = TranslateSuccessBody | TranslateErrorBody;
