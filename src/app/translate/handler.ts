import { NextResponse, type NextRequest } from 'next/server';
import type { AuthenticatedUser } from '@/lib/auth/identity';
import { describeError, logEvent } from '@/lib/logging/logger';
import { TranslationConnectionError, TranslationTimeoutError } from '@/lib/translation/errors';
import { recordIfAuthenticated } from '@/lib/translation/historyRecorder';
import type { TranslationRecordRepository } from '@/lib/translation/repository';
import type { TranslateErrorBody, TranslateSuccessBody, TranslationOutcome } from '@/lib/translation/types';

export interface TranslationAppContext {
  translate(text: string): Promise<TranslationOutcome>;
  repository: TranslationRecordRepository;
  resolveUser(request: NextRequest): AuthenticatedUser | null;
}

export const EMPTY_INPUT_MESSAGE = 'Please enter some text to translate';
export const SERVICES_UNAVAILABLE_MESSAGE = 'Translation services are currently unavailable. Please try again later.';
export const TIMEOUT_MESSAGE = 'Translation request timed out. Please try again.';
export const CONNECTION_MESSAGE = 'Unable to connect to translation service. Please check your internet connection.';
export const UNEXPECTED_MESSAGE = 'An unexpected error occurred. Please try again.';

function errorResponse(message: string, status: number) {
  return NextResponse.json<TranslateErrorBody>({ success: false, error: message }, { status });
}

async function readText(request: NextRequest): Promise<string> {
  let payload: unknown;
  try {
    payload = await request.json();
  } catch {
    return '';
  }
  if (!payload || typeof payload !== 'object' || !('text' in payload)) {
    return '';
  }
  return typeof payload.text === 'string' ? payload.text.trim() : '';
}

export function createTranslateHandler(context: TranslationAppContext) {
  return async function handleTranslate(request: NextRequest) {
    const text = await readText(request);
    if (!text) {
      return errorResponse(EMPTY_INPUT_MESSAGE, 400);
    }

    try {
      const outcome = await context.translate(text);
      if (!outcome.success) {
        return errorResponse(SERVICES_UNAVAILABLE_MESSAGE, 503);
      }

      await recordIfAuthenticated(
        context.repository,
        context.resolveUser(request),
        text,
        outcome.translatedText,
        outcome.serviceUsed,
      );

      return NextResponse.json<TranslateSuccessBody>({
        success: true,
        translated_text: outcome.translatedText,
        original_text: text,
        service: outcome.serviceUsed,
      });
    } catch (error) {
      if (error instanceof TranslationTimeoutError) {
        return errorResponse(TIMEOUT_MESSAGE, 504);
      }
      if (error instanceof TranslationConnectionError) {
        return errorResponse(CONNECTION_MESSAGE, 503);
      }
      logEvent('error', 'translation_unexpected_error', { error: describeError(error) });
      return errorResponse(UNEXPECTED_MESSAGE, 500);
    }
  };
}
