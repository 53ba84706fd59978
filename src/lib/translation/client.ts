'use client';

import { isRecord } from '@/lib/utils/guards';
import { isTranslationServiceName, type TranslateResponseBody } from './types';

export const GENERIC_CLIENT_ERROR = 'An unexpected error occurred. Please try again.';

function toResponseBody(body: unknown): TranslateResponseBody {
  if (!isRecord(body)) {
    return { success: false, error: GENERIC_CLIENT_ERROR };
  }
  if (
    body.success === true &&
    typeof body.translated_text === 'string' &&
    typeof body.original_text === 'string' &&
    isTranslationServiceName(body.service)
  ) {
    return {
      success: true,
      translated_text: body.translated_text,
      original_text: body.original_text,
      service: body.service,
    };
  }
  return {
    success: false,
    error: typeof body.error === 'string' && body.error ? body.error : GENERIC_CLIENT_ERROR,
  };
}

/**
 * Posts text to `/translate`. Error statuses still carry a JSON body with a
 * user-facing message, so the parsed body is returned whatever the status.
 */
export async function requestTranslation(text: string): Promise<TranslateResponseBody> {
  const response = await fetch('/translate', {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify({ text }),
  });

  let body: unknown;
  try {
    body = await response.json();
  } catch (error) {
    console.error('Translation response was not JSON', { status: response.status, error });
    return { success: false, error: GENERIC_CLIENT_ERROR };
  }
  return toResponseBody(body);
}

