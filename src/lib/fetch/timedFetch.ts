import { TranslationConnectionError, TranslationTimeoutError } from '@/lib/translation/errors';

export interface TimedFetchOptions extends RequestInit {
  timeoutMs: number;
  fetchImpl?: typeof fetch;
}

export interface TimedResponse {
  ok: boolean;
  status: number;
  body: string;
}

/**
 * Performs a single request and reads its body, both bounded by `timeoutMs`.
 * An aborted request surfaces as {@link TranslationTimeoutError}; a network
 * level failure (DNS, refused connection, reset socket) as
 * {@link TranslationConnectionError}. HTTP error statuses are returned as-is.
 */
export async function fetchWithTimeout(input: string, options: TimedFetchOptions): Promise<TimedResponse> {
  const { timeoutMs, fetchImpl = fetch, ...init } = options;
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetchImpl(input, {
      cache: 'no-store',
      ...init,
      signal: controller.signal,
    });
    const body = await response.text();
    return { ok: response.ok, status: response.status, body };
  } catch (error) {
    if (controller.signal.aborted) {
      throw new TranslationTimeoutError(`Request timed out after ${timeoutMs}ms`, { cause: error });
    }
    if (error instanceof TypeError) {
      throw new TranslationConnectionError(`Connection failed: ${error.message}`, { cause: error });
    }
    throw error;
  } finally {
    clearTimeout(timeout);
  }
}
