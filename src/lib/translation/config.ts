export const SOURCE_LANGUAGE = 'en';
export const TARGET_LANGUAGE = 'as';

const DEFAULT_MYMEMORY_API_URL = 'https://api.mymemory.translated.net/get';
const DEFAULT_LIBRETRANSLATE_API_URL = 'https://libretranslate.com/translate';
const DEFAULT_TIMEOUT_MS = 10_000;

export interface ProviderEndpointConfig {
  myMemoryUrl: string;
  libreTranslateUrl: string;
  libreTranslateApiKey: string | null;
  timeoutMs: number;
}

function parseTimeout(value: string | undefined): number {
  if (!value) {
    return DEFAULT_TIMEOUT_MS;
  }
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    return DEFAULT_TIMEOUT_MS;
  }
  return parsed;
}

export function resolveProviderConfig(env: Partial<NodeJS.ProcessEnv> = process.env): ProviderEndpointConfig {
  return {
    myMemoryUrl: env.MYMEMORY_API_URL?.trim() || DEFAULT_MYMEMORY_API_URL,
    libreTranslateUrl: env.LIBRETRANSLATE_API_URL?.trim() || DEFAULT_LIBRETRANSLATE_API_URL,
    libreTranslateApiKey: env.LIBRETRANSLATE_API_KEY?.trim() || null,
    timeoutMs: parseTimeout(env.TRANSLATION_TIMEOUT_MS?.trim()),
  };
}

export { DEFAULT_TIMEOUT_MS };
