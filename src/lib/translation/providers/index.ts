import type { TranslationProvider } from '../types';
import { createLibreTranslateProvider } from './libreTranslate';
import { createMyMemoryProvider } from './myMemory';
import type { ProviderClientOptions } from './shared';

/** MyMemory is always tried first; LibreTranslate only after it fails. */
export interface ProviderChain {
  primary: TranslationProvider;
  secondary: TranslationProvider;
}

export const createProviderChain = (options: ProviderClientOptions = {}): ProviderChain => ({
  primary: createMyMemoryProvider(options),
  secondary: createLibreTranslateProvider(options),
});

export { createLibreTranslateProvider, createMyMemoryProvider };
export type { ProviderClientOptions };
