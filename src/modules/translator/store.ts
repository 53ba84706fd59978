'use client';

import { create } from 'zustand';
import { GENERIC_CLIENT_ERROR, requestTranslation } from '@/lib/translation/client';
import type { TranslateSuccessBody } from '@/lib/translation/types';

export const MAX_INPUT_LENGTH = 5000;
export const EMPTY_INPUT_ERROR = 'Please enter some text to translate';

export interface TranslatorState {
  inputText: string;
  result: TranslateSuccessBody | null;
  error?: string;
  isTranslating: boolean;
  actions: {
    setInputText: (value: string) => void;
    translate: () => Promise<void>;
    clearResult: () => void;
    reset: () => void;
  };
}

const initialState = {
  inputText: '',
  result: null,
  error: undefined,
  isTranslating: false,
} satisfies Omit<TranslatorState, 'actions'>;

export const useTranslatorStore = create<TranslatorState>((set, get) => ({
  ...initialState,
  actions: {
    setInputText: (value) => {
      set({ inputText: value.slice(0, MAX_INPUT_LENGTH) });
    },
    translate: async () => {
      const { inputText, isTranslating } = get();
      if (isTranslating) {
        return;
      }

      const text = inputText.trim();
      if (!text) {
        set({ error: EMPTY_INPUT_ERROR, result: null });
        return;
      }

      set({ isTranslating: true, error: undefined });
      try {
        const body = await requestTranslation(text);
        if (body.success) {
          set({ result: body, error: undefined });
        } else {
          set({ result: null, error: body.error });
        }
      } catch (error) {
        console.error('Translation request failed', error);
        set({ result: null, error: GENERIC_CLIENT_ERROR });
      } finally {
        set({ isTranslating: false });
      }
    },
    clearResult: () => {
      set({ result: null, error: undefined });
    },
    reset: () => {
      set({ ...initialState });
    },
  },
}));
