'use client';

import { useCallback, type FormEvent } from 'react';
import { MAX_INPUT_LENGTH, useTranslatorStore } from '@/modules/translator/store';

export function TranslatorPanel() {
  const inputText = useTranslatorStore((state) => state.inputText);
  const result = useTranslatorStore((state) => state.result);
  const error = useTranslatorStore((state) => state.error);
  const isTranslating = useTranslatorStore((state) => state.isTranslating);
  const actions = useTranslatorStore((state) => state.actions);

  const handleSubmit = useCallback(
    (event: FormEvent<HTMLFormElement>) => {
      event.preventDefault();
      void actions.translate();
    },
    [actions],
  );

  return (
    <section className="panel space-y-5" aria-labelledby="translator-heading">
      <header>
        <p className="text-xs font-semibold uppercase tracking-[0.3em] text-saffron-600">English → Assamese</p>
        <h2 id="translator-heading" className="mt-1 text-lg font-semibold text-ink-900">
          Translate text
        </h2>
      </header>

      <form className="space-y-3" onSubmit={handleSubmit}>
        <label htmlFor="translator-input" className="block text-sm font-medium text-ink-700">
          English text
        </label>
        <textarea
          id="translator-input"
          value={inputText}
          maxLength={MAX_INPUT_LENGTH}
          rows={6}
          placeholder="Type or paste English text"
          onChange={(event) => actions.setInputText(event.target.value)}
          className="w-full rounded-xl border border-ink-200 bg-paper-50 px-4 py-3 text-base text-ink-900 focus:border-leaf-500 focus:outline-none"
        />
        <div className="flex items-center justify-between gap-3">
          <span className="text-xs text-ink-500">
            {inputText.length} / {MAX_INPUT_LENGTH}
          </span>
          <div className="flex items-center gap-2">
            <button
              type="button"
              className="secondary-button"
              onClick={actions.reset}
              disabled={isTranslating || (!inputText && !result && !error)}
            >
              Clear
            </button>
            <button type="submit" className="cta-button" disabled={isTranslating}>
              {isTranslating ? 'Translating…' : 'Translate'}
            </button>
          </div>
        </div>
      </form>

      {error ? (
        <p role="alert" className="rounded-xl border border-red-300 bg-red-50 px-4 py-3 text-sm text-red-800">
          {error}
        </p>
      ) : null}

      {result ? (
        <figure className="rounded-xl border border-leaf-200 bg-leaf-50 px-4 py-4">
          <blockquote lang="as" className="text-xl text-ink-900" data-testid="translation-output">
            {result.translated_text}
          </blockquote>
          <figcaption className="mt-3 flex items-center gap-2 text-xs text-ink-500">
            <span className="service-badge">{result.service}</span>
            <span>Translated from “{result.original_text}”</span>
          </figcaption>
        </figure>
      ) : null}
    </section>
  );
}
