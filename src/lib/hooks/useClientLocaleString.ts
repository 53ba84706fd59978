'use client';

import { useEffect, useMemo, useState } from 'react';

const parseDate = (value: string): Date | null => {
  const candidate = new Date(value);
  return Number.isNaN(candidate.getTime()) ? null : candidate;
};

const serializeOptions = (options?: Intl.DateTimeFormatOptions): string =>
  options ? JSON.stringify(options, Object.keys(options).sort()) : '';

/**
 * Returns a locale-aware date string that only hydrates on the client.
 * Server render falls back to ISO to avoid hydration mismatches.
 */
export function useClientLocaleString(value: string, options?: Intl.DateTimeFormatOptions, fallback = ''): string {
  const [formatted, setFormatted] = useState(() => parseDate(value)?.toISOString() ?? fallback);

  const optionsKey = serializeOptions(options);
  const stableOptions = useMemo(() => options, [optionsKey]);

  useEffect(() => {
    const date = parseDate(value);
    if (!date) {
      setFormatted(fallback);
      return;
    }

    try {
      setFormatted(new Intl.DateTimeFormat(undefined, stableOptions).format(date));
    } catch (error) {
      console.warn('Failed to format date with locale options, falling back to ISO.', error);
      setFormatted(date.toISOString());
    }
  }, [value, fallback, stableOptions]);

  return formatted;
}
