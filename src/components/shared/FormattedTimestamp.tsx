'use client';

import { useClientLocaleString } from '@/lib/hooks/useClientLocaleString';

interface FormattedTimestampProps {
  value: string;
  options?: Intl.DateTimeFormatOptions;
  placeholder?: string;
  className?: string;
}

/** Renders an ISO timestamp as a `<time>` element, localised once mounted in the browser. */
export function FormattedTimestamp({ value, options, placeholder = 'Unknown time', className }: FormattedTimestampProps) {
  const display = useClientLocaleString(value, options, placeholder);

  return (
    <time dateTime={value} className={className}>
      {display}
    </time>
  );
}
