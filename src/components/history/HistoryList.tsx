import { FormattedTimestamp } from '@/components/shared/FormattedTimestamp';
import type { TranslationRecord } from '@/lib/translation/types';

interface HistoryListProps {
  records: TranslationRecord[];
}

const TIMESTAMP_OPTIONS: Intl.DateTimeFormatOptions = { dateStyle: 'medium', timeStyle: 'short' };

export function HistoryList({ records }: HistoryListProps) {
  if (records.length === 0) {
    return <p className="text-sm text-ink-500">No translations yet. Translations you make while signed in appear here.</p>;
  }

  return (
    <ol className="space-y-3" aria-label="Translation history">
      {records.map((record) => (
        <li key={record.id} className="panel">
          <p className="text-sm text-ink-600">{record.originalText}</p>
          <p lang="as" className="mt-2 text-lg text-ink-900">
            {record.translatedText}
          </p>
          <div className="mt-3 flex items-center gap-2 text-xs text-ink-500">
            <span className="service-badge">{record.serviceUsed}</span>
            <FormattedTimestamp value={record.createdAt} options={TIMESTAMP_OPTIONS} />
          </div>
        </li>
      ))}
    </ol>
  );
}
