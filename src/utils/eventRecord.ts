import { RawEventField, RawEventRecord } from '../types/calendar';

export const RAW_EVENT_FIELDS: readonly RawEventField[] = [
  'date',
  'time',
  'currency',
  'impact',
  'event',
  'actual',
  'forecast',
  'previous',
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Boundary for rows coming from CSV, the feed or the DB: keep known string fields, everything else becomes ''.
 */
export function toRawEventRecord(value: unknown): Required<RawEventRecord> {
  const record: Required<RawEventRecord> = {
    date: '',
    time: '',
    currency: '',
    impact: '',
    event: '',
    actual: '',
    forecast: '',
    previous: '',
  };
  if (!isRecord(value)) return record;
  for (const field of RAW_EVENT_FIELDS) {
    const v = value[field];
    if (typeof v === 'string') record[field] = v;
  }
  return record;
}

export function fieldOf(record: RawEventRecord, field: RawEventField): string {
  return record[field] ?? '';
}
