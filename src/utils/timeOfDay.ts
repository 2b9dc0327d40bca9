import { TimeOfDay } from '../types/calendar';

// Tried in order: "7:01pm", "7:01 pm", "19:01". Whole string must match.
const TWELVE_HOUR_COMPACT = /^(1[0-2]|0[1-9]|[1-9]):([0-5]\d|\d)(am|pm)$/i;
const TWELVE_HOUR_SPACED = /^(1[0-2]|0[1-9]|[1-9]):([0-5]\d|\d)\s+(am|pm)$/i;
const TWENTY_FOUR_HOUR = /^(2[0-3]|[01]\d|\d):([0-5]\d|\d)$/;

function fromTwelveHour(match: RegExpMatchArray): TimeOfDay {
  let hours = parseInt(match[1], 10);
  const minutes = parseInt(match[2], 10);
  const ampm = match[3].toLowerCase();
  if (ampm === 'pm' && hours !== 12) hours += 12;
  if (ampm === 'am' && hours === 12) hours = 0;
  return { hours, minutes };
}

/**
 * Parse a free-form calendar time ("8:30am", "8:30 am", "13:30").
 * Returns null for empty input, placeholders like "All Day" / "Tentative", or anything else unparsable.
 */
export function parseTime(value: unknown): TimeOfDay | null {
  if (typeof value !== 'string') return null;
  const t = value.trim();
  if (!t) return null;

  const compact = t.match(TWELVE_HOUR_COMPACT);
  if (compact) return fromTwelveHour(compact);

  const spaced = t.match(TWELVE_HOUR_SPACED);
  if (spaced) return fromTwelveHour(spaced);

  const h24 = t.match(TWENTY_FOUR_HOUR);
  if (h24) return { hours: parseInt(h24[1], 10), minutes: parseInt(h24[2], 10) };

  return null;
}

export function toMinutes(time: TimeOfDay): number {
  return time.hours * 60 + time.minutes;
}

export function isBefore(a: TimeOfDay, b: TimeOfDay): boolean {
  return toMinutes(a) < toMinutes(b);
}

/** "08:30 AM" */
export function formatTime12(time: TimeOfDay): string {
  const hour12 = time.hours % 12 === 0 ? 12 : time.hours % 12;
  const meridiem = time.hours < 12 ? 'AM' : 'PM';
  return `${hour12.toString().padStart(2, '0')}:${time.minutes.toString().padStart(2, '0')} ${meridiem}`;
}
