import { addDays, format, getISODay, parseISO, startOfISOWeek } from 'date-fns';
import { CalendarDate } from '../types/calendar';

/** Day-first, as written by the scraper: 01/07/2025 is 1 July. */
const DAY_FIRST_DATE = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/;

/**
 * Parse a DD/MM/YYYY date. Returns null for anything else, including impossible dates.
 */
export function parseDate(value: unknown): CalendarDate | null {
  if (typeof value !== 'string') return null;
  const match = value.trim().match(DAY_FIRST_DATE);
  if (!match) return null;
  const day = parseInt(match[1], 10);
  const month = parseInt(match[2], 10);
  const year = parseInt(match[3], 10);
  const d = new Date(year, month - 1, day);
  if (d.getFullYear() !== year || d.getMonth() !== month - 1 || d.getDate() !== day) return null;
  return format(d, 'yyyy-MM-dd');
}

export function toCalendarDate(date: Date): CalendarDate {
  return format(date, 'yyyy-MM-dd');
}

/** "Tue 01/07/2025" */
export function formatDisplayDate(date: CalendarDate): string {
  return format(parseISO(date), 'EEE dd/MM/yyyy');
}

/** "01/07/2025", the form users type into /plan */
export function formatDayFirst(date: CalendarDate): string {
  return format(parseISO(date), 'dd/MM/yyyy');
}

export function addCalendarDays(date: CalendarDate, days: number): CalendarDate {
  return toCalendarDate(addDays(parseISO(date), days));
}

/** 0 = Monday … 6 = Sunday */
export function weekdayIndex(date: CalendarDate): number {
  return getISODay(parseISO(date)) - 1;
}

export function isWeekend(date: CalendarDate): boolean {
  return weekdayIndex(date) >= 5;
}

/**
 * Monday to Friday of the date's week. On Saturday or Sunday this is the coming week.
 */
export function getTradingWeek(date: CalendarDate): CalendarDate[] {
  const d = parseISO(date);
  const monday = isWeekend(date) ? startOfISOWeek(addDays(d, 7)) : startOfISOWeek(d);
  return [0, 1, 2, 3, 4].map((i) => toCalendarDate(addDays(monday, i)));
}
