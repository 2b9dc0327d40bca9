import { addDays, format, getISODay } from 'date-fns';
import { formatInTimeZone, fromZonedTime, toZonedTime } from 'date-fns-tz';
import { CalendarDate } from '../types/calendar';

export const MARKET_TIMEZONE = 'America/New_York';
/** Regular session, minutes after midnight ET */
const SESSION_OPEN_MINUTES = 9 * 60 + 30;
const SESSION_CLOSE_MINUTES = 16 * 60;

export interface MarketStatus {
  state: 'open' | 'closed';
  /** Wall clock in the market timezone, HH:mm */
  marketTime: string;
  nextOpen: Date;
  msUntilOpen: number;
}

/** Date whose local fields show the wall-clock time in the market timezone */
export function getCurrentMarketTime(now: Date = new Date(), timezone: string = MARKET_TIMEZONE): Date {
  return toZonedTime(now, timezone);
}

export function getMarketDate(now: Date = new Date(), timezone: string = MARKET_TIMEZONE): CalendarDate {
  return formatInTimeZone(now, timezone, 'yyyy-MM-dd');
}

function isTradingDay(zoned: Date): boolean {
  return getISODay(zoned) <= 5;
}

export function getMarketStatus(now: Date = new Date(), timezone: string = MARKET_TIMEZONE): MarketStatus {
  const zoned = getCurrentMarketTime(now, timezone);
  const minutes = zoned.getHours() * 60 + zoned.getMinutes();
  const tradingDay = isTradingDay(zoned);
  const open = tradingDay && minutes >= SESSION_OPEN_MINUTES && minutes < SESSION_CLOSE_MINUTES;

  // Next 09:30 strictly after now
  let candidate = tradingDay && minutes < SESSION_OPEN_MINUTES ? zoned : addDays(zoned, 1);
  while (!isTradingDay(candidate)) candidate = addDays(candidate, 1);
  const nextOpen = fromZonedTime(`${format(candidate, 'yyyy-MM-dd')} 09:30:00`, timezone);

  return {
    state: open ? 'open' : 'closed',
    marketTime: format(zoned, 'HH:mm'),
    nextOpen,
    msUntilOpen: nextOpen.getTime() - now.getTime(),
  };
}

/** "2d 16h 30m" */
export function formatDuration(ms: number): string {
  const totalMinutes = Math.max(0, Math.floor(ms / 60000));
  const days = Math.floor(totalMinutes / (24 * 60));
  const hours = Math.floor((totalMinutes % (24 * 60)) / 60);
  const minutes = totalMinutes % 60;
  const parts: string[] = [];
  if (days > 0) parts.push(`${days}d`);
  if (days > 0 || hours > 0) parts.push(`${hours}h`);
  parts.push(`${minutes}m`);
  return parts.join(' ');
}
