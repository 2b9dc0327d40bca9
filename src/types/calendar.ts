/**
 * Shared calendar types: raw rows from the scraper/feed/store and the
 * normalized events produced by the classifier.
 */

/** Row as it arrives from the scraped CSV, the feed or the store. Every field is untrusted text. */
export interface RawEventRecord {
  date?: string;
  time?: string;
  currency?: string;
  impact?: string;
  event?: string;
  actual?: string;
  forecast?: string;
  previous?: string;
}

export type RawEventField = keyof RawEventRecord;

export type ImpactLevel = 'High' | 'Medium' | 'Low';

export type DisplayImpact = ImpactLevel | 'High (Forced)';

/** Time of day on a 24-hour clock, already in the display timezone. */
export interface TimeOfDay {
  hours: number;
  minutes: number;
}

/** ISO calendar date, YYYY-MM-DD. */
export type CalendarDate = string;

export interface NormalizedEvent {
  name: string;
  currency: string;
  impact: DisplayImpact;
  /** "HH:MM AM/PM" or "All Day" */
  time: string;
  rawTime: TimeOfDay | null;
}

export type TradingPlan = 'Standard Day Plan' | 'News Day Plan' | 'No Trade Day';

export interface DayAnalysis {
  date: CalendarDate;
  plan: TradingPlan;
  reason: string;
  morning: NormalizedEvent[];
  afternoon: NormalizedEvent[];
  allDay: NormalizedEvent[];
}
