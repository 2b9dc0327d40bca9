import { DEFAULT_STRATEGY_RULES, StrategyRules } from '../config/strategy';
import { CalendarDate, DayAnalysis, RawEventRecord } from '../types/calendar';
import { getTradingWeek, isWeekend, parseDate } from '../utils/calendarDate';
import { analyzeDayEvents, STANDARD_DAY_PLAN } from './EventClassifier';

/** Anything that can hand over the stored calendar rows (the SQLite store, a test fake). */
export interface EventSource {
  getEvents(): RawEventRecord[];
}

export type DailyPlanResult =
  | { status: 'closed'; date: CalendarDate }
  | { status: 'no-data'; date: CalendarDate }
  | { status: 'open'; date: CalendarDate; eventCount: number; analysis: DayAnalysis };

export class PlanService {
  constructor(
    private readonly source: EventSource,
    private readonly rules: StrategyRules = DEFAULT_STRATEGY_RULES
  ) {}

  /**
   * Rows whose DD/MM/YYYY date equals the target. Rows with unparsable dates are dropped here.
   */
  getEventsForDate(date: CalendarDate, records: RawEventRecord[] = this.source.getEvents()): RawEventRecord[] {
    return records.filter((row) => parseDate(row.date) === date);
  }

  getDailyPlan(date: CalendarDate): DailyPlanResult {
    return this.planFor(date, this.source.getEvents());
  }

  /** Daily plans Monday–Friday of the date's trading week */
  getWeeklyPlan(date: CalendarDate): DailyPlanResult[] {
    const records = this.source.getEvents();
    return getTradingWeek(date).map((day) => this.planFor(day, records));
  }

  private planFor(date: CalendarDate, records: RawEventRecord[]): DailyPlanResult {
    if (isWeekend(date)) return { status: 'closed', date };
    if (records.length === 0) return { status: 'no-data', date };

    const events = this.getEventsForDate(date, records);
    if (events.length === 0) {
      return {
        status: 'open',
        date,
        eventCount: 0,
        analysis: {
          date,
          plan: STANDARD_DAY_PLAN,
          reason: 'No economic events found.',
          morning: [],
          afternoon: [],
          allDay: [],
        },
      };
    }

    const analysis = analyzeDayEvents(date, events, this.rules);
    if (process.env.LOG_LEVEL === 'debug') {
      console.log(`[PlanService] ${date}: ${events.length} events → ${analysis.plan}`);
    }
    return { status: 'open', date, eventCount: events.length, analysis };
  }
}
