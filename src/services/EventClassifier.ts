/**
 * EventClassifier - derives the trading plan for one day from its calendar events.
 *
 * Pure and total: malformed fields fall back to defaults (no time → All Day bucket,
 * unknown impact → Low, missing name/currency → ''), nothing here throws.
 * Callers pass only the events of the target day (see PlanService.getEventsForDate).
 */

import { DEFAULT_STRATEGY_RULES, StrategyRules } from '../config/strategy';
import {
  CalendarDate,
  DayAnalysis,
  DisplayImpact,
  NormalizedEvent,
  RawEventRecord,
  TradingPlan,
} from '../types/calendar';
import { fieldOf } from '../utils/eventRecord';
import { parseImpact } from '../utils/impact';
import { formatTime12, isBefore, parseTime } from '../utils/timeOfDay';

export const STANDARD_DAY_PLAN: TradingPlan = 'Standard Day Plan';
export const NEWS_DAY_PLAN: TradingPlan = 'News Day Plan';
export const NO_TRADE_DAY: TradingPlan = 'No Trade Day';

/** Case-insensitive substring match of any keyword in the event name */
export function matchesAnyKeyword(name: string, keywords: readonly string[]): boolean {
  const lower = name.toLowerCase();
  return keywords.some((keyword) => lower.includes(keyword.toLowerCase()));
}

export function normalizeEvent(raw: RawEventRecord, rules: StrategyRules = DEFAULT_STRATEGY_RULES): NormalizedEvent {
  const rawTime = parseTime(raw.time);
  const name = fieldOf(raw, 'event');
  const currency = fieldOf(raw, 'currency').trim().toUpperCase();
  const parsedImpact = parseImpact(raw.impact);
  const isForcedHigh = matchesAnyKeyword(name, rules.forcedHighImpactKeywords);

  let impact: DisplayImpact = parsedImpact;
  if (isForcedHigh && parsedImpact !== 'High') impact = 'High (Forced)';

  return {
    name,
    currency,
    impact,
    time: rawTime ? formatTime12(rawTime) : 'All Day',
    rawTime,
  };
}

function isHighImpact(event: NormalizedEvent): boolean {
  return event.impact === 'High' || event.impact === 'High (Forced)';
}

export function analyzeDayEvents(
  targetDate: CalendarDate,
  events: readonly RawEventRecord[],
  rules: StrategyRules = DEFAULT_STRATEGY_RULES
): DayAnalysis {
  const currency = rules.watchedCurrency;
  const result: DayAnalysis = {
    date: targetDate,
    plan: STANDARD_DAY_PLAN,
    reason: `No high-impact ${currency} news found.`,
    morning: [],
    afternoon: [],
    allDay: [],
  };
  let noTradeEvent: string | null = null;
  let sawHighImpactEvent = false;

  for (const raw of events) {
    const event = normalizeEvent(raw, rules);

    if (event.rawTime === null) result.allDay.push(event);
    else if (isBefore(event.rawTime, rules.morningCutoff)) result.morning.push(event);
    else result.afternoon.push(event);

    if (event.currency !== currency) continue;

    const isNoTrade =
      event.rawTime !== null &&
      !isBefore(event.rawTime, rules.afternoonNoTradeStart) &&
      matchesAnyKeyword(event.name, rules.noTradeKeywords);

    if (isNoTrade) {
      if (noTradeEvent === null) noTradeEvent = event.name;
      // Later events never reach the buckets in this mode
      if (rules.truncateOnNoTrade) break;
    } else if (isHighImpact(event) && event.rawTime !== null) {
      sawHighImpactEvent = true;
    }
  }

  if (noTradeEvent !== null) {
    result.plan = NO_TRADE_DAY;
    result.reason = `Critical afternoon ${currency} event '${noTradeEvent}'.`;
  } else if (sawHighImpactEvent) {
    result.plan = NEWS_DAY_PLAN;
    result.reason = `High-impact ${currency} news detected. Switch to non-bias scalping.`;
  }
  return result;
}
