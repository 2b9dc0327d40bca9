import { InlineKeyboard } from 'grammy';
import { CalendarDate, DisplayImpact, NormalizedEvent, TradingPlan } from '../types/calendar';
import type { DailyPlanResult } from '../services/PlanService';
import { addCalendarDays, formatDisplayDate } from './calendarDate';
import { formatDuration, MarketStatus } from './marketClock';
import type { WeeklyProfile } from './weeklyProfile';

const PLAN_ICONS: Record<TradingPlan, string> = {
  'No Trade Day': '⛔',
  'News Day Plan': '⚡',
  'Standard Day Plan': '✅',
};

const IMPACT_ICONS: Record<DisplayImpact, string> = {
  High: '🔴',
  'High (Forced)': '🔴',
  Medium: '🟠',
  Low: '🟡',
};

export function formatEventLine(event: NormalizedEvent): string {
  const forced = event.impact === 'High (Forced)' ? ' (forced)' : '';
  return `${IMPACT_ICONS[event.impact]} ${event.time} [${event.currency}] ${event.name}${forced}`;
}

function formatSection(title: string, events: NormalizedEvent[]): string {
  const lines = events.length > 0 ? events.map(formatEventLine) : ['—'];
  return `${title}\n${lines.join('\n')}`;
}

/**
 * Text of the daily plan, same layout for /plan, the navigation buttons and the 08:00 broadcast.
 */
export function buildDailyPlanMessage(result: DailyPlanResult): string {
  const day = formatDisplayDate(result.date);
  if (result.status === 'closed') {
    return `📴 MARKET CLOSED: ${day}`;
  }
  if (result.status === 'no-data') {
    return `📭 No calendar data stored yet (${day}).\n\nUse /import or /refresh to load this week's events.`;
  }

  const { analysis } = result;
  return [
    `${PLAN_ICONS[analysis.plan]} ${analysis.plan.toUpperCase()}: ${day}`,
    analysis.reason,
    formatSection('🌅 Morning', analysis.morning),
    formatSection('🌇 Afternoon', analysis.afternoon),
    formatSection('📆 All Day', analysis.allDay),
  ].join('\n\n');
}

export function formatWeekLine(result: DailyPlanResult): string {
  const day = formatDisplayDate(result.date);
  if (result.status === 'closed') return `${day}: 📴 Market closed`;
  if (result.status === 'no-data') return `${day}: 📭 No data`;
  const plan = result.analysis.plan;
  const count = result.eventCount === 1 ? '1 event' : `${result.eventCount} events`;
  return `${day}: ${PLAN_ICONS[plan]} ${plan} (${count})`;
}

export function buildWeeklyPlanMessage(days: DailyPlanResult[]): string {
  if (days.length === 0) return '📅 No trading days in range.';
  return `📅 Week of ${formatDisplayDate(days[0].date)}\n\n${days.map(formatWeekLine).join('\n')}`;
}

export function buildMarketStatusMessage(status: MarketStatus, timezone: string): string {
  const state = status.state === 'open' ? '🟢 Market open' : '🔴 Market closed';
  return `${state} (${status.marketTime} ${timezone})\n⏳ Next open in ${formatDuration(status.msUntilOpen)}`;
}

export function buildWeeklyProfileMessage(profiles: WeeklyProfile[]): string {
  return profiles
    .map(
      (p) =>
        `🧭 ${p.name} (probability: ${p.probability})\n` +
        `Expectation: ${p.expectation}\n` +
        `Action: ${p.action}\n` +
        `Invalidation: ${p.invalidation}`
    )
    .join('\n\n');
}

/** Callback data: plan_day_<YYYY-MM-DD> / plan_week_<YYYY-MM-DD> */
export const PLAN_DAY_CALLBACK = /^plan_day_(\d{4}-\d{2}-\d{2})$/;
export const PLAN_WEEK_CALLBACK = /^plan_week_(\d{4}-\d{2}-\d{2})$/;

export function buildPlanKeyboard(date: CalendarDate): InlineKeyboard {
  return new InlineKeyboard()
    .text('◀️ Prev', `plan_day_${addCalendarDays(date, -1)}`)
    .text('Next ▶️', `plan_day_${addCalendarDays(date, 1)}`)
    .row()
    .text('📅 Week', `plan_week_${date}`);
}

export function buildWeekKeyboard(date: CalendarDate): InlineKeyboard {
  return new InlineKeyboard()
    .text('◀️ Prev week', `plan_week_${addCalendarDays(date, -7)}`)
    .text('Next week ▶️', `plan_week_${addCalendarDays(date, 7)}`)
    .row()
    .text('📊 Day', `plan_day_${date}`);
}
