import { TimeOfDay } from '../types/calendar';

/**
 * Rules the classifier applies to a day's events.
 * Keyword lists are matched as case-insensitive substrings of the event name.
 */
export interface StrategyRules {
  /** Events strictly before this time are "morning" */
  readonly morningCutoff: TimeOfDay;
  /** No-trade keywords only end the day at or after this time */
  readonly afternoonNoTradeStart: TimeOfDay;
  readonly noTradeKeywords: readonly string[];
  readonly forcedHighImpactKeywords: readonly string[];
  /** Only events in this currency can change the plan */
  readonly watchedCurrency: string;
  /**
   * When true, a no-trade match returns at once and later events are left out of the buckets.
   * When false, every event is bucketed and the first no-trade match still decides the plan.
   */
  readonly truncateOnNoTrade: boolean;
}

export const DEFAULT_STRATEGY_RULES: StrategyRules = Object.freeze({
  morningCutoff: Object.freeze({ hours: 12, minutes: 0 }),
  afternoonNoTradeStart: Object.freeze({ hours: 13, minutes: 55 }),
  noTradeKeywords: Object.freeze([
    'FOMC Statement',
    'FOMC Press Conference',
    'Interest Rate Decision',
    'Monetary Policy Report',
  ]),
  forcedHighImpactKeywords: Object.freeze([
    'Powell Speaks',
    'Fed Chair',
    'Non-Farm',
    'NFP',
    'CPI',
    'Consumer Price Index',
    'PPI',
    'Producer Price Index',
    'GDP',
  ]),
  watchedCurrency: 'USD',
  truncateOnNoTrade: true,
});

export function withRules(overrides: Partial<StrategyRules>): StrategyRules {
  return Object.freeze({ ...DEFAULT_STRATEGY_RULES, ...overrides });
}
