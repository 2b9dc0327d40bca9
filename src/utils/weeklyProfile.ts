export type WeeklyBias = 'Bullish' | 'Bearish';

export interface WeeklyProfile {
  name: string;
  probability: 'High' | 'Medium' | 'Low' | 'N/A';
  expectation: string;
  action: string;
  invalidation: string;
}

const AWAITING_CLARITY: WeeklyProfile = {
  name: 'Awaiting Clarity',
  probability: 'N/A',
  expectation: 'Market has not yet revealed its intention.',
  action: 'Remain patient. Do not force a trade.',
  invalidation: 'N/A',
};

export function parseBias(value: string): WeeklyBias | null {
  const t = value.trim().toLowerCase();
  if (t === 'bullish') return 'Bullish';
  if (t === 'bearish') return 'Bearish';
  return null;
}

/**
 * Weekly profiles that fit the bias and what price has done so far this week.
 * dayOfWeek: 0 = Monday. Falls back to "Awaiting Clarity".
 */
export function getWeeklyProfileAnalysis(
  bias: WeeklyBias,
  observations: readonly string[],
  dayOfWeek: number
): WeeklyProfile[] {
  const profiles: WeeklyProfile[] = [];
  if (bias === 'Bullish' && observations.includes('Mon Low Run') && (dayOfWeek === 1 || dayOfWeek === 2)) {
    profiles.push({
      name: 'Classic Tuesday/Wednesday Low of the Week',
      probability: 'High',
      expectation: 'The low of the week may now be in. Expect expansion higher.',
      action: 'Look for 15m MSS + FVG for a long entry.',
      invalidation: 'Price breaks decisively below the new low.',
    });
  }
  if (profiles.length === 0) profiles.push({ ...AWAITING_CLARITY });
  return profiles;
}
