import { ImpactLevel } from '../types/calendar';

/**
 * Map free impact text ("High Impact Expected", "medium", …) to a level.
 * Checked in order high → medium → low; anything else is Low.
 */
export function parseImpact(value: unknown): ImpactLevel {
  if (typeof value !== 'string' || !value) return 'Low';
  const lower = value.toLowerCase();
  if (lower.includes('high')) return 'High';
  if (lower.includes('medium')) return 'Medium';
  if (lower.includes('low')) return 'Low';
  return 'Low';
}
