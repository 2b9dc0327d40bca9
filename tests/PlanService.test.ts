/**
 * Tests for PlanService (date filtering, daily and weekly plans).
 */
import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { withRules } from '../src/config/strategy';
import { DailyPlanResult, EventSource, PlanService } from '../src/services/PlanService';
import type { RawEventRecord } from '../src/types/calendar';

const RECORDS: RawEventRecord[] = [
  { date: '01/07/2025', time: '8:30am', currency: 'USD', impact: 'High', event: 'Non-Farm Payrolls' },
  { date: '1/7/2025', time: '2:00pm', currency: 'EUR', impact: 'Low', event: 'ECB Speech' },
  { date: '02/07/2025', time: '2:00pm', currency: 'USD', impact: 'High', event: 'FOMC Statement' },
  { date: '07/01/2025', time: '8:30am', currency: 'USD', impact: 'High', event: 'January CPI' },
  { date: 'empty', time: '9:00am', currency: 'USD', impact: 'High', event: 'Orphan Row' },
];

function sourceOf(records: RawEventRecord[]): EventSource {
  return { getEvents: () => records };
}

function planOf(result: DailyPlanResult): string {
  return result.status === 'open' ? result.analysis.plan : result.status;
}

describe('PlanService.getEventsForDate', () => {
  it('matches day-first dates and drops unparsable ones', () => {
    const service = new PlanService(sourceOf(RECORDS));
    const names = service.getEventsForDate('2025-07-01').map((r) => r.event);
    assert.deepEqual(names, ['Non-Farm Payrolls', 'ECB Speech']);
    assert.deepEqual(
      service.getEventsForDate('2025-01-07').map((r) => r.event),
      ['January CPI']
    );
  });
});

describe('PlanService.getDailyPlan', () => {
  const service = new PlanService(sourceOf(RECORDS));

  it('analyzes the events of the day', () => {
    const result = service.getDailyPlan('2025-07-01');
    assert.equal(result.status, 'open');
    if (result.status !== 'open') return;
    assert.equal(result.eventCount, 2);
    assert.equal(result.analysis.plan, 'News Day Plan');
    assert.deepEqual(result.analysis.morning.map((e) => e.name), ['Non-Farm Payrolls']);
    assert.deepEqual(result.analysis.afternoon.map((e) => e.name), ['ECB Speech']);
  });

  it('returns the standard plan when the day has no events', () => {
    const result = service.getDailyPlan('2025-07-03');
    assert.equal(result.status, 'open');
    if (result.status !== 'open') return;
    assert.equal(result.eventCount, 0);
    assert.equal(result.analysis.plan, 'Standard Day Plan');
    assert.equal(result.analysis.reason, 'No economic events found.');
  });

  it('reports weekends as closed before looking at data', () => {
    assert.deepEqual(service.getDailyPlan('2025-07-05'), { status: 'closed', date: '2025-07-05' });
    assert.deepEqual(new PlanService(sourceOf([])).getDailyPlan('2025-07-06'), {
      status: 'closed',
      date: '2025-07-06',
    });
  });

  it('reports an empty store as no-data', () => {
    assert.deepEqual(new PlanService(sourceOf([])).getDailyPlan('2025-07-01'), {
      status: 'no-data',
      date: '2025-07-01',
    });
  });

  it('applies the rules it was built with', () => {
    const eur = new PlanService(sourceOf(RECORDS), withRules({ watchedCurrency: 'EUR' }));
    const result = eur.getDailyPlan('2025-07-01');
    assert.equal(result.status, 'open');
    if (result.status !== 'open') return;
    assert.equal(result.analysis.plan, 'Standard Day Plan');
    assert.equal(result.analysis.reason, 'No high-impact EUR news found.');
  });
});

describe('PlanService.getWeeklyPlan', () => {
  it('plans Monday to Friday of the week', () => {
    const week = new PlanService(sourceOf(RECORDS)).getWeeklyPlan('2025-07-02');
    assert.deepEqual(
      week.map((d) => d.date),
      ['2025-06-30', '2025-07-01', '2025-07-02', '2025-07-03', '2025-07-04']
    );
    assert.deepEqual(week.map(planOf), [
      'Standard Day Plan',
      'News Day Plan',
      'No Trade Day',
      'Standard Day Plan',
      'Standard Day Plan',
    ]);
  });
});
