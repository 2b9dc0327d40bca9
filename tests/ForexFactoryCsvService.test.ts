/**
 * Tests for the weekly calendar export parser (UTC → US Eastern, scraper shape).
 */
import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { convertFeedDateTime, parseFeedCsv } from '../src/services/ForexFactoryCsvService';
import { PlanService } from '../src/services/PlanService';

const FEED = [
  'Title,Country,Date,Time,Impact,Forecast,Previous,URL',
  'Non-Farm Employment Change,USD,07-03-2025,12:30pm,High,110K,147K,https://example.test/a',
  'Bank Holiday,USD,07-04-2025,All Day,Holiday,,,https://example.test/b',
  'Fed Chair  Speaks,USD,07-03-2025,1:30am,High,,,https://example.test/c',
  ',USD,07-03-2025,1:30am,Low,,,',
  'Bad Date Row,USD,2025/07/03,1:30am,Low,,,',
].join('\n');

describe('convertFeedDateTime', () => {
  it('converts UTC times to Eastern and follows the date across midnight', () => {
    assert.deepEqual(convertFeedDateTime('07-03-2025', '12:30pm'), { date: '03/07/2025', time: '8:30am' });
    assert.deepEqual(convertFeedDateTime('07-03-2025', '1:30am'), { date: '02/07/2025', time: '9:30pm' });
  });

  it('uses standard time in winter', () => {
    assert.deepEqual(convertFeedDateTime('01-10-2025', '1:30pm'), { date: '10/01/2025', time: '8:30am' });
  });

  it('keeps special times and their date', () => {
    assert.deepEqual(convertFeedDateTime('7-4-2025', 'Tentative'), { date: '04/07/2025', time: 'Tentative' });
    assert.deepEqual(convertFeedDateTime('07-04-2025', ''), { date: '04/07/2025', time: '' });
  });

  it('rejects dates in other formats', () => {
    assert.equal(convertFeedDateTime('2025/07/03', '1:30am'), null);
  });
});

describe('parseFeedCsv', () => {
  it('maps rows to scraper-shaped records and skips unusable ones', () => {
    const records = parseFeedCsv(FEED);
    assert.deepEqual(records, [
      {
        date: '03/07/2025',
        time: '8:30am',
        currency: 'USD',
        impact: 'High',
        event: 'Non-Farm Employment Change',
        actual: '',
        forecast: '110K',
        previous: '147K',
      },
      {
        date: '04/07/2025',
        time: 'All Day',
        currency: 'USD',
        impact: 'Holiday',
        event: 'Bank Holiday',
        actual: '',
        forecast: '',
        previous: '',
      },
      {
        date: '02/07/2025',
        time: '9:30pm',
        currency: 'USD',
        impact: 'High',
        event: 'Fed Chair Speaks',
        actual: '',
        forecast: '',
        previous: '',
      },
    ]);
  });

  it('feeds the planner directly', () => {
    const records = parseFeedCsv(FEED);
    const result = new PlanService({ getEvents: () => records }).getDailyPlan('2025-07-03');
    assert.equal(result.status, 'open');
    if (result.status !== 'open') return;
    assert.equal(result.analysis.plan, 'News Day Plan');
    assert.equal(result.analysis.morning[0].time, '08:30 AM');
  });
});
