/**
 * Tests for SchedulerService: refresh mutex, empty feeds and the daily broadcast.
 * Cron jobs are not started; the job bodies are called directly.
 */
import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { createDatabase } from '../src/db/database';
import { PlanService } from '../src/services/PlanService';
import { SchedulerService, WeekFeed } from '../src/services/SchedulerService';
import type { RawEventRecord } from '../src/types/calendar';
import { buildDailyPlanMessage } from '../src/utils/planMessage';

const WEEK: RawEventRecord[] = [
  { date: '01/07/2025', time: '8:30am', currency: 'USD', impact: 'High', event: 'Non-Farm Payrolls' },
  { date: '02/07/2025', time: '2:00pm', currency: 'USD', impact: 'High', event: 'FOMC Statement' },
];

function staticFeed(records: RawEventRecord[]): WeekFeed {
  return { getWeekRecords: async () => records, close: async () => undefined };
}

function setup(feed: WeekFeed) {
  const database = createDatabase(':memory:');
  const planService = new PlanService(database);
  const outbox: Array<{ chatId: number; text: string }> = [];
  const scheduler = new SchedulerService({
    database,
    feed,
    planService,
    outbox: {
      enqueue: (chatId, text) => {
        outbox.push({ chatId, text });
        return true;
      },
    },
  });
  return { database, planService, outbox, scheduler };
}

describe('SchedulerService.refreshEvents', () => {
  it('skips a refresh while the previous one is still running', async () => {
    let release: () => void = () => undefined;
    const feed: WeekFeed = {
      getWeekRecords: () =>
        new Promise<RawEventRecord[]>((resolve) => {
          release = () => resolve(WEEK);
        }),
      close: async () => undefined,
    };
    const { database, scheduler } = setup(feed);

    const first = scheduler.refreshEvents();
    assert.deepEqual(await scheduler.refreshEvents(), { status: 'skipped' });

    release();
    assert.deepEqual(await first, { status: 'updated', inserted: 2, deleted: 0 });
    assert.equal(database.getEventCount(), 2);
    database.close();
  });

  it('keeps the stored calendar when the feed is empty', async () => {
    const { database, scheduler } = setup(staticFeed([]));
    database.replaceEvents(WEEK);
    assert.deepEqual(await scheduler.refreshEvents(), { status: 'empty' });
    assert.equal(database.getEventCount(), 2);
    database.close();
  });

  it('propagates feed errors and allows the next refresh', async () => {
    let calls = 0;
    const feed: WeekFeed = {
      getWeekRecords: async () => {
        calls++;
        if (calls === 1) throw new Error('Request failed with status code 500');
        return WEEK;
      },
      close: async () => undefined,
    };
    const { database, scheduler } = setup(feed);

    await assert.rejects(scheduler.refreshEvents(), /status code 500/);
    assert.deepEqual(await scheduler.refreshEvents(), { status: 'updated', inserted: 2, deleted: 0 });
    database.close();
  });
});

describe('SchedulerService.broadcastDailyPlan', () => {
  it("queues today's plan in market time to every subscriber", async () => {
    const { database, planService, outbox, scheduler } = setup(staticFeed(WEEK));
    await scheduler.refreshEvents();
    database.registerUser(11);
    database.registerUser(22);

    // 2025-07-02T02:00Z is still 1 July in New York
    const queued = scheduler.broadcastDailyPlan(new Date('2025-07-02T02:00:00Z'));
    assert.equal(queued, 2);

    const expected = buildDailyPlanMessage(planService.getDailyPlan('2025-07-01'));
    assert.deepEqual(outbox.map((m) => m.chatId).sort((a, b) => a - b), [11, 22]);
    assert.ok(outbox.every((m) => m.text === expected));
    assert.equal(outbox[0].text.split('\n')[0], '⚡ NEWS DAY PLAN: Tue 01/07/2025');
    database.close();
  });

  it('sends nothing without subscribers', () => {
    const { database, outbox, scheduler } = setup(staticFeed(WEEK));
    assert.equal(scheduler.broadcastDailyPlan(new Date('2025-07-01T12:00:00Z')), 0);
    assert.equal(outbox.length, 0);
    database.close();
  });
});
