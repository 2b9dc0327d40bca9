import * as cron from 'node-cron';
import type { AppDatabase } from '../db/database';
import { RawEventRecord } from '../types/calendar';
import { getMarketDate, MARKET_TIMEZONE } from '../utils/marketClock';
import { buildDailyPlanMessage } from '../utils/planMessage';
import type { PlanService } from './PlanService';

/** Refresh the stored calendar at minute 5 of every hour (the export updates hourly) */
const REFRESH_CRON = '5 * * * *';
/** Daily plan broadcast, weekdays 08:00 market time */
const DAILY_PLAN_CRON = '0 8 * * 1-5';

export interface WeekFeed {
  getWeekRecords(): Promise<RawEventRecord[]>;
  close(): Promise<void>;
}

export interface Outbox {
  enqueue(chatId: number, text: string): boolean;
}

export type RefreshResult =
  | { status: 'skipped' }
  | { status: 'empty' }
  | { status: 'updated'; inserted: number; deleted: number };

export interface SchedulerDeps {
  database: Pick<AppDatabase, 'replaceEvents' | 'getUsers'>;
  feed: WeekFeed;
  planService: Pick<PlanService, 'getDailyPlan'>;
  outbox: Outbox;
  timezone?: string;
}

function logSchedulerError(type: 'refresh_failed' | 'broadcast_failed', error: unknown): void {
  const payload = {
    level: 'error',
    source: 'SchedulerService',
    type,
    errorMessage: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
    timestamp: new Date().toISOString(),
  };
  console.error('[Scheduler] Job failed:', JSON.stringify(payload));
}

export class SchedulerService {
  private cronTasks: cron.ScheduledTask[] = [];
  private isRefreshing = false;
  private readonly timezone: string;

  constructor(private readonly deps: SchedulerDeps) {
    this.timezone = deps.timezone ?? MARKET_TIMEZONE;
  }

  /**
   * Pull this week's feed into the store. Skips while a previous refresh is still running;
   * an empty feed keeps the stored events.
   */
  async refreshEvents(): Promise<RefreshResult> {
    if (this.isRefreshing) {
      console.warn('[Scheduler] Previous refresh still running, skipping...');
      return { status: 'skipped' };
    }
    this.isRefreshing = true;
    try {
      const records = await this.deps.feed.getWeekRecords();
      if (records.length === 0) {
        console.warn('[Scheduler] Feed returned no events, keeping stored calendar');
        return { status: 'empty' };
      }
      const { inserted, deleted } = this.deps.database.replaceEvents(records);
      console.log(`[Scheduler] Calendar refreshed: ${deleted} removed, ${inserted} added`);
      return { status: 'updated', inserted, deleted };
    } finally {
      this.isRefreshing = false;
    }
  }

  /**
   * Queue today's plan (market date) to every subscriber. Returns how many messages were queued.
   */
  broadcastDailyPlan(now: Date = new Date()): number {
    const users = this.deps.database.getUsers();
    if (users.length === 0) {
      console.log('[Scheduler] No subscribers, daily plan not sent');
      return 0;
    }
    const date = getMarketDate(now, this.timezone);
    const text = buildDailyPlanMessage(this.deps.planService.getDailyPlan(date));
    let queued = 0;
    for (const user of users) {
      if (this.deps.outbox.enqueue(user.user_id, text)) queued++;
    }
    console.log(`[Scheduler] Daily plan for ${date} queued to ${queued}/${users.length} subscriber(s)`);
    return queued;
  }

  start(): void {
    console.log(`[Scheduler] Starting (timezone ${this.timezone})`);

    this.cronTasks.push(
      cron.schedule(
        REFRESH_CRON,
        async () => {
          try {
            await this.refreshEvents();
          } catch (err) {
            logSchedulerError('refresh_failed', err);
          }
        },
        { timezone: this.timezone, noOverlap: true }
      )
    );

    this.cronTasks.push(
      cron.schedule(
        DAILY_PLAN_CRON,
        () => {
          try {
            this.broadcastDailyPlan();
          } catch (err) {
            logSchedulerError('broadcast_failed', err);
          }
        },
        { timezone: this.timezone }
      )
    );

    console.log(`[Scheduler] Started: refresh "${REFRESH_CRON}", daily plan "${DAILY_PLAN_CRON}"`);
  }

  async stop(): Promise<void> {
    console.log('[Scheduler] Stopping all cron tasks...');
    for (const task of this.cronTasks) {
      await task.stop();
    }
    this.cronTasks = [];
    await this.deps.feed.close();
    console.log('[Scheduler] All cron tasks stopped');
  }
}
