import { Bot, Context } from 'grammy';
import { env, getEnvVar } from './config/env';
import { createDatabase } from './db/database';
import { ForexFactoryCsvService } from './services/ForexFactoryCsvService';
import { MessageQueue } from './services/MessageQueue';
import { PlanService } from './services/PlanService';
import { ScrapedCsvService } from './services/ScrapedCsvService';
import { SchedulerService } from './services/SchedulerService';
import { CalendarDate } from './types/calendar';
import { parseDate, weekdayIndex } from './utils/calendarDate';
import { getMarketDate, getMarketStatus } from './utils/marketClock';
import {
  buildDailyPlanMessage,
  buildMarketStatusMessage,
  buildPlanKeyboard,
  buildWeekKeyboard,
  buildWeeklyPlanMessage,
  buildWeeklyProfileMessage,
  PLAN_DAY_CALLBACK,
  PLAN_WEEK_CALLBACK,
} from './utils/planMessage';
import { getWeeklyProfileAnalysis, parseBias } from './utils/weeklyProfile';

const bot = new Bot(getEnvVar('BOT_TOKEN'));

const database = createDatabase(env.DB_PATH);
const planService = new PlanService(database);
const scrapedCsvService = new ScrapedCsvService(env.EVENTS_CSV_PATH, database);
const feedService = new ForexFactoryCsvService(env.MARKET_TIMEZONE);
const messageQueue = new MessageQueue((chatId, text) => bot.api.sendMessage(chatId, text));
const schedulerService = new SchedulerService({
  database,
  feed: feedService,
  planService,
  outbox: messageQueue,
  timezone: env.MARKET_TIMEZONE,
});

function commandArgs(ctx: Context): string {
  const text = ctx.message?.text ?? '';
  return text.replace(/^\/\S+/, '').trim();
}

/** Date argument (DD/MM/YYYY) or today in market time; null when the argument is not a date */
function resolveDate(arg: string): CalendarDate | null {
  if (!arg) return getMarketDate(new Date(), env.MARKET_TIMEZONE);
  return parseDate(arg);
}

function isAdmin(ctx: Context): boolean {
  if (!env.ADMIN_CHAT_ID) return true;
  return String(ctx.chat?.id ?? '') === env.ADMIN_CHAT_ID;
}

bot.api
  .setMyCommands([
    { command: 'plan', description: '📊 Trading plan for a day' },
    { command: 'week', description: '📅 Plans for the trading week' },
    { command: 'status', description: '🕐 Market session status' },
    { command: 'profile', description: '🧭 Weekly profile' },
    { command: 'help', description: 'ℹ️ Help' },
  ])
  .catch((err) => {
    console.warn('[Bot] setMyCommands failed (e.g. rate limit):', err instanceof Error ? err.message : err);
  });

bot.command('start', async (ctx) => {
  const from = ctx.from;
  if (from) database.registerUser(from.id, from.username, from.first_name);
  await ctx.reply(
    '✅ Subscribed. The daily plan arrives on weekdays at 08:00 ET.\n\nUse /plan, /week or /status at any time, /stop to unsubscribe.'
  );
});

bot.command('stop', async (ctx) => {
  const removed = ctx.from ? database.removeUser(ctx.from.id) : false;
  await ctx.reply(removed ? '👋 Unsubscribed from the daily plan.' : 'You were not subscribed.');
});

bot.command('plan', async (ctx) => {
  const date = resolveDate(commandArgs(ctx));
  if (!date) {
    await ctx.reply('Usage: /plan [DD/MM/YYYY]');
    return;
  }
  try {
    const text = buildDailyPlanMessage(planService.getDailyPlan(date));
    await ctx.reply(text, { reply_markup: buildPlanKeyboard(date) });
  } catch (error) {
    console.error('[Bot] Error in plan command:', error);
    await ctx.reply(`❌ Could not build the plan: ${error instanceof Error ? error.message : 'Unknown error'}`);
  }
});

bot.command('week', async (ctx) => {
  const date = resolveDate(commandArgs(ctx));
  if (!date) {
    await ctx.reply('Usage: /week [DD/MM/YYYY]');
    return;
  }
  try {
    const text = buildWeeklyPlanMessage(planService.getWeeklyPlan(date));
    await ctx.reply(text, { reply_markup: buildWeekKeyboard(date) });
  } catch (error) {
    console.error('[Bot] Error in week command:', error);
    await ctx.reply(`❌ Could not build the week: ${error instanceof Error ? error.message : 'Unknown error'}`);
  }
});

bot.callbackQuery(PLAN_DAY_CALLBACK, async (ctx) => {
  const date = ctx.match[1];
  await ctx.answerCallbackQuery();
  await ctx.editMessageText(buildDailyPlanMessage(planService.getDailyPlan(date)), {
    reply_markup: buildPlanKeyboard(date),
  });
});

bot.callbackQuery(PLAN_WEEK_CALLBACK, async (ctx) => {
  const date = ctx.match[1];
  await ctx.answerCallbackQuery();
  await ctx.editMessageText(buildWeeklyPlanMessage(planService.getWeeklyPlan(date)), {
    reply_markup: buildWeekKeyboard(date),
  });
});

bot.command('status', async (ctx) => {
  const status = getMarketStatus(new Date(), env.MARKET_TIMEZONE);
  await ctx.reply(buildMarketStatusMessage(status, env.MARKET_TIMEZONE));
});

bot.command('profile', async (ctx) => {
  const [biasArg = '', ...rest] = commandArgs(ctx).split(',').map((s) => s.trim());
  const bias = parseBias(biasArg);
  if (!bias) {
    await ctx.reply('Usage: /profile Bullish|Bearish[, observation, …]\nExample: /profile Bullish, Mon Low Run');
    return;
  }
  const today = getMarketDate(new Date(), env.MARKET_TIMEZONE);
  const profiles = getWeeklyProfileAnalysis(bias, rest.filter(Boolean), weekdayIndex(today));
  await ctx.reply(buildWeeklyProfileMessage(profiles));
});

bot.command('import', async (ctx) => {
  if (!isAdmin(ctx)) {
    await ctx.reply('⛔ Admin only.');
    return;
  }
  const result = scrapedCsvService.importIntoStore();
  if (result.status === 'missing') {
    await ctx.reply(`❌ Scraper output not found: ${scrapedCsvService.getCsvPath()}`);
  } else if (result.status === 'empty') {
    await ctx.reply('⚠️ Scraper output has no rows, stored events left unchanged.');
  } else {
    await ctx.reply(`✅ Database updated: ${result.deleted} records removed, ${result.inserted} records added.`);
  }
});

bot.command('refresh', async (ctx) => {
  if (!isAdmin(ctx)) {
    await ctx.reply('⛔ Admin only.');
    return;
  }
  try {
    const result = await schedulerService.refreshEvents();
    if (result.status === 'skipped') await ctx.reply('⏳ A refresh is already running.');
    else if (result.status === 'empty') await ctx.reply('⚠️ Feed returned no events, stored events left unchanged.');
    else await ctx.reply(`✅ Database updated: ${result.deleted} records removed, ${result.inserted} records added.`);
  } catch (error) {
    console.error('[Bot] Error in refresh command:', error);
    await ctx.reply(`❌ Feed refresh failed: ${error instanceof Error ? error.message : 'Unknown error'}`);
  }
});

bot.command('help', (ctx) => {
  const helpText = `ℹ️ Commands:

📊 /plan [DD/MM/YYYY] - Trading plan for a day (default: today ET)
📅 /week [DD/MM/YYYY] - Plans for the trading week
🕐 /status - Market session status and time to open
🧭 /profile Bullish|Bearish[, observation, …] - Weekly profile
📥 /import - Load the scraped calendar CSV
🔄 /refresh - Reload this week's calendar feed
🛑 /stop - Unsubscribe from the 08:00 plan`;
  return ctx.reply(helpText);
});

bot.catch((err) => {
  console.error('[Bot] Error:', err);
  err.ctx.reply('❌ Something went wrong. Try again later.').catch((replyErr: unknown) => {
    console.warn('[Bot] Could not send error reply:', replyErr instanceof Error ? replyErr.message : replyErr);
  });
});

async function shutdown(signal: string): Promise<void> {
  console.log(`[Bot] ${signal} received, shutting down...`);
  messageQueue.stop();
  await schedulerService.stop();
  await bot.stop();
  database.close();
}

process.once('SIGINT', () => void shutdown('SIGINT'));
process.once('SIGTERM', () => void shutdown('SIGTERM'));

messageQueue.start();
schedulerService.start();

console.log(`✅ Bot starting (db: ${database.getDbPath()}, events stored: ${database.getEventCount()})`);
void bot.start();
