/**
 * Print the trading plan from the stored calendar.
 *
 * Usage: npx tsx scripts/print-plan.ts [DD/MM/YYYY] [--week]
 */

import { env } from '../src/config/env';
import { createDatabase } from '../src/db/database';
import { PlanService } from '../src/services/PlanService';
import { parseDate } from '../src/utils/calendarDate';
import { getMarketDate } from '../src/utils/marketClock';
import { buildDailyPlanMessage, buildWeeklyPlanMessage } from '../src/utils/planMessage';

function main(): void {
  const args = process.argv.slice(2);
  const week = args.includes('--week');
  const dateArg = args.find((a) => !a.startsWith('--'));
  const date = dateArg ? parseDate(dateArg) : getMarketDate(new Date(), env.MARKET_TIMEZONE);
  if (!date) {
    console.error(`Not a DD/MM/YYYY date: ${dateArg}`);
    process.exitCode = 1;
    return;
  }

  const database = createDatabase(env.DB_PATH);
  try {
    const planService = new PlanService(database);
    console.log(
      week
        ? buildWeeklyPlanMessage(planService.getWeeklyPlan(date))
        : buildDailyPlanMessage(planService.getDailyPlan(date))
    );
  } finally {
    database.close();
  }
}

main();
