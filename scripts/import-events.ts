/**
 * Load the scraper output into the event store (replaces every stored event).
 *
 * Usage: npx tsx scripts/import-events.ts [path/to/latest_forex_data.csv]
 */

import path from 'path';
import { env } from '../src/config/env';
import { createDatabase } from '../src/db/database';
import { ScrapedCsvService } from '../src/services/ScrapedCsvService';

function main(): void {
  const csvPath = process.argv[2] ? path.resolve(process.argv[2]) : env.EVENTS_CSV_PATH;
  const database = createDatabase(env.DB_PATH);
  try {
    const result = new ScrapedCsvService(csvPath, database).importIntoStore();
    console.log('='.repeat(60));
    console.log(`CSV:      ${csvPath}`);
    console.log(`Database: ${database.getDbPath()}`);
    console.log(`Status:   ${result.status}`);
    console.log(`Removed:  ${result.deleted}`);
    console.log(`Added:    ${result.inserted}`);
    console.log('='.repeat(60));
    if (result.status === 'missing') process.exitCode = 1;
  } finally {
    database.close();
  }
}

main();
