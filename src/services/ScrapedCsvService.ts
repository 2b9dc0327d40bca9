/**
 * Imports the scraper output (latest_forex_data.csv) into the event store.
 * Columns: date (DD/MM/YYYY), time, currency, impact, event, actual, forecast, previous.
 * Times in the file are already US Eastern.
 */
import fs from 'fs';
import Papa from 'papaparse';
import { RawEventRecord } from '../types/calendar';
import { toRawEventRecord } from '../utils/eventRecord';
import type { AppDatabase } from '../db/database';

export type ImportResult =
  | { status: 'missing'; inserted: 0; deleted: 0 }
  | { status: 'empty'; inserted: 0; deleted: 0 }
  | { status: 'imported'; inserted: number; deleted: number };

/** Empty cells and missing columns become '' */
export function parseScrapedCsv(csvText: string): RawEventRecord[] {
  const parsed = Papa.parse<Record<string, string | undefined>>(csvText, {
    header: true,
    skipEmptyLines: true,
    transformHeader: (h) => h.trim().toLowerCase(),
  });
  if (parsed.errors.length > 0) {
    console.warn(`[ScrapedCsv] ${parsed.errors.length} malformed row(s), first: ${parsed.errors[0].message}`);
  }
  return (parsed.data || []).map((row) => toRawEventRecord(row));
}

export class ScrapedCsvService {
  constructor(
    private readonly csvPath: string,
    private readonly store: Pick<AppDatabase, 'replaceEvents'>
  ) {}

  getCsvPath(): string {
    return this.csvPath;
  }

  /** Null when the file does not exist */
  readRecords(): RawEventRecord[] | null {
    if (!fs.existsSync(this.csvPath)) return null;
    return parseScrapedCsv(fs.readFileSync(this.csvPath, 'utf8'));
  }

  /**
   * Replace the stored events with the file contents. A missing or empty file leaves the store untouched.
   */
  importIntoStore(): ImportResult {
    const records = this.readRecords();
    if (records === null) {
      console.error(`[ScrapedCsv] Scraper output file not found: '${this.csvPath}'`);
      return { status: 'missing', inserted: 0, deleted: 0 };
    }
    if (records.length === 0) {
      console.warn(`[ScrapedCsv] '${this.csvPath}' has no rows, store left unchanged`);
      return { status: 'empty', inserted: 0, deleted: 0 };
    }
    const { inserted, deleted } = this.store.replaceEvents(records);
    console.log(`[ScrapedCsv] Imported ${inserted} events (${deleted} removed)`);
    return { status: 'imported', inserted, deleted };
  }
}
