/**
 * ForexFactory calendar via the weekly CSV export.
 * Fetches https://nfs.faireconomy.media/ff_calendar_thisweek.csv
 * (Title, Country, Date, Time, Impact, Forecast, Previous, URL).
 * 60-minute cache (CSV updates hourly; requests more frequent than 5 min can get 429).
 *
 * Times in the export are UTC. Rows are converted to the scraper's shape in US Eastern:
 * date DD/MM/YYYY and time like "8:30am", both taken from the converted instant.
 */
import axios from 'axios';
import Papa from 'papaparse';
import { formatInTimeZone, fromZonedTime } from 'date-fns-tz';
import { RawEventRecord } from '../types/calendar';
import { MARKET_TIMEZONE } from '../utils/marketClock';

const CSV_URL = 'https://nfs.faireconomy.media/ff_calendar_thisweek.csv';
const CSV_TIMEZONE = 'UTC';
const CACHE_TTL_MS = 60 * 60 * 1000;

function isRateLimitError(err: unknown): boolean {
  return axios.isAxiosError(err) && err.response?.status === 429;
}

interface CsvRow {
  Title?: string;
  Country?: string;
  Date?: string;
  Time?: string;
  Impact?: string;
  Forecast?: string;
  Previous?: string;
  URL?: string;
}

/** Export date is MM-DD-YYYY */
const FEED_DATE = /^(\d{1,2})-(\d{1,2})-(\d{4})$/;
const FEED_TIME = /^(\d{1,2}):(\d{2})\s*(am|pm)$/i;

/**
 * Convert one export row's date/time to Eastern. Special times ("All Day", "Tentative", "Day 1")
 * keep their text and their date. Returns null when the date is unusable.
 */
export function convertFeedDateTime(
  dateStr: string,
  timeStr: string,
  timezone: string = MARKET_TIMEZONE
): { date: string; time: string } | null {
  const dateMatch = dateStr.trim().match(FEED_DATE);
  if (!dateMatch) return null;
  const [, month, day, year] = dateMatch;
  const isoDate = `${year}-${month.padStart(2, '0')}-${day.padStart(2, '0')}`;
  const dayFirst = `${day.padStart(2, '0')}/${month.padStart(2, '0')}/${year}`;

  const t = timeStr.trim();
  const timeMatch = t.match(FEED_TIME);
  if (!timeMatch) return { date: dayFirst, time: t };

  let hours = parseInt(timeMatch[1], 10);
  const minutes = timeMatch[2];
  const ampm = timeMatch[3].toLowerCase();
  if (ampm === 'pm' && hours !== 12) hours += 12;
  if (ampm === 'am' && hours === 12) hours = 0;
  const instant = fromZonedTime(`${isoDate} ${hours.toString().padStart(2, '0')}:${minutes}:00`, CSV_TIMEZONE);
  if (isNaN(instant.getTime())) return { date: dayFirst, time: t };

  return {
    date: formatInTimeZone(instant, timezone, 'dd/MM/yyyy'),
    time: formatInTimeZone(instant, timezone, 'h:mmaaa'),
  };
}

export function parseFeedCsv(csvText: string, timezone: string = MARKET_TIMEZONE): RawEventRecord[] {
  const parsed = Papa.parse<CsvRow>(csvText, { header: true, skipEmptyLines: true });
  const records: RawEventRecord[] = [];

  for (const row of parsed.data || []) {
    const title = (row.Title || '').trim().replace(/\s+/g, ' ');
    const currency = (row.Country || '').trim();
    if (!title || !currency) continue;

    const converted = convertFeedDateTime(row.Date || '', row.Time || '', timezone);
    if (!converted) {
      console.warn(`[ForexFactoryCsv] Skipping '${title}': unusable date '${row.Date ?? ''}'`);
      continue;
    }

    records.push({
      date: converted.date,
      time: converted.time,
      currency,
      impact: (row.Impact || '').trim(),
      event: title,
      actual: '',
      forecast: (row.Forecast || '').trim(),
      previous: (row.Previous || '').trim(),
    });
  }
  return records;
}

export class ForexFactoryCsvService {
  private cache: { data: RawEventRecord[]; expires: number } | null = null;

  constructor(private readonly timezone: string = MARKET_TIMEZONE) {}

  private async fetchCsv(): Promise<string> {
    const response = await axios.get<string>(CSV_URL, {
      responseType: 'text',
      timeout: 15000,
      headers: { Accept: 'text/csv' },
      validateStatus: (status: number) => status === 200,
    });
    return response.data;
  }

  /**
   * This week's events in scraper shape. On 429 returns the cache (or nothing); other errors propagate.
   */
  async getWeekRecords(): Promise<RawEventRecord[]> {
    if (this.cache && this.cache.expires > Date.now()) {
      return this.cache.data;
    }

    const startTime = Date.now();
    let csvText: string;
    try {
      csvText = await this.fetchCsv();
    } catch (err) {
      if (isRateLimitError(err)) {
        console.warn('[ForexFactoryCsv] Rate limited (429). Using cache or empty.');
        if (this.cache) return this.cache.data;
        return [];
      }
      throw err;
    }

    const records = parseFeedCsv(csvText, this.timezone);
    this.cache = { data: records, expires: Date.now() + CACHE_TTL_MS };
    console.log(`[ForexFactoryCsv] Parsed ${records.length} events in ${Date.now() - startTime}ms`);
    return records;
  }

  async close(): Promise<void> {
    this.cache = null;
  }
}
