import dotenv from 'dotenv';
import path from 'path';

// Load .env from project root so it works regardless of process.cwd()
const projectRoot = path.resolve(__dirname, '..', '..');
dotenv.config({ path: path.join(projectRoot, '.env') });

interface EnvConfig {
  BOT_TOKEN?: string;
  ADMIN_CHAT_ID?: string;
  DB_PATH: string;
  EVENTS_CSV_PATH: string;
  MARKET_TIMEZONE: string;
}

type RequiredKey = 'BOT_TOKEN' | 'ADMIN_CHAT_ID';

/** Throws when the variable is unset; only the bot needs BOT_TOKEN, the scripts run without it */
export function getEnvVar(key: RequiredKey): string {
  const value = process.env[key];
  if (!value) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}

function resolveFromRoot(value: string | undefined, fallback: string): string {
  return path.resolve(projectRoot, value || fallback);
}

export const env: EnvConfig = {
  BOT_TOKEN: process.env.BOT_TOKEN,
  ADMIN_CHAT_ID: process.env.ADMIN_CHAT_ID,
  DB_PATH: resolveFromRoot(process.env.DB_PATH, 'trading_plans.db'),
  EVENTS_CSV_PATH: resolveFromRoot(process.env.EVENTS_CSV_PATH, 'latest_forex_data.csv'),
  MARKET_TIMEZONE: process.env.MARKET_TIMEZONE || 'America/New_York',
};
