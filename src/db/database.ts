import Database from 'better-sqlite3';
import { RawEventRecord } from '../types/calendar';
import { toRawEventRecord } from '../utils/eventRecord';

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS economic_events (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    date TEXT NOT NULL DEFAULT '',
    time TEXT NOT NULL DEFAULT '',
    currency TEXT NOT NULL DEFAULT '',
    impact TEXT NOT NULL DEFAULT '',
    event TEXT NOT NULL DEFAULT '',
    actual TEXT NOT NULL DEFAULT '',
    forecast TEXT NOT NULL DEFAULT '',
    previous TEXT NOT NULL DEFAULT '',
    imported_at INTEGER NOT NULL
  );

  CREATE TABLE IF NOT EXISTS users (
    user_id INTEGER PRIMARY KEY,
    username TEXT,
    first_name TEXT,
    registered_at INTEGER NOT NULL
  );
`;

export interface User {
  user_id: number;
  username: string | null;
  first_name: string | null;
  registered_at: number;
}

export interface ReplaceResult {
  inserted: number;
  deleted: number;
}

export interface AppDatabase {
  getDbPath(): string;
  /** Delete every stored event and insert the new batch, in one transaction */
  replaceEvents(records: RawEventRecord[]): ReplaceResult;
  getEvents(): RawEventRecord[];
  getEventCount(): number;
  registerUser(userId: number, username?: string, firstName?: string): void;
  removeUser(userId: number): boolean;
  getUsers(): User[];
  getUserCount(): number;
  close(): void;
}

type EventRow = Required<RawEventRecord>;

/**
 * Open (or create) the SQLite store. Pass ':memory:' for a throwaway database.
 */
export function createDatabase(dbPath: string): AppDatabase {
  const db = new Database(dbPath);
  db.exec(SCHEMA);

  const insertEvent = db.prepare<[EventRow & { imported_at: number }]>(`
    INSERT INTO economic_events (date, time, currency, impact, event, actual, forecast, previous, imported_at)
    VALUES (@date, @time, @currency, @impact, @event, @actual, @forecast, @previous, @imported_at)
  `);

  const replaceAll = db.transaction((records: RawEventRecord[]): ReplaceResult => {
    const deleted = db.prepare('DELETE FROM economic_events').run().changes;
    const importedAt = Date.now();
    for (const record of records) {
      insertEvent.run({ ...toRawEventRecord(record), imported_at: importedAt });
    }
    return { inserted: records.length, deleted };
  });

  return {
    getDbPath: (): string => dbPath,

    replaceEvents: (records: RawEventRecord[]): ReplaceResult => {
      const result = replaceAll(records);
      console.log(`[DB] Events replaced: deleted=${result.deleted} inserted=${result.inserted}`);
      return result;
    },

    getEvents: (): RawEventRecord[] => {
      return db
        .prepare<[], EventRow>(
          'SELECT date, time, currency, impact, event, actual, forecast, previous FROM economic_events ORDER BY id'
        )
        .all();
    },

    getEventCount: (): number => {
      const row = db.prepare<[], { count: number }>('SELECT COUNT(*) as count FROM economic_events').get();
      return row?.count ?? 0;
    },

    registerUser: (userId: number, username?: string, firstName?: string): void => {
      db.prepare(
        'INSERT OR IGNORE INTO users (user_id, username, first_name, registered_at) VALUES (?, ?, ?, ?)'
      ).run(userId, username || null, firstName || null, Date.now());
    },

    removeUser: (userId: number): boolean => {
      return db.prepare('DELETE FROM users WHERE user_id = ?').run(userId).changes > 0;
    },

    getUsers: (): User[] => {
      return db.prepare<[], User>('SELECT * FROM users ORDER BY registered_at, user_id').all();
    },

    getUserCount: (): number => {
      const row = db.prepare<[], { count: number }>('SELECT COUNT(*) as count FROM users').get();
      return row?.count ?? 0;
    },

    close: (): void => {
      db.close();
    },
  };
}
