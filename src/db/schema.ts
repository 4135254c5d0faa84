import { Database as SqliteDatabase } from 'sqlite3';
import path from 'path';
import fs from 'fs';
import { CONFIG } from '../config/constants';

export type SqlValue = string | number | null;

export interface Database {
  run: (sql: string, ...params: SqlValue[]) => Promise<{ lastID: number; changes: number }>;
  get: <T>(sql: string, ...params: SqlValue[]) => Promise<T | undefined>;
  all: <T>(sql: string, ...params: SqlValue[]) => Promise<T[]>;
  exec: (sql: string) => Promise<void>;
  close: () => Promise<void>;
}

function createDatabase(db: SqliteDatabase): Database {
  return {
    run: (sql: string, ...params: SqlValue[]) => {
      return new Promise((resolve, reject) => {
        db.run(sql, params, function(err: Error | null) {
          if (err) reject(err);
          else resolve({ lastID: this.lastID, changes: this.changes });
        });
      });
    },
    get: <T>(sql: string, ...params: SqlValue[]): Promise<T | undefined> => {
      return new Promise<T | undefined>((resolve, reject) => {
        db.get(sql, params, (err: Error | null, row: T | undefined) => {
          if (err) reject(err);
          else resolve(row ?? undefined);
        });
      });
    },
    all: <T>(sql: string, ...params: SqlValue[]): Promise<T[]> => {
      return new Promise<T[]>((resolve, reject) => {
        db.all(sql, params, (err: Error | null, rows: T[] | undefined) => {
          if (err) reject(err);
          else resolve(rows ?? []);
        });
      });
    },
    exec: (sql: string) => {
      return new Promise((resolve, reject) => {
        db.exec(sql, (err: Error | null) => {
          if (err) reject(err);
          else resolve();
        });
      });
    },
    close: () => {
      return new Promise((resolve, reject) => {
        db.close((err: Error | null) => {
          if (err) reject(err);
          else resolve();
        });
      });
    }
  };
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS runs (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    startedAt TEXT NOT NULL,
    finishedAt TEXT,
    status TEXT NOT NULL DEFAULT 'RUNNING',
    snapshotAt TEXT,
    scrapedCount INTEGER,
    insertedCount INTEGER,
    failedCount INTEGER,
    withoutLcodeCount INTEGER,
    warningCount INTEGER,
    errorCode TEXT,
    errorMessage TEXT,
    screenshotPath TEXT
  );
  CREATE INDEX IF NOT EXISTS idx_runs_startedAt ON runs (startedAt DESC);
`;

/**
 * Opens the local run history. Pass ':memory:' for a throwaway database.
 */
export async function initDatabase(dbPath: string = CONFIG.STORAGE.DB_PATH): Promise<Database> {
  if (dbPath !== ':memory:') {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }

  const db = await new Promise<SqliteDatabase>((resolve, reject) => {
    const handle = new SqliteDatabase(dbPath, (err: Error | null) => {
      if (err) reject(err);
      else resolve(handle);
    });
  });

  const dbAsync = createDatabase(db);
  await dbAsync.exec(SCHEMA);
  return dbAsync;
}
