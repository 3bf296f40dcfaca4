import { mkdirSync, readFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { fileURLToPath } from 'node:url';

import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';

import { logger } from '@utils/logger.js';

import * as schema from './schema.js';

export type AppDatabase = BetterSQLite3Database<typeof schema>;

export interface DatabaseHandle {
  db: AppDatabase;
  close(): void;
}

const DDL_PATH = fileURLToPath(new URL('./schema.sql', import.meta.url));

export function openDatabase(path: string): DatabaseHandle {
  if (path !== ':memory:') {
    mkdirSync(dirname(path), { recursive: true });
  }

  const sqlite = new Database(path);
  sqlite.pragma('journal_mode = WAL');
  sqlite.pragma('busy_timeout = 5000');
  sqlite.pragma('foreign_keys = ON');
  sqlite.exec(readFileSync(DDL_PATH, 'utf8'));

  logger.info('[db] opened', { path });

  return {
    db: drizzle(sqlite, { schema }),
    close: () => {
      if (sqlite.open) {
        sqlite.close();
        logger.info('[db] closed', { path });
      }
    },
  };
}
