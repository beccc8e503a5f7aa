import BetterSqlite3 from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { DISKWATCH_DB_FILE } from '@diskwatch/shared';
import { runMigrations } from './migrations/index.js';

let instance: BetterSqlite3.Database | null = null;

/**
 * Open a database, apply pragmas and run pending migrations.
 *
 * WAL lets readers (request handlers, the CLI on another connection) proceed
 * while a cycle is being written.
 */
export function openDatabase(dbPath: string): BetterSqlite3.Database {
  if (dbPath !== ':memory:') {
    mkdirSync(dirname(dbPath), { recursive: true });
  }

  const db = new BetterSqlite3(dbPath);

  db.pragma('journal_mode = WAL');
  db.pragma('synchronous = NORMAL');
  db.pragma('busy_timeout = 5000');

  runMigrations(db);

  return db;
}

export function getDatabase(dbPath: string = DISKWATCH_DB_FILE): BetterSqlite3.Database {
  if (instance) return instance;

  instance = openDatabase(dbPath);
  return instance;
}

export function closeDatabase(): void {
  if (instance) {
    instance.close();
    instance = null;
  }
}
