import type BetterSqlite3 from 'better-sqlite3';

export function up(db: BetterSqlite3.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS snapshots (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      timestamp INTEGER NOT NULL,
      hostname TEXT NOT NULL,
      mountpoint TEXT NOT NULL,
      device TEXT,
      fstype TEXT,
      total_bytes INTEGER NOT NULL,
      used_bytes INTEGER NOT NULL,
      free_bytes INTEGER NOT NULL,
      usage_percent REAL NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_snapshots_timestamp ON snapshots(timestamp);
    CREATE INDEX IF NOT EXISTS idx_snapshots_mountpoint ON snapshots(mountpoint);
    CREATE INDEX IF NOT EXISTS idx_snapshots_hostname ON snapshots(hostname);
    CREATE INDEX IF NOT EXISTS idx_snapshots_mountpoint_time
      ON snapshots(mountpoint, timestamp);

    CREATE TABLE IF NOT EXISTS alerts (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      timestamp INTEGER NOT NULL,
      hostname TEXT NOT NULL,
      mountpoint TEXT NOT NULL,
      usage_percent REAL NOT NULL,
      threshold REAL NOT NULL,
      acknowledged INTEGER NOT NULL DEFAULT 0
    );

    CREATE INDEX IF NOT EXISTS idx_alerts_timestamp ON alerts(timestamp);
  `);
}
