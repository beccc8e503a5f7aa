import type BetterSqlite3 from 'better-sqlite3';
import type { Alert, NewAlert } from '@diskwatch/shared';

export interface AlertRow {
  id: number;
  timestamp: number;
  hostname: string;
  mountpoint: string;
  usage_percent: number;
  threshold: number;
  acknowledged: number;
}

type InsertParams = [number, string, string, number, number];

function toAlert(row: AlertRow): Alert {
  return {
    id: row.id,
    timestamp: new Date(row.timestamp).toISOString(),
    hostname: row.hostname,
    mountpoint: row.mountpoint,
    usagePercent: row.usage_percent,
    threshold: row.threshold,
    acknowledged: row.acknowledged === 1,
  };
}

export class AlertRepository {
  private db: BetterSqlite3.Database;
  private insertStmt: BetterSqlite3.Statement<InsertParams>;

  constructor(db: BetterSqlite3.Database) {
    this.db = db;
    this.insertStmt = db.prepare<InsertParams>(
      'INSERT INTO alerts (timestamp, hostname, mountpoint, usage_percent, threshold) VALUES (?, ?, ?, ?, ?)',
    );
  }

  insert(alert: NewAlert): Alert {
    const result = this.insertStmt.run(
      alert.timestamp.getTime(),
      alert.hostname,
      alert.mountpoint,
      alert.usagePercent,
      alert.threshold,
    );
    return {
      id: Number(result.lastInsertRowid),
      timestamp: alert.timestamp.toISOString(),
      hostname: alert.hostname,
      mountpoint: alert.mountpoint,
      usagePercent: alert.usagePercent,
      threshold: alert.threshold,
      acknowledged: false,
    };
  }

  insertBatch(alerts: NewAlert[]): Alert[] {
    const insertMany = this.db.transaction((items: NewAlert[]) =>
      items.map((alert) => this.insert(alert)),
    );
    return insertMany(alerts);
  }

  findById(id: number): Alert | undefined {
    const row = this.db.prepare<[number], AlertRow>('SELECT * FROM alerts WHERE id = ?').get(id);
    return row ? toAlert(row) : undefined;
  }

  /** Most recent first. */
  getRecent(limit: number): Alert[] {
    return this.db
      .prepare<[number], AlertRow>('SELECT * FROM alerts ORDER BY id DESC LIMIT ?')
      .all(limit)
      .map(toAlert);
  }

  /**
   * Mark an alert acknowledged. Returns the number of rows matched, which is
   * 0 for an unknown id.
   */
  acknowledge(id: number): number {
    return this.db.prepare<[number]>('UPDATE alerts SET acknowledged = 1 WHERE id = ?').run(id)
      .changes;
  }

  count(): number {
    return (
      this.db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM alerts').get()?.count ?? 0
    );
  }
}
