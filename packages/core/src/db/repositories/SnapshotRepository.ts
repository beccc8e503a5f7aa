import type BetterSqlite3 from 'better-sqlite3';
import type { HistoryPoint, VolumeMetric } from '@diskwatch/shared';
import { DEFAULT_HISTORY_HOURS, MAX_HISTORY_HOURS, MIN_HISTORY_HOURS } from '@diskwatch/shared';

export interface SnapshotRow {
  id: number;
  timestamp: number;
  hostname: string;
  mountpoint: string;
  device: string | null;
  fstype: string | null;
  total_bytes: number;
  used_bytes: number;
  free_bytes: number;
  usage_percent: number;
}

type HistoryRow = Pick<SnapshotRow, 'timestamp' | 'usage_percent' | 'used_bytes' | 'total_bytes'>;

type InsertParams = [number, string, string, string, string, number, number, number, number];

const HOUR_MS = 3_600_000;

/**
 * Append-only storage for per-cycle volume readings. Rows are never updated
 * or deleted.
 */
export class SnapshotRepository {
  private db: BetterSqlite3.Database;
  private insertStmt: BetterSqlite3.Statement<InsertParams>;
  private historyStmt: BetterSqlite3.Statement<[string, number], HistoryRow>;

  constructor(db: BetterSqlite3.Database) {
    this.db = db;
    this.insertStmt = db.prepare<InsertParams>(`
      INSERT INTO snapshots (
        timestamp, hostname, mountpoint, device, fstype,
        total_bytes, used_bytes, free_bytes, usage_percent
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);
    this.historyStmt = db.prepare<[string, number], HistoryRow>(`
      SELECT timestamp, usage_percent, used_bytes, total_bytes
      FROM snapshots
      WHERE mountpoint = ? AND timestamp > ?
      ORDER BY timestamp, id
    `);
  }

  /**
   * Persist one row per metric for a single cycle. The whole cycle commits
   * atomically, so readers see all of its rows or none.
   */
  append(timestamp: Date, metrics: VolumeMetric[]): number {
    const ts = timestamp.getTime();
    const insertCycle = this.db.transaction((items: VolumeMetric[]) => {
      for (const metric of items) {
        this.insertStmt.run(
          ts,
          metric.hostname,
          metric.mountpoint,
          metric.device,
          metric.fstype,
          metric.totalBytes,
          metric.usedBytes,
          metric.freeBytes,
          metric.usagePercent,
        );
      }
      return items.length;
    });
    return insertCycle(metrics);
  }

  /**
   * Time series for one mountpoint over the last `hours`, oldest first.
   * An unknown mountpoint yields an empty list.
   */
  query(
    mountpoint: string,
    hours: number = DEFAULT_HISTORY_HOURS,
    now: Date = new Date(),
  ): HistoryPoint[] {
    if (!Number.isInteger(hours) || hours < MIN_HISTORY_HOURS || hours > MAX_HISTORY_HOURS) {
      throw new RangeError(
        `hours must be an integer between ${MIN_HISTORY_HOURS} and ${MAX_HISTORY_HOURS}, got ${hours}`,
      );
    }

    const cutoff = now.getTime() - hours * HOUR_MS;
    return this.historyStmt.all(mountpoint, cutoff).map((row) => ({
      timestamp: new Date(row.timestamp).toISOString(),
      usagePercent: row.usage_percent,
      usedBytes: row.used_bytes,
      totalBytes: row.total_bytes,
    }));
  }

  listMountpoints(): string[] {
    return this.db
      .prepare<[], { mountpoint: string }>(
        'SELECT DISTINCT mountpoint FROM snapshots ORDER BY mountpoint',
      )
      .all()
      .map((row) => row.mountpoint);
  }

  count(mountpoint?: string): number {
    const row =
      mountpoint === undefined
        ? this.db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM snapshots').get()
        : this.db
            .prepare<[string], { count: number }>(
              'SELECT COUNT(*) AS count FROM snapshots WHERE mountpoint = ?',
            )
            .get(mountpoint);
    return row?.count ?? 0;
  }

  getLatestTimestamp(hostname: string): Date | null {
    const row = this.db
      .prepare<[string], { timestamp: number | null }>(
        'SELECT MAX(timestamp) AS timestamp FROM snapshots WHERE hostname = ?',
      )
      .get(hostname);
    return row?.timestamp != null ? new Date(row.timestamp) : null;
  }
}
