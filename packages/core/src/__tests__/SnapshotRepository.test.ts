import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type BetterSqlite3 from 'better-sqlite3';
import { openDatabase } from '../db/Database.js';
import { SnapshotRepository } from '../db/repositories/SnapshotRepository.js';
import { makeMetric } from './helpers/fixtures.js';

const HOUR = 3_600_000;
const NOW = new Date('2026-03-10T12:00:00.000Z');

function hoursAgo(hours: number): Date {
  return new Date(NOW.getTime() - hours * HOUR);
}

describe('SnapshotRepository', () => {
  let db: BetterSqlite3.Database;
  let repo: SnapshotRepository;

  beforeEach(() => {
    db = openDatabase(':memory:');
    repo = new SnapshotRepository(db);
  });

  afterEach(() => {
    db.close();
  });

  describe('append', () => {
    it('should insert one row per metric and return the count', () => {
      const inserted = repo.append(NOW, [
        makeMetric({ mountpoint: '/' }),
        makeMetric({ mountpoint: '/home' }),
        makeMetric({ mountpoint: '/var' }),
      ]);

      expect(inserted).toBe(3);
      expect(repo.count()).toBe(3);
      expect(repo.count('/home')).toBe(1);
    });

    it('should accept an empty cycle', () => {
      expect(repo.append(NOW, [])).toBe(0);
      expect(repo.count()).toBe(0);
    });

    it('should store every field of the metric', () => {
      repo.append(NOW, [
        makeMetric({
          mountpoint: '/data',
          device: '/dev/sdb1',
          fstype: 'xfs',
          totalBytes: 1000,
          usedBytes: 600,
          freeBytes: 350,
          usagePercent: 63.2,
        }),
      ]);

      const row = db.prepare('SELECT * FROM snapshots').get();
      expect(row).toEqual({
        id: 1,
        timestamp: NOW.getTime(),
        hostname: 'test-host',
        mountpoint: '/data',
        device: '/dev/sdb1',
        fstype: 'xfs',
        total_bytes: 1000,
        used_bytes: 600,
        free_bytes: 350,
        usage_percent: 63.2,
      });
    });
  });

  describe('query', () => {
    it('should return points inside the window, oldest first', () => {
      repo.append(hoursAgo(30), [makeMetric({ usagePercent: 10 })]);
      repo.append(hoursAgo(2), [makeMetric({ usagePercent: 20 })]);
      repo.append(hoursAgo(1), [makeMetric({ usagePercent: 30 })]);

      const points = repo.query('/', 24, NOW);

      expect(points).toEqual([
        {
          timestamp: '2026-03-10T10:00:00.000Z',
          usagePercent: 20,
          usedBytes: 50 * 1024 ** 3,
          totalBytes: 100 * 1024 ** 3,
        },
        {
          timestamp: '2026-03-10T11:00:00.000Z',
          usagePercent: 30,
          usedBytes: 50 * 1024 ** 3,
          totalBytes: 100 * 1024 ** 3,
        },
      ]);
    });

    it('should order by timestamp regardless of insertion order', () => {
      repo.append(hoursAgo(1), [makeMetric({ usagePercent: 30 })]);
      repo.append(hoursAgo(3), [makeMetric({ usagePercent: 10 })]);
      repo.append(hoursAgo(2), [makeMetric({ usagePercent: 20 })]);

      expect(repo.query('/', 24, NOW).map((p) => p.usagePercent)).toEqual([10, 20, 30]);
    });

    it('should exclude a point exactly at the window boundary', () => {
      repo.append(hoursAgo(24), [makeMetric({ usagePercent: 10 })]);
      repo.append(hoursAgo(23), [makeMetric({ usagePercent: 20 })]);

      expect(repo.query('/', 24, NOW).map((p) => p.usagePercent)).toEqual([20]);
    });

    it('should only return rows for the requested mountpoint', () => {
      repo.append(hoursAgo(1), [
        makeMetric({ mountpoint: '/', usagePercent: 40 }),
        makeMetric({ mountpoint: '/home', usagePercent: 70 }),
      ]);

      const points = repo.query('/home', 24, NOW);
      expect(points).toHaveLength(1);
      expect(points[0].usagePercent).toBe(70);
    });

    it('should return an empty list for an unknown mountpoint', () => {
      repo.append(hoursAgo(1), [makeMetric()]);

      expect(repo.query('/nope', 24, NOW)).toEqual([]);
    });

    it('should return the same result when queried twice', () => {
      repo.append(hoursAgo(2), [makeMetric({ usagePercent: 20 })]);
      repo.append(hoursAgo(1), [makeMetric({ usagePercent: 30 })]);

      expect(repo.query('/', 24, NOW)).toEqual(repo.query('/', 24, NOW));
    });

    it('should widen the window with more hours', () => {
      repo.append(hoursAgo(30), [makeMetric({ usagePercent: 10 })]);
      repo.append(hoursAgo(1), [makeMetric({ usagePercent: 30 })]);

      expect(repo.query('/', 48, NOW)).toHaveLength(2);
      expect(repo.query('/', 1, NOW)).toHaveLength(0);
    });

    it('should reject hours outside 1-8760', () => {
      expect(() => repo.query('/', 0, NOW)).toThrow(RangeError);
      expect(() => repo.query('/', 8761, NOW)).toThrow(RangeError);
      expect(() => repo.query('/', 1.5, NOW)).toThrow(RangeError);
    });

    it('should accept the bounds of the hours range', () => {
      expect(repo.query('/', 1, NOW)).toEqual([]);
      expect(repo.query('/', 8760, NOW)).toEqual([]);
    });
  });

  describe('listMountpoints', () => {
    it('should return distinct mountpoints sorted', () => {
      repo.append(hoursAgo(2), [makeMetric({ mountpoint: '/var' }), makeMetric({ mountpoint: '/' })]);
      repo.append(hoursAgo(1), [makeMetric({ mountpoint: '/home' }), makeMetric({ mountpoint: '/' })]);

      expect(repo.listMountpoints()).toEqual(['/', '/home', '/var']);
    });

    it('should return an empty list for an empty store', () => {
      expect(repo.listMountpoints()).toEqual([]);
    });
  });

  describe('getLatestTimestamp', () => {
    it('should return null when nothing was stored for the host', () => {
      repo.append(NOW, [makeMetric({ hostname: 'other-host' })]);

      expect(repo.getLatestTimestamp('test-host')).toBeNull();
    });

    it('should return the newest cycle timestamp for the host', () => {
      repo.append(hoursAgo(3), [makeMetric()]);
      repo.append(hoursAgo(1), [makeMetric()]);
      repo.append(NOW, [makeMetric({ hostname: 'other-host' })]);

      expect(repo.getLatestTimestamp('test-host')).toEqual(hoursAgo(1));
    });
  });
});
