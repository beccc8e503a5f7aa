import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type BetterSqlite3 from 'better-sqlite3';
import { openDatabase } from '../db/Database.js';
import { AlertRepository } from '../db/repositories/AlertRepository.js';
import { AlertEngine, findBreaches } from '../alerts/AlertEngine.js';
import { makeMetric } from './helpers/fixtures.js';

const NOW = new Date('2026-03-10T12:00:00.000Z');

describe('findBreaches', () => {
  it('should return one alert per metric at or above the threshold', () => {
    const breaches = findBreaches(
      [
        makeMetric({ mountpoint: '/', usagePercent: 50 }),
        makeMetric({ mountpoint: '/home', usagePercent: 90 }),
        makeMetric({ mountpoint: '/var', usagePercent: 92.5 }),
      ],
      90,
      NOW,
    );

    expect(breaches).toEqual([
      { timestamp: NOW, hostname: 'test-host', mountpoint: '/home', usagePercent: 90, threshold: 90 },
      { timestamp: NOW, hostname: 'test-host', mountpoint: '/var', usagePercent: 92.5, threshold: 90 },
    ]);
  });

  it('should return nothing when every volume is below the threshold', () => {
    expect(findBreaches([makeMetric({ usagePercent: 89.9 })], 90, NOW)).toEqual([]);
  });

  it('should alert on every volume with a threshold of 0', () => {
    expect(findBreaches([makeMetric({ usagePercent: 0 })], 0, NOW)).toHaveLength(1);
  });
});

describe('AlertEngine', () => {
  let db: BetterSqlite3.Database;
  let repo: AlertRepository;
  let engine: AlertEngine;

  beforeEach(() => {
    db = openDatabase(':memory:');
    repo = new AlertRepository(db);
    engine = new AlertEngine(repo, 90);
  });

  afterEach(() => {
    db.close();
  });

  it('should expose the configured threshold', () => {
    expect(engine.threshold).toBe(90);
  });

  describe('evaluate', () => {
    it('should persist a single alert for a 92% volume with threshold 90', () => {
      const alerts = engine.evaluate([makeMetric({ usagePercent: 92 })], NOW);

      expect(alerts).toEqual([
        {
          id: 1,
          timestamp: '2026-03-10T12:00:00.000Z',
          hostname: 'test-host',
          mountpoint: '/',
          usagePercent: 92,
          threshold: 90,
          acknowledged: false,
        },
      ]);
      expect(repo.count()).toBe(1);
    });

    it('should not persist anything below the threshold', () => {
      expect(engine.evaluate([makeMetric({ usagePercent: 85 })], NOW)).toEqual([]);
      expect(repo.count()).toBe(0);
    });

    it('should raise a new alert on every cycle while usage stays high', () => {
      engine.evaluate([makeMetric({ usagePercent: 95 })], NOW);
      engine.evaluate([makeMetric({ usagePercent: 95 })], new Date(NOW.getTime() + 1000));

      expect(repo.count()).toBe(2);
    });
  });

  describe('list', () => {
    beforeEach(() => {
      engine.evaluate(
        [
          makeMetric({ mountpoint: '/', usagePercent: 91 }),
          makeMetric({ mountpoint: '/home', usagePercent: 92 }),
          makeMetric({ mountpoint: '/var', usagePercent: 93 }),
        ],
        NOW,
      );
    });

    it('should return the most recent alerts first', () => {
      expect(engine.list().map((a) => a.id)).toEqual([3, 2, 1]);
    });

    it('should honor the limit', () => {
      expect(engine.list(2).map((a) => a.mountpoint)).toEqual(['/var', '/home']);
    });

    it('should reject limits outside 1-500', () => {
      expect(() => engine.list(0)).toThrow(RangeError);
      expect(() => engine.list(501)).toThrow(RangeError);
    });
  });

  describe('acknowledge', () => {
    it('should mark the alert acknowledged', () => {
      const [alert] = engine.evaluate([makeMetric({ usagePercent: 95 })], NOW);

      expect(engine.acknowledge(alert.id)).toEqual({ status: 'ok' });
      expect(repo.findById(alert.id)?.acknowledged).toBe(true);
    });

    it('should be idempotent', () => {
      const [alert] = engine.evaluate([makeMetric({ usagePercent: 95 })], NOW);

      engine.acknowledge(alert.id);
      expect(engine.acknowledge(alert.id)).toEqual({ status: 'ok' });
      expect(repo.findById(alert.id)?.acknowledged).toBe(true);
      expect(repo.count()).toBe(1);
    });

    it('should succeed for an unknown id without changing any row', () => {
      const [alert] = engine.evaluate([makeMetric({ usagePercent: 95 })], NOW);

      expect(engine.acknowledge(999)).toEqual({ status: 'ok' });
      expect(repo.acknowledge(999)).toBe(0);
      expect(repo.findById(alert.id)?.acknowledged).toBe(false);
      expect(repo.count()).toBe(1);
    });
  });
});

describe('AlertRepository', () => {
  let db: BetterSqlite3.Database;
  let repo: AlertRepository;

  beforeEach(() => {
    db = openDatabase(':memory:');
    repo = new AlertRepository(db);
  });

  afterEach(() => {
    db.close();
  });

  it('should assign increasing ids on insert', () => {
    const first = repo.insert({
      timestamp: NOW,
      hostname: 'test-host',
      mountpoint: '/',
      usagePercent: 91,
      threshold: 90,
    });
    const second = repo.insert({
      timestamp: NOW,
      hostname: 'test-host',
      mountpoint: '/home',
      usagePercent: 96,
      threshold: 90,
    });

    expect(first.id).toBe(1);
    expect(second.id).toBe(2);
  });

  it('should read back what was inserted', () => {
    const inserted = repo.insert({
      timestamp: NOW,
      hostname: 'test-host',
      mountpoint: '/data',
      usagePercent: 97.3,
      threshold: 90,
    });

    expect(repo.findById(inserted.id)).toEqual(inserted);
  });

  it('should return undefined for a missing id', () => {
    expect(repo.findById(42)).toBeUndefined();
  });
});
