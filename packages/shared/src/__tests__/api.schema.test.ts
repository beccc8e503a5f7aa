import { describe, it, expect } from 'vitest';
import { alertListSchema, apiErrorSchema, usageHistorySchema } from '../schemas/api.schema.js';

describe('alertListSchema', () => {
  it('should accept alerts as served by the API', () => {
    const alerts = [
      {
        id: 1,
        timestamp: '2026-03-10T12:00:00.000Z',
        hostname: 'test-host',
        mountpoint: '/',
        usagePercent: 93,
        threshold: 90,
        acknowledged: false,
      },
    ];

    expect(alertListSchema.parse(alerts)).toEqual(alerts);
  });

  it('should reject an acknowledged flag stored as a number', () => {
    const result = alertListSchema.safeParse([
      {
        id: 1,
        timestamp: '2026-03-10T12:00:00.000Z',
        hostname: 'test-host',
        mountpoint: '/',
        usagePercent: 93,
        threshold: 90,
        acknowledged: 0,
      },
    ]);

    expect(result.success).toBe(false);
  });
});

describe('usageHistorySchema', () => {
  it('should accept an empty series', () => {
    expect(usageHistorySchema.parse({ mountpoint: '/nope', hours: 24, data: [] })).toEqual({
      mountpoint: '/nope',
      hours: 24,
      data: [],
    });
  });
});

describe('apiErrorSchema', () => {
  it('should require an error message', () => {
    expect(apiErrorSchema.safeParse({ error: 'limit: Expected number, received nan' }).success).toBe(
      true,
    );
    expect(apiErrorSchema.safeParse({ message: 'nope' }).success).toBe(false);
  });
});
