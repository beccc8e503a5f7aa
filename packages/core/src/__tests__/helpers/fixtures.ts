import type { VolumeMetric } from '@diskwatch/shared';

const GIB = 1024 ** 3;

export function makeMetric(overrides: Partial<VolumeMetric> = {}): VolumeMetric {
  return {
    hostname: 'test-host',
    mountpoint: '/',
    device: '/dev/sda1',
    fstype: 'ext4',
    totalBytes: 100 * GIB,
    usedBytes: 50 * GIB,
    freeBytes: 50 * GIB,
    usagePercent: 50,
    ...overrides,
  };
}
