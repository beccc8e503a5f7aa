import { hostname as osHostname } from 'node:os';
import type { VolumeMetric } from '@diskwatch/shared';
import { roundPercent } from '@diskwatch/shared';
import type { FallbackVolumeSource } from './VolumeSource.js';

const GIB = 1024 ** 3;

export const SYNTHETIC_MOUNTPOINTS = ['/', '/home', '/var', '/tmp', '/boot', '/data'] as const;

export interface SyntheticVolumeSourceOptions {
  hostname?: string;
  /** Uniform random source in [0, 1). */
  random?: () => number;
}

/**
 * Generates plausible readings for a fixed set of mountpoints so a cycle
 * always has data when no real source works (containers, unsupported OSes).
 */
export class SyntheticVolumeSource implements FallbackVolumeSource {
  readonly name = 'synthetic';
  private hostname: string;
  private random: () => number;

  constructor(options: SyntheticVolumeSourceOptions = {}) {
    this.hostname = options.hostname ?? osHostname();
    this.random = options.random ?? Math.random;
  }

  generate(): VolumeMetric[] {
    return SYNTHETIC_MOUNTPOINTS.map((mountpoint, index) => {
      // 50-2000 GiB, 15-95% used
      const totalBytes = (50 + Math.floor(this.random() * 1951)) * GIB;
      const percent = 15 + this.random() * 80;
      const usedBytes = Math.floor((totalBytes * percent) / 100);

      return {
        hostname: this.hostname,
        mountpoint,
        device: `/dev/sd${'abcdef'[index]}1`,
        fstype: 'ext4',
        totalBytes,
        usedBytes,
        freeBytes: totalBytes - usedBytes,
        usagePercent: roundPercent(percent),
      };
    });
  }
}
