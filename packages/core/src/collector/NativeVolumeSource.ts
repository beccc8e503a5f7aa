import { readFile, statfs as fsStatfs } from 'node:fs/promises';
import { hostname as osHostname } from 'node:os';
import type { VolumeMetric } from '@diskwatch/shared';
import { SourceUnavailableError, getLogger, roundPercent } from '@diskwatch/shared';
import type { VolumeSource } from './VolumeSource.js';

const logger = getLogger();

export interface VolumeStats {
  bsize: number;
  blocks: number;
  bfree: number;
  bavail: number;
}

export interface MountEntry {
  device: string;
  mountpoint: string;
  fstype: string;
}

export interface NativeVolumeSourceOptions {
  hostname?: string;
  mountsFile?: string;
  statfs?: (path: string) => Promise<VolumeStats>;
}

// Filesystems without a block device path that still hold real data
const DEVICELESS_FSTYPES = new Set(['zfs', 'btrfs']);
// Read-only images that always report 100% and would only produce noise
const IGNORED_FSTYPES = new Set(['squashfs']);

function decodeMountField(value: string): string {
  return value.replace(/\\([0-7]{3})/g, (_match, octal: string) =>
    String.fromCharCode(parseInt(octal, 8)),
  );
}

/**
 * Parse a `/proc/mounts`-style table and keep physical filesystems, one entry
 * per mountpoint (first occurrence wins).
 */
export function parseMountTable(content: string): MountEntry[] {
  const seen = new Set<string>();
  const entries: MountEntry[] = [];

  for (const line of content.split('\n')) {
    const fields = line.trim().split(/\s+/);
    if (fields.length < 3) continue;

    const [rawDevice, rawMountpoint, fstype] = fields;
    const device = decodeMountField(rawDevice);
    const mountpoint = decodeMountField(rawMountpoint);

    const physical = device.startsWith('/') || DEVICELESS_FSTYPES.has(fstype);
    if (!physical || IGNORED_FSTYPES.has(fstype)) continue;
    if (seen.has(mountpoint)) continue;

    seen.add(mountpoint);
    entries.push({ device, mountpoint, fstype });
  }

  return entries;
}

/**
 * Enumerates mounted volumes from the kernel mount table and reads each with
 * statfs. A volume that cannot be read is skipped.
 */
export class NativeVolumeSource implements VolumeSource {
  readonly name = 'native';
  private hostname: string;
  private mountsFile: string;
  private statfs: (path: string) => Promise<VolumeStats>;

  constructor(options: NativeVolumeSourceOptions = {}) {
    this.hostname = options.hostname ?? osHostname();
    this.mountsFile = options.mountsFile ?? '/proc/mounts';
    this.statfs = options.statfs ?? ((path) => fsStatfs(path));
  }

  async read(): Promise<VolumeMetric[]> {
    let table: string;
    try {
      table = await readFile(this.mountsFile, 'utf8');
    } catch (err) {
      throw new SourceUnavailableError(
        this.name,
        err instanceof Error ? err.message : String(err),
      );
    }

    const metrics: VolumeMetric[] = [];
    for (const mount of parseMountTable(table)) {
      try {
        const metric = this.toMetric(mount, await this.statfs(mount.mountpoint));
        if (metric) metrics.push(metric);
      } catch (err) {
        logger.debug({ err, mountpoint: mount.mountpoint }, 'Skipping unreadable volume');
      }
    }
    return metrics;
  }

  private toMetric(mount: MountEntry, stats: VolumeStats): VolumeMetric | null {
    if (stats.blocks === 0) return null;

    // Counts are taken to be in bsize units, which holds where the block and
    // fragment sizes match (ext4, xfs, btrfs)
    const totalBytes = stats.blocks * stats.bsize;
    const usedBytes = (stats.blocks - stats.bfree) * stats.bsize;
    const freeBytes = stats.bavail * stats.bsize;
    // df convention: blocks reserved for root count as neither used nor free
    const usable = usedBytes + freeBytes;

    return {
      hostname: this.hostname,
      mountpoint: mount.mountpoint,
      device: mount.device,
      fstype: mount.fstype,
      totalBytes,
      usedBytes,
      freeBytes,
      usagePercent: usable > 0 ? roundPercent((usedBytes / usable) * 100) : 0,
    };
  }
}
