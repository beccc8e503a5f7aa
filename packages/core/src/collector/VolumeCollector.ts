import type { VolumeMetric } from '@diskwatch/shared';
import { DEFAULT_DUF_COMMAND, DEFAULT_DUF_TIMEOUT, getLogger, roundPercent } from '@diskwatch/shared';
import type { FallbackVolumeSource, VolumeSource } from './VolumeSource.js';
import { NativeVolumeSource } from './NativeVolumeSource.js';
import { DufVolumeSource } from './DufVolumeSource.js';
import { SyntheticVolumeSource } from './SyntheticVolumeSource.js';

const logger = getLogger();

export interface CollectorOptions {
  hostname?: string;
  dufCommand?: string;
  dufTimeout?: number;
}

/**
 * Samples volume usage through an ordered chain of sources. The first source
 * to resolve with a non-empty list wins; when every source fails the
 * fallback generates data, so `sample` never rejects and never returns an
 * empty list.
 */
export class VolumeCollector {
  private sources: VolumeSource[];
  private fallback: FallbackVolumeSource;
  private lastSource: string | null = null;

  constructor(sources: VolumeSource[], fallback: FallbackVolumeSource = new SyntheticVolumeSource()) {
    this.sources = sources;
    this.fallback = fallback;
  }

  static create(options: CollectorOptions = {}): VolumeCollector {
    const { hostname } = options;
    return new VolumeCollector(
      [
        new NativeVolumeSource({ hostname }),
        new DufVolumeSource({
          hostname,
          command: options.dufCommand ?? DEFAULT_DUF_COMMAND,
          timeout: options.dufTimeout ?? DEFAULT_DUF_TIMEOUT,
        }),
      ],
      new SyntheticVolumeSource({ hostname }),
    );
  }

  /** Name of the source that produced the most recent sample. */
  getLastSource(): string | null {
    return this.lastSource;
  }

  async sample(): Promise<VolumeMetric[]> {
    for (const source of this.sources) {
      try {
        const metrics = await source.read();
        if (metrics.length > 0) {
          this.useSource(source.name);
          return metrics.map(normalize);
        }
        logger.debug({ source: source.name }, 'Volume source returned no volumes');
      } catch (err) {
        logger.debug({ err, source: source.name }, 'Volume source failed, trying next');
      }
    }

    this.useSource(this.fallback.name);
    return this.fallback.generate().map(normalize);
  }

  private useSource(name: string): void {
    if (this.lastSource !== name) {
      logger.info({ source: name, previous: this.lastSource }, 'Volume source selected');
      this.lastSource = name;
    }
  }
}

function normalize(metric: VolumeMetric): VolumeMetric {
  return { ...metric, usagePercent: roundPercent(metric.usagePercent) };
}
