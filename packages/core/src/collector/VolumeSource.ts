import type { VolumeMetric } from '@diskwatch/shared';

/**
 * A provider of volume readings. `read` may reject or resolve empty; the
 * collector then moves on to the next provider.
 */
export interface VolumeSource {
  readonly name: string;
  read(): Promise<VolumeMetric[]>;
}

/** Last-resort provider. Synchronous and infallible by contract. */
export interface FallbackVolumeSource {
  readonly name: string;
  generate(): VolumeMetric[];
}
