import type { VolumeMetric } from './volume.js';

/** Payload pushed to every live subscriber once per cycle. */
export interface UpdateMessage {
  type: 'update';
  disks: VolumeMetric[];
  timestamp: string;
}

export interface CycleSummary {
  timestamp: string;
  source: string | null;
  volumes: number;
  alerts: number;
  delivered: number;
  dropped: number;
  durationMs: number;
}

export interface SubscriberEvent {
  subscriberId: string;
  subscribers: number;
}

/** Envelope delivered to catch-all listeners for every bus event. */
export interface EventBusMessage {
  id: string;
  type: string;
  timestamp: Date;
  data: unknown;
}
