import type { AcknowledgeResult, Alert, NewAlert, VolumeMetric } from '@diskwatch/shared';
import {
  DEFAULT_ALERT_LIMIT,
  MAX_ALERT_LIMIT,
  MIN_ALERT_LIMIT,
  getLogger,
} from '@diskwatch/shared';
import type { AlertRepository } from '../db/repositories/AlertRepository.js';

const logger = getLogger();

/**
 * One alert per volume whose usage meets or exceeds the threshold. Pure: no
 * state is carried between cycles, so a volume that stays above the
 * threshold alerts on every cycle.
 */
export function findBreaches(
  metrics: VolumeMetric[],
  threshold: number,
  timestamp: Date,
): NewAlert[] {
  return metrics
    .filter((metric) => metric.usagePercent >= threshold)
    .map((metric) => ({
      timestamp,
      hostname: metric.hostname,
      mountpoint: metric.mountpoint,
      usagePercent: metric.usagePercent,
      threshold,
    }));
}

export class AlertEngine {
  private alertRepo: AlertRepository;
  private readonly alertThreshold: number;

  constructor(alertRepo: AlertRepository, threshold: number) {
    this.alertRepo = alertRepo;
    this.alertThreshold = threshold;
  }

  get threshold(): number {
    return this.alertThreshold;
  }

  /** Evaluate a cycle and persist any resulting alerts. */
  evaluate(metrics: VolumeMetric[], timestamp: Date): Alert[] {
    const breaches = findBreaches(metrics, this.alertThreshold, timestamp);
    if (breaches.length === 0) return [];

    const alerts = this.alertRepo.insertBatch(breaches);
    for (const alert of alerts) {
      logger.warn(
        {
          mountpoint: alert.mountpoint,
          usagePercent: alert.usagePercent,
          threshold: alert.threshold,
        },
        'Disk usage threshold exceeded',
      );
    }
    return alerts;
  }

  list(limit: number = DEFAULT_ALERT_LIMIT): Alert[] {
    if (!Number.isInteger(limit) || limit < MIN_ALERT_LIMIT || limit > MAX_ALERT_LIMIT) {
      throw new RangeError(
        `limit must be an integer between ${MIN_ALERT_LIMIT} and ${MAX_ALERT_LIMIT}, got ${limit}`,
      );
    }
    return this.alertRepo.getRecent(limit);
  }

  /**
   * Idempotent. An unknown id is a no-op and still reports success.
   */
  acknowledge(id: number): AcknowledgeResult {
    const matched = this.alertRepo.acknowledge(id);
    if (matched === 0) {
      logger.debug({ id }, 'Acknowledge for unknown alert ignored');
    }
    return { status: 'ok' };
  }
}
