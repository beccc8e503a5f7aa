import type { Alert, CycleSummary, UpdateMessage, VolumeMetric } from '@diskwatch/shared';
import { getLogger } from '@diskwatch/shared';
import type { VolumeCollector } from '../collector/VolumeCollector.js';
import type { SnapshotRepository } from '../db/repositories/SnapshotRepository.js';
import type { AlertEngine } from '../alerts/AlertEngine.js';
import type { Broadcaster, PublishResult } from '../broadcast/Broadcaster.js';
import type { EventBus } from '../events/EventBus.js';

const logger = getLogger();

export interface MonitorSchedulerDeps {
  collector: VolumeCollector;
  snapshots: SnapshotRepository;
  alertEngine: AlertEngine;
  broadcaster: Broadcaster;
  eventBus: EventBus;
}

export interface CycleResult {
  timestamp: Date;
  metrics: VolumeMetric[];
  alerts: Alert[];
  delivery: PublishResult;
}

/**
 * Drives the sample → persist → evaluate → broadcast loop.
 *
 * The wait between cycles is measured from the end of one cycle to the start
 * of the next. A failed cycle is logged and the loop carries on with the
 * same interval.
 */
export class MonitorScheduler {
  private deps: MonitorSchedulerDeps;
  private interval: number;
  private clock: () => Date;
  private timer: NodeJS.Timeout | null = null;
  private running = false;
  private cycleInFlight = false;
  private lastTimestamp: Date | null = null;

  constructor(deps: MonitorSchedulerDeps, interval: number, clock: () => Date = () => new Date()) {
    this.deps = deps;
    this.interval = interval;
    this.clock = clock;
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    logger.info({ interval: this.interval }, 'Monitor scheduler started');
    // A cycle left over from before a stop() picks the loop back up when it ends
    if (this.cycleInFlight) return;
    void this.tick();
  }

  /** Stops scheduling further cycles. A cycle already in progress completes. */
  stop(): void {
    if (!this.running) return;
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    logger.info('Monitor scheduler stopped');
  }

  /** Continue the timestamp sequence from data stored by an earlier run. */
  resumeFrom(timestamp: Date | null): void {
    this.lastTimestamp = timestamp;
  }

  isRunning(): boolean {
    return this.running;
  }

  async runCycle(): Promise<CycleResult> {
    const { collector, snapshots, alertEngine, broadcaster, eventBus } = this.deps;
    const startedAt = Date.now();
    const timestamp = this.nextTimestamp();

    const metrics = await collector.sample();
    snapshots.append(timestamp, metrics);

    const alerts = alertEngine.evaluate(metrics, timestamp);
    for (const alert of alerts) {
      eventBus.emit('alert:raised', alert);
    }

    const message: UpdateMessage = {
      type: 'update',
      disks: metrics,
      timestamp: timestamp.toISOString(),
    };
    const delivery = await broadcaster.publish(message);

    const summary: CycleSummary = {
      timestamp: message.timestamp,
      source: collector.getLastSource(),
      volumes: metrics.length,
      alerts: alerts.length,
      delivered: delivery.delivered,
      dropped: delivery.dropped,
      durationMs: Date.now() - startedAt,
    };
    eventBus.emit('cycle:complete', summary);
    logger.debug(summary, 'Monitor cycle complete');

    return { timestamp, metrics, alerts, delivery };
  }

  /** Wall-clock time, held back to the previous cycle if the clock stepped backwards. */
  private nextTimestamp(): Date {
    const now = this.clock();
    if (this.lastTimestamp && now.getTime() < this.lastTimestamp.getTime()) {
      return new Date(this.lastTimestamp.getTime());
    }
    this.lastTimestamp = now;
    return now;
  }

  private async tick(): Promise<void> {
    this.cycleInFlight = true;
    try {
      await this.runCycle();
    } catch (err) {
      logger.error({ err }, 'Monitor cycle failed');
    } finally {
      this.cycleInFlight = false;
      this.scheduleNext();
    }
  }

  private scheduleNext(): void {
    if (!this.running || this.timer) return;
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.tick();
    }, this.interval);
    this.timer.unref();
  }
}
