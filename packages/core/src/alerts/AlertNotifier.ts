import type { Alert } from '@diskwatch/shared';
import { DEFAULT_WEBHOOK_TIMEOUT, getLogger } from '@diskwatch/shared';
import type { EventBus } from '../events/EventBus.js';

const logger = getLogger();

export interface WebhookPayload {
  event: 'disk.alert';
  text: string;
  alert: Alert;
}

export interface AlertNotifierOptions {
  webhookUrl: string;
  timeout?: number;
  fetch?: typeof fetch;
}

export function formatAlertText(alert: Alert): string {
  return (
    `Disk usage on ${alert.hostname}:${alert.mountpoint} is ` +
    `${alert.usagePercent.toFixed(1)}% (threshold ${alert.threshold}%)`
  );
}

/**
 * Posts every raised alert to a webhook. Delivery failures are logged and
 * never propagate into the monitoring cycle.
 */
export class AlertNotifier {
  private eventBus: EventBus;
  private webhookUrl: string;
  private timeout: number;
  private fetchImpl: typeof fetch;
  private attached = false;

  private readonly handler = (alert: Alert): void => {
    void this.notify(alert);
  };

  constructor(eventBus: EventBus, options: AlertNotifierOptions) {
    this.eventBus = eventBus;
    this.webhookUrl = options.webhookUrl;
    this.timeout = options.timeout ?? DEFAULT_WEBHOOK_TIMEOUT;
    this.fetchImpl = options.fetch ?? fetch;
  }

  attach(): void {
    if (this.attached) return;
    this.eventBus.on('alert:raised', this.handler);
    this.attached = true;
    logger.info('Alert webhook notifier attached');
  }

  detach(): void {
    if (!this.attached) return;
    this.eventBus.off('alert:raised', this.handler);
    this.attached = false;
  }

  /** Resolves true when the webhook answered with a 2xx status. */
  async notify(alert: Alert): Promise<boolean> {
    const payload: WebhookPayload = {
      event: 'disk.alert',
      text: formatAlertText(alert),
      alert,
    };

    try {
      const response = await this.fetchImpl(this.webhookUrl, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(payload),
        signal: AbortSignal.timeout(this.timeout),
      });

      if (!response.ok) {
        const body = await response.text();
        logger.error({ status: response.status, body }, 'Alert webhook rejected notification');
        return false;
      }

      logger.debug({ alertId: alert.id }, 'Alert webhook notification sent');
      return true;
    } catch (err) {
      logger.error({ err, alertId: alert.id }, 'Error sending alert webhook notification');
      return false;
    }
  }
}
