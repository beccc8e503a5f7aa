import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { Mock } from 'vitest';
import type { Alert } from '@diskwatch/shared';
import { EventBus } from '../events/EventBus.js';
import { AlertNotifier, formatAlertText } from '../alerts/AlertNotifier.js';

const WEBHOOK_URL = 'https://hooks.example.test/diskwatch';

const alert: Alert = {
  id: 3,
  timestamp: '2026-03-10T12:00:00.000Z',
  hostname: 'test-host',
  mountpoint: '/data',
  usagePercent: 93,
  threshold: 90,
  acknowledged: false,
};

describe('formatAlertText', () => {
  it('should describe the volume, usage and threshold', () => {
    expect(formatAlertText(alert)).toBe('Disk usage on test-host:/data is 93.0% (threshold 90%)');
  });
});

describe('AlertNotifier', () => {
  let eventBus: EventBus;
  let fetchMock: Mock<typeof fetch>;
  let notifier: AlertNotifier;

  beforeEach(() => {
    eventBus = new EventBus();
    fetchMock = vi.fn<typeof fetch>().mockResolvedValue(new Response('', { status: 200 }));
    notifier = new AlertNotifier(eventBus, { webhookUrl: WEBHOOK_URL, fetch: fetchMock });
  });

  describe('notify', () => {
    it('should POST the alert as JSON', async () => {
      await expect(notifier.notify(alert)).resolves.toBe(true);

      expect(fetchMock).toHaveBeenCalledOnce();
      const [url, init] = fetchMock.mock.calls[0];
      expect(url).toBe(WEBHOOK_URL);
      expect(init?.method).toBe('POST');
      expect(init?.headers).toEqual({ 'Content-Type': 'application/json' });
      expect(init?.signal).toBeInstanceOf(AbortSignal);
      expect(JSON.parse(String(init?.body))).toEqual({
        event: 'disk.alert',
        text: 'Disk usage on test-host:/data is 93.0% (threshold 90%)',
        alert,
      });
    });

    it('should resolve false when the webhook answers with an error status', async () => {
      fetchMock.mockResolvedValue(new Response('bad gateway', { status: 502 }));

      await expect(notifier.notify(alert)).resolves.toBe(false);
    });

    it('should resolve false when the request fails', async () => {
      fetchMock.mockRejectedValue(new TypeError('fetch failed'));

      await expect(notifier.notify(alert)).resolves.toBe(false);
    });
  });

  describe('attach / detach', () => {
    it('should notify on every raised alert once attached', () => {
      notifier.attach();

      eventBus.emit('alert:raised', alert);
      eventBus.emit('alert:raised', { ...alert, id: 4 });

      expect(fetchMock).toHaveBeenCalledTimes(2);
    });

    it('should only subscribe once when attached twice', () => {
      notifier.attach();
      notifier.attach();

      expect(eventBus.listenerCount('alert:raised')).toBe(1);
    });

    it('should stop notifying after detach', () => {
      notifier.attach();
      notifier.detach();

      eventBus.emit('alert:raised', alert);

      expect(fetchMock).not.toHaveBeenCalled();
      expect(eventBus.listenerCount('alert:raised')).toBe(0);
    });
  });
});
