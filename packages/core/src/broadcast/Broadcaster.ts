import { nanoid } from 'nanoid';
import type { UpdateMessage } from '@diskwatch/shared';
import { DEFAULT_DELIVERY_TIMEOUT, DeliveryTimeoutError, getLogger } from '@diskwatch/shared';

const logger = getLogger();

/** Transport for one live-update consumer. */
export interface Subscriber {
  /** Resolves once the payload has been handed to the transport. */
  send(payload: string): Promise<void>;
  close(): void;
}

export interface SubscriberHandle {
  readonly id: string;
}

export interface PublishResult {
  delivered: number;
  dropped: number;
}

export interface BroadcasterOptions {
  /** Upper bound for a single delivery, in milliseconds. */
  deliveryTimeout?: number;
}

/**
 * Owns the registry of live subscribers and fans out update messages.
 *
 * Deliveries run concurrently and each is bounded by the delivery timeout.
 * A subscriber whose delivery fails or times out is removed and closed;
 * nobody else is affected. Messages reach each subscriber in publish order.
 */
export class Broadcaster {
  private subscribers: Map<string, Subscriber> = new Map();
  private deliveryTimeout: number;

  constructor(options: BroadcasterOptions = {}) {
    this.deliveryTimeout = options.deliveryTimeout ?? DEFAULT_DELIVERY_TIMEOUT;
  }

  get size(): number {
    return this.subscribers.size;
  }

  register(subscriber: Subscriber): SubscriberHandle {
    const handle: SubscriberHandle = { id: nanoid() };
    this.subscribers.set(handle.id, subscriber);
    logger.debug({ subscriber: handle.id, total: this.subscribers.size }, 'Subscriber registered');
    return handle;
  }

  unregister(handle: SubscriberHandle): boolean {
    const removed = this.subscribers.delete(handle.id);
    if (removed) {
      logger.debug(
        { subscriber: handle.id, total: this.subscribers.size },
        'Subscriber unregistered',
      );
    }
    return removed;
  }

  has(handle: SubscriberHandle): boolean {
    return this.subscribers.has(handle.id);
  }

  async publish(message: UpdateMessage): Promise<PublishResult> {
    // Iterate a copy: register/unregister may run while deliveries are pending
    const targets = Array.from(this.subscribers.entries());
    if (targets.length === 0) return { delivered: 0, dropped: 0 };

    const payload = JSON.stringify(message);
    const results = await Promise.allSettled(
      targets.map(([id, subscriber]) => this.deliver(id, subscriber, payload)),
    );

    let delivered = 0;
    let dropped = 0;
    results.forEach((result, index) => {
      const [id, subscriber] = targets[index];
      if (result.status === 'fulfilled') {
        delivered++;
      } else {
        dropped++;
        this.drop(id, subscriber, result.reason);
      }
    });

    return { delivered, dropped };
  }

  closeAll(): void {
    for (const [id, subscriber] of this.subscribers) {
      this.closeQuietly(id, subscriber);
    }
    this.subscribers.clear();
  }

  private deliver(id: string, subscriber: Subscriber, payload: string): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        reject(new DeliveryTimeoutError(id, this.deliveryTimeout));
      }, this.deliveryTimeout);

      Promise.resolve()
        .then(() => subscriber.send(payload))
        .then(
          () => {
            clearTimeout(timer);
            resolve();
          },
          (err: unknown) => {
            clearTimeout(timer);
            reject(err);
          },
        );
    });
  }

  private drop(id: string, subscriber: Subscriber, reason: unknown): void {
    // Only remove the entry if it still belongs to this subscriber
    if (this.subscribers.get(id) === subscriber) {
      this.subscribers.delete(id);
    }
    logger.info(
      { subscriber: id, err: reason, total: this.subscribers.size },
      'Dropping subscriber after failed delivery',
    );
    this.closeQuietly(id, subscriber);
  }

  private closeQuietly(id: string, subscriber: Subscriber): void {
    try {
      subscriber.close();
    } catch (err) {
      logger.debug({ err, subscriber: id }, 'Error closing subscriber');
    }
  }
}
