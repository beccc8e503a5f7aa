import { EventEmitter } from 'node:events';
import { nanoid } from 'nanoid';
import type { Alert, CycleSummary, EventBusMessage, SubscriberEvent } from '@diskwatch/shared';

type EventMap = {
  'cycle:complete': CycleSummary;
  'alert:raised': Alert;
  'subscriber:connect': SubscriberEvent;
  'subscriber:disconnect': SubscriberEvent;
};

type EventName = keyof EventMap;

export class EventBus {
  private emitter: EventEmitter;

  constructor() {
    this.emitter = new EventEmitter();
    this.emitter.setMaxListeners(100);
  }

  emit<K extends EventName>(event: K, data: EventMap[K]): void {
    this.emitter.emit(event, data);
    // Also emit a generic message for listeners that want everything
    const message: EventBusMessage = {
      id: nanoid(),
      type: event,
      timestamp: new Date(),
      data,
    };
    this.emitter.emit('*', message);
  }

  on<K extends EventName>(event: K, handler: (data: EventMap[K]) => void): void {
    this.emitter.on(event, handler);
  }

  once<K extends EventName>(event: K, handler: (data: EventMap[K]) => void): void {
    this.emitter.once(event, handler);
  }

  off<K extends EventName>(event: K, handler: (data: EventMap[K]) => void): void {
    this.emitter.off(event, handler);
  }

  onAny(handler: (message: EventBusMessage) => void): void {
    this.emitter.on('*', handler);
  }

  offAny(handler: (message: EventBusMessage) => void): void {
    this.emitter.off('*', handler);
  }

  listenerCount(event: EventName | '*'): number {
    return this.emitter.listenerCount(event);
  }

  removeAllListeners(): void {
    this.emitter.removeAllListeners();
  }
}
