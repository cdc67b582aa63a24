/**
 * Typed Event Bus
 * Pub/sub over EventEmitter with a payload type per event. A failing
 * subscriber is logged and never reaches the publisher.
 */
import { EventEmitter } from 'events';
import { logger } from './Logger.js';
import type { BatchSummary, DomainStatus, DnsRecordType } from '../types/index.js';

export const EventTypes = {
  // Bulk runs
  BULK_RUN_STARTED: 'bulk:run:started',
  BULK_RUN_COMPLETED: 'bulk:run:completed',
  BULK_DOMAIN_STARTED: 'bulk:domain:started',
  BULK_DOMAIN_COMPLETED: 'bulk:domain:completed',

  // Record changes
  DNS_RECORD_CREATED: 'dns:record:created',
  DNS_RECORD_UPDATED: 'dns:record:updated',
  DNS_RECORD_DELETED: 'dns:record:deleted',

  // Nameserver monitor
  NAMESERVERS_UPDATED: 'nameservers:updated',
  NAMESERVERS_CHECK_FAILED: 'nameservers:check:failed',

  ERROR_OCCURRED: 'error:occurred',
} as const;

export type EventType = (typeof EventTypes)[keyof typeof EventTypes];

interface RecordSummary {
  id?: string;
  name: string;
  type: DnsRecordType;
  content: string;
}

export interface EventPayloadMap {
  [EventTypes.BULK_RUN_STARTED]: { batchId: string; domains: string[]; kind: string };
  [EventTypes.BULK_RUN_COMPLETED]: { batchId: string; status: DomainStatus; summary: BatchSummary };
  [EventTypes.BULK_DOMAIN_STARTED]: { batchId: string; domain: string };
  [EventTypes.BULK_DOMAIN_COMPLETED]: {
    batchId: string;
    domain: string;
    status: DomainStatus;
    recordsDeleted: number;
    recordsCreated: number;
    recordsUpdated: number;
  };
  [EventTypes.DNS_RECORD_CREATED]: { domain: string; record: RecordSummary };
  [EventTypes.DNS_RECORD_UPDATED]: { domain: string; record: RecordSummary };
  [EventTypes.DNS_RECORD_DELETED]: { domain: string; record: RecordSummary };
  [EventTypes.NAMESERVERS_UPDATED]: { domain: string; nameservers: string[]; external: boolean };
  [EventTypes.NAMESERVERS_CHECK_FAILED]: { domain: string; error: string };
  [EventTypes.ERROR_OCCURRED]: { source: string; error: string; stack?: string };
}

export type EventHandler<T extends EventType> = (data: EventPayloadMap[T]) => void | Promise<void>;

export class EventBus {
  private readonly emitter = new EventEmitter();

  constructor(maxListeners: number = 50) {
    this.emitter.setMaxListeners(maxListeners);
  }

  /**
   * Register a handler; the returned function removes it again
   */
  subscribe<T extends EventType>(eventType: T, handler: EventHandler<T>): () => void {
    // `pending` is only passed by publishAsync, which waits for it
    const listener = (data: EventPayloadMap[T], pending?: Promise<void>[]): void => {
      const settled = this.invoke(eventType, handler, data);
      pending?.push(settled);
    };

    this.emitter.on(eventType, listener);
    logger.debug({ eventType, subscribers: this.getSubscriberCount(eventType) }, 'Subscribed to event');

    let subscribed = true;
    return (): void => {
      if (!subscribed) return;
      subscribed = false;
      this.emitter.off(eventType, listener);
      logger.debug({ eventType, subscribers: this.getSubscriberCount(eventType) }, 'Unsubscribed from event');
    };
  }

  once<T extends EventType>(eventType: T, handler: EventHandler<T>): void {
    const unsubscribe = this.subscribe(eventType, (data) => {
      unsubscribe();
      return handler(data);
    });
  }

  /**
   * Fire and forget. Synchronous handlers have run by the time this returns.
   */
  publish<T extends EventType>(eventType: T, data: EventPayloadMap[T]): void {
    if (!this.emitter.emit(eventType, data)) {
      logger.trace({ eventType }, 'No subscribers for event');
    }
  }

  /**
   * Publish and resolve once every handler has settled
   */
  async publishAsync<T extends EventType>(eventType: T, data: EventPayloadMap[T]): Promise<void> {
    const pending: Promise<void>[] = [];
    this.emitter.emit(eventType, data, pending);
    await Promise.all(pending);
  }

  getSubscriberCount(eventType: EventType): number {
    return this.emitter.listenerCount(eventType);
  }

  removeAllListeners(eventType?: EventType): void {
    if (eventType) {
      this.emitter.removeAllListeners(eventType);
    } else {
      this.emitter.removeAllListeners();
    }
  }

  private async invoke<T extends EventType>(eventType: T, handler: EventHandler<T>, data: EventPayloadMap[T]): Promise<void> {
    try {
      await handler(data);
    } catch (error) {
      logger.error({ error, eventType }, 'Event handler failed');
    }
  }
}

export const eventBus = new EventBus();
