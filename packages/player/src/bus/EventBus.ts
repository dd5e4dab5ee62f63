/**
 * EventBus - fans player events out to subscribers
 *
 * Engine events and the controller's playback events share one bounded
 * channel, so subscribers see a single ordered stream. Each matching
 * subscriber is called in its own task; a failing subscriber is logged and
 * does not affect the others.
 */

import { randomUUID } from 'crypto';
import {
  explainNativeEvent,
  matches,
  parseNativeEvent,
  type EventPredicate,
  type PlayerEvent,
} from '../events';
import { SubscriberError } from '../types/errors';
import type { NativeEngine } from '../types/engine';
import { SlidingChannel } from '../utils/channel';
import { createLogger, logError, type Logger } from '../utils/logger';

export type EventCallback = (event: PlayerEvent) => void | Promise<void>;

interface Subscription {
  id: string;
  predicate: EventPredicate;
  callback: EventCallback;
}

export interface EventBusOptions {
  capacity: number;
  logger: Logger;
}

export class EventBus {
  private readonly log: Logger;
  private readonly channel: SlidingChannel<PlayerEvent>;
  private readonly subscriptions = new Map<string, Subscription>();
  private detachEngine: (() => void) | null = null;
  private loop: Promise<void> | null = null;

  constructor(options: EventBusOptions) {
    this.log = createLogger({ module: 'EventBus' }, options.logger);
    this.channel = new SlidingChannel<PlayerEvent>({
      capacity: options.capacity,
      onDrop: (event) => {
        this.log.warn({ event: event.event }, 'Event channel full, dropped oldest event');
      },
    });
  }

  /**
   * Feed the engine's event stream into the bus
   */
  attach(engine: NativeEngine): void {
    this.detachEngine?.();
    this.detachEngine = engine.subscribe((event: unknown) => this.receive(event));
  }

  /**
   * Start the event loop
   */
  start(): void {
    if (this.loop || this.channel.isClosed) return;
    this.loop = this.run();
  }

  /**
   * Publish an event to every matching subscriber
   */
  publish(event: PlayerEvent): void {
    if (!this.channel.put(event)) {
      this.log.debug({ event: event.event }, 'Event bus stopped, event discarded');
    }
  }

  // ============================================================================
  // Subscriptions
  // ============================================================================

  /**
   * @returns The subscription id, for unsubscribe()
   */
  subscribe(predicate: EventPredicate, callback: EventCallback): string {
    const id = randomUUID();
    this.subscriptions.set(id, { id, predicate, callback });
    this.log.debug({ subscriptionId: id, predicate: predicate.kind }, 'Subscribed');
    return id;
  }

  /**
   * @returns false if no such subscription existed
   */
  unsubscribe(id: string): boolean {
    const removed = this.subscriptions.delete(id);
    if (removed) {
      this.log.debug({ subscriptionId: id }, 'Unsubscribed');
    }
    return removed;
  }

  get subscriberCount(): number {
    return this.subscriptions.size;
  }

  /**
   * Detach the engine and stop the loop. Events still queued are discarded.
   */
  async stop(): Promise<void> {
    this.detachEngine?.();
    this.detachEngine = null;

    const discarded = this.channel.close();
    if (discarded.length > 0) {
      this.log.debug({ count: discarded.length }, 'Discarded queued events');
    }
    await this.loop;
  }

  // ============================================================================
  // Private Methods
  // ============================================================================

  private receive(data: unknown): void {
    const event = parseNativeEvent(data);
    if (!event) {
      this.log.warn({ issues: explainNativeEvent(data) }, 'Dropped invalid engine event');
      return;
    }
    this.publish(event);
  }

  private async run(): Promise<void> {
    for (;;) {
      const next = await this.channel.take();
      if (next.done) return;
      this.notify(next.value);
    }
  }

  private notify(event: PlayerEvent): void {
    this.subscriptions.forEach((subscription) => {
      if (this.accepts(subscription, event)) {
        setImmediate(() => this.deliver(subscription, event));
      }
    });
  }

  private accepts(subscription: Subscription, event: PlayerEvent): boolean {
    try {
      return matches(subscription.predicate, event);
    } catch (error) {
      this.report(subscription, event, error);
      return false;
    }
  }

  private deliver(subscription: Subscription, event: PlayerEvent): void {
    try {
      const result = subscription.callback(event);
      if (result instanceof Promise) {
        void result.catch((error: unknown) => this.report(subscription, event, error));
      }
    } catch (error) {
      this.report(subscription, event, error);
    }
  }

  private report(subscription: Subscription, event: PlayerEvent, error: unknown): void {
    const failure = new SubscriberError(subscription.id, event.event, error);
    logError(this.log, failure, 'Subscriber failed', failure.context);
  }
}
