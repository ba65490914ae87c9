import type pino from "pino";
import { threadId } from "node:worker_threads";
import type { EventChannel } from "./event-channel.js";
import {
  TrafficEventSchema,
  type JsonValue,
  type TrafficEvent,
  type TrafficEventName,
} from "./messages.js";

/**
 * The part of the bus an inspection session relies on. Events published after
 * `subscribe` returns land in the channel until `unsubscribe` is called.
 */
export interface TrafficEventBus {
  subscribe(subscriptionId: string, channel: EventChannel<TrafficEvent>): void;
  unsubscribe(subscriptionId: string): void;
}

/**
 * Process-wide fan-out of traffic events to subscribed channels.
 */
export class InProcessTrafficEventBus implements TrafficEventBus {
  private readonly logger: pino.Logger;
  private readonly subscribers: Map<string, EventChannel<TrafficEvent>> = new Map();

  constructor(logger: pino.Logger) {
    this.logger = logger.child({ module: "event-bus" });
  }

  subscribe(subscriptionId: string, channel: EventChannel<TrafficEvent>): void {
    if (this.subscribers.has(subscriptionId)) {
      this.logger.warn({ subscriptionId }, "Replacing existing subscription");
    }
    this.subscribers.set(subscriptionId, channel);
    this.logger.debug(
      { subscriptionId, totalSubscribers: this.subscribers.size },
      "Subscribed"
    );
  }

  unsubscribe(subscriptionId: string): void {
    if (!this.subscribers.delete(subscriptionId)) {
      return;
    }
    this.logger.debug(
      { subscriptionId, totalSubscribers: this.subscribers.size },
      "Unsubscribed"
    );
  }

  /**
   * Deliver an event to every current subscriber. Returns the number of
   * channels that accepted it.
   */
  publish(event: TrafficEvent): number {
    const parsed = TrafficEventSchema.safeParse(event);
    if (!parsed.success) {
      throw new Error(`Invalid traffic event: ${parsed.error.message}`);
    }

    let delivered = 0;
    for (const [subscriptionId, channel] of this.subscribers) {
      try {
        if (channel.push(event)) {
          delivered++;
        }
      } catch (error) {
        const err = error instanceof Error ? error : new Error(String(error));
        this.logger.error({ err, subscriptionId }, "Failed to deliver event");
      }
    }
    return delivered;
  }

  getSubscriberCount(): number {
    return this.subscribers.size;
  }

  hasSubscriber(subscriptionId: string): boolean {
    return this.subscribers.has(subscriptionId);
  }
}

export interface CreateTrafficEventOptions {
  requestId: string;
  name: TrafficEventName;
  payload?: { [key: string]: JsonValue };
  publisherId?: string;
  timestamp?: Date;
}

/**
 * Build an event in the shape the proxy's instrumentation publishes.
 */
export function createTrafficEvent(options: CreateTrafficEventOptions): TrafficEvent {
  const timestamp = options.timestamp ?? new Date();
  return {
    request_id: options.requestId,
    process_id: process.pid,
    thread_id: threadId,
    event_timestamp: timestamp.getTime() / 1000,
    event_name: options.name,
    event_payload: options.payload ?? {},
    publisher_id: options.publisherId ?? "proxy",
  };
}
