import pino from "pino";
import { describe, expect, it } from "vitest";
import { InProcessTrafficEventBus, createTrafficEvent } from "./event-bus.js";
import { EventChannel } from "./event-channel.js";
import type { TrafficEvent } from "./messages.js";

function createBus(): InProcessTrafficEventBus {
  return new InProcessTrafficEventBus(pino({ level: "silent" }));
}

async function drain(channel: EventChannel<TrafficEvent>): Promise<TrafficEvent[]> {
  const items: TrafficEvent[] = [];
  while (true) {
    const result = await channel.take({ timeoutMs: 0 });
    if (result.type !== "item") {
      return items;
    }
    items.push(result.value);
  }
}

describe("InProcessTrafficEventBus", () => {
  it("delivers each published event to every subscriber", async () => {
    const bus = createBus();
    const first = new EventChannel<TrafficEvent>();
    const second = new EventChannel<TrafficEvent>();
    bus.subscribe("sub-1", first);
    bus.subscribe("sub-2", second);

    expect(bus.publish({ n: 1 })).toBe(2);
    expect(bus.publish({ n: 2 })).toBe(2);

    expect(await drain(first)).toEqual([{ n: 1 }, { n: 2 }]);
    expect(await drain(second)).toEqual([{ n: 1 }, { n: 2 }]);
  });

  it("stops delivery after unsubscribe", async () => {
    const bus = createBus();
    const channel = new EventChannel<TrafficEvent>();
    bus.subscribe("sub-1", channel);
    bus.publish({ n: 1 });

    bus.unsubscribe("sub-1");

    expect(bus.publish({ n: 2 })).toBe(0);
    expect(bus.getSubscriberCount()).toBe(0);
    expect(bus.hasSubscriber("sub-1")).toBe(false);
    expect(await drain(channel)).toEqual([{ n: 1 }]);
  });

  it("ignores unsubscribe for unknown ids", () => {
    const bus = createBus();
    bus.subscribe("sub-1", new EventChannel<TrafficEvent>());

    bus.unsubscribe("missing");

    expect(bus.getSubscriberCount()).toBe(1);
  });

  it("replaces the channel when an id subscribes twice", async () => {
    const bus = createBus();
    const stale = new EventChannel<TrafficEvent>();
    const fresh = new EventChannel<TrafficEvent>();
    bus.subscribe("sub-1", stale);
    bus.subscribe("sub-1", fresh);

    bus.publish({ n: 1 });

    expect(bus.getSubscriberCount()).toBe(1);
    expect(await drain(stale)).toEqual([]);
    expect(await drain(fresh)).toEqual([{ n: 1 }]);
  });

  it("does not count closed channels as delivered", () => {
    const bus = createBus();
    const open = new EventChannel<TrafficEvent>();
    const closed = new EventChannel<TrafficEvent>();
    closed.close();
    bus.subscribe("open", open);
    bus.subscribe("closed", closed);

    expect(bus.publish({ n: 1 })).toBe(1);
  });
});

describe("createTrafficEvent", () => {
  it("builds an event in the proxy's record shape", () => {
    const event = createTrafficEvent({
      requestId: "req-1",
      name: "request_complete",
      payload: { url: "http://example.test/" },
      publisherId: "test-publisher",
      timestamp: new Date(1_700_000_000_500),
    });

    expect(event).toEqual({
      request_id: "req-1",
      process_id: process.pid,
      thread_id: expect.any(Number),
      event_timestamp: 1_700_000_000.5,
      event_name: "request_complete",
      event_payload: { url: "http://example.test/" },
      publisher_id: "test-publisher",
    });
  });

  it("defaults payload and publisher", () => {
    const event = createTrafficEvent({ requestId: "req-2", name: "work_started" });

    expect(event.event_payload).toEqual({});
    expect(event.publisher_id).toBe("proxy");
  });
});
