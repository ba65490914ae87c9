import { EventEmitter } from "node:events";
import pino from "pino";
import { describe, expect, it, vi } from "vitest";
import type { WebSocket } from "ws";
import { InProcessTrafficEventBus } from "./inspection/event-bus.js";
import { WebSocketSessionBridge, rawDataToString } from "./websocket-session-bridge.js";

class FakeWebSocket extends EventEmitter {
  readyState = 1;
  readonly sent: string[] = [];

  send(text: string, cb?: (err?: Error) => void): void {
    this.sent.push(text);
    cb?.();
  }

  close(): void {
    if (this.readyState === 3) return;
    this.readyState = 3;
    this.emit("close", 1000, Buffer.alloc(0));
  }

  receive(text: string): void {
    this.emit("message", Buffer.from(text), false);
  }
}

const logger = pino({ level: "silent" });

function createBridge(eventsEnabled = true) {
  const bus = new InProcessTrafficEventBus(logger);
  const bridge = new WebSocketSessionBridge(logger, { bus, eventsEnabled, pollIntervalMs: 10 });
  return { bus, bridge };
}

function connect(bridge: WebSocketSessionBridge): FakeWebSocket {
  const ws = new FakeWebSocket();
  // the bridge only uses on/once/send/close/readyState
  bridge.attach(ws as unknown as WebSocket);
  return ws;
}

describe("WebSocketSessionBridge", () => {
  it("routes text messages to the connection's session", async () => {
    const { bridge } = createBridge();
    const ws = connect(bridge);

    ws.receive('{"id":"1","method":"ping"}');

    await vi.waitFor(() => expect(ws.sent).toEqual(['{"id":"1","response":"pong"}']));
    expect(bridge.getSessionCount()).toBe(1);
  });

  it("streams published events to an inspecting client only", async () => {
    const { bridge, bus } = createBridge();
    const watching = connect(bridge);
    const idle = connect(bridge);

    watching.receive('{"id":"1","method":"enable_inspection"}');
    await vi.waitFor(() => expect(bus.getSubscriberCount()).toBe(1));

    bus.publish({ request_id: "r1" });

    await vi.waitFor(() =>
      expect(watching.sent).toEqual([
        '{"id":"1","response":"inspection_enabled"}',
        '{"request_id":"r1","push":"inspect_traffic"}',
      ])
    );
    expect(idle.sent).toEqual([]);
  });

  it("reports the capability flag through the session", async () => {
    const { bridge } = createBridge(false);
    const ws = connect(bridge);

    ws.receive('{"id":"1","method":"enable_inspection"}');

    await vi.waitFor(() => expect(ws.sent).toEqual(['{"id":"1","response":"not enabled"}']));
  });

  it("tears the session down when the socket closes", async () => {
    const { bridge, bus } = createBridge();
    const ws = connect(bridge);
    ws.receive('{"id":"1","method":"enable_inspection"}');
    await vi.waitFor(() => expect(bus.getSubscriberCount()).toBe(1));
    const session = bridge.getSession(ws as unknown as WebSocket);

    ws.close();

    await vi.waitFor(() => expect(session?.isClosed()).toBe(true));
    expect(bridge.getSessionCount()).toBe(0);
    expect(bus.getSubscriberCount()).toBe(0);
    expect(session?.getState()).toBe("idle");
  });

  it("tears the session down on socket errors", async () => {
    const { bridge } = createBridge();
    const ws = connect(bridge);
    const session = bridge.getSession(ws as unknown as WebSocket);

    ws.emit("error", new Error("ECONNRESET"));

    await vi.waitFor(() => expect(session?.isClosed()).toBe(true));
    expect(bridge.getSessionCount()).toBe(0);
  });

  it("does not send to sockets that are no longer open", async () => {
    const { bridge } = createBridge();
    const ws = connect(bridge);
    ws.readyState = 2;

    ws.receive('{"id":"1","method":"ping"}');
    await new Promise((resolve) => setTimeout(resolve, 10));

    expect(ws.sent).toEqual([]);
  });

  it("closes every session and socket on closeAll", async () => {
    const { bridge, bus } = createBridge();
    const first = connect(bridge);
    const second = connect(bridge);
    first.receive('{"id":"1","method":"enable_inspection"}');
    second.receive('{"id":"1","method":"enable_inspection"}');
    await vi.waitFor(() => expect(bus.getSubscriberCount()).toBe(2));

    await bridge.closeAll();

    expect(bridge.getSessionCount()).toBe(0);
    expect(bus.getSubscriberCount()).toBe(0);
    expect(first.readyState).toBe(3);
    expect(second.readyState).toBe(3);
  });
});

describe("rawDataToString", () => {
  it("decodes buffers, fragments and array buffers", () => {
    expect(rawDataToString(Buffer.from("plain"))).toBe("plain");
    expect(rawDataToString([Buffer.from("frag"), Buffer.from("ments")])).toBe("fragments");
    const bytes = Buffer.from("array");
    const arrayBuffer = new ArrayBuffer(bytes.length);
    new Uint8Array(arrayBuffer).set(bytes);
    expect(rawDataToString(arrayBuffer)).toBe("array");
  });
});
