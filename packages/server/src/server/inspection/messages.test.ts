import { describe, expect, it } from "vitest";
import {
  decodeControlMessage,
  encodePush,
  encodeReply,
  type TrafficEvent,
} from "./messages.js";

describe("decodeControlMessage", () => {
  it("accepts a control message and keeps extra fields", () => {
    const result = decodeControlMessage(
      JSON.stringify({ id: "1", method: "ping", extra: { nested: true } })
    );

    expect(result).toEqual({
      ok: true,
      message: { id: "1", method: "ping", extra: { nested: true } },
    });
  });

  it("accepts numeric ids", () => {
    const result = decodeControlMessage('{"id":7,"method":"enable_inspection"}');

    expect(result).toEqual({ ok: true, message: { id: 7, method: "enable_inspection" } });
  });

  it("rejects text that is not JSON", () => {
    const result = decodeControlMessage("{not json");

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.reason).toBe("invalid_json");
    }
  });

  it("rejects messages without a method", () => {
    const result = decodeControlMessage('{"id":"1"}');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.reason).toBe("invalid_shape");
      expect(result.error).toContain("method");
    }
  });

  it("rejects messages without an id", () => {
    const result = decodeControlMessage('{"method":"ping"}');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.reason).toBe("invalid_shape");
      expect(result.error).toContain("id");
    }
  });

  it("rejects non-object payloads", () => {
    expect(decodeControlMessage("[1,2,3]").ok).toBe(false);
    expect(decodeControlMessage('"ping"').ok).toBe(false);
    expect(decodeControlMessage("null").ok).toBe(false);
  });
});

describe("encodeReply", () => {
  it("serializes id and response", () => {
    expect(encodeReply("abc", "pong")).toBe('{"id":"abc","response":"pong"}');
    expect(encodeReply(3, "not enabled")).toBe('{"id":3,"response":"not enabled"}');
  });
});

describe("encodePush", () => {
  it("adds the inspect_traffic discriminator without touching the event", () => {
    const event: TrafficEvent = {
      request_id: "req-1",
      event_name: "request_complete",
      event_payload: { url: "http://example.test/", headers: { host: "example.test" } },
    };

    const text = encodePush(event);

    expect(JSON.parse(text)).toEqual({
      request_id: "req-1",
      event_name: "request_complete",
      event_payload: { url: "http://example.test/", headers: { host: "example.test" } },
      push: "inspect_traffic",
    });
    expect(event).not.toHaveProperty("push");
  });

  it("overrides a push field already present on the event", () => {
    expect(encodePush({ push: "other" })).toBe('{"push":"inspect_traffic"}');
  });

  it("supports other push kinds", () => {
    expect(encodePush({ reason: "channel_closed" }, "inspection_stopped")).toBe(
      '{"reason":"channel_closed","push":"inspection_stopped"}'
    );
  });
});
