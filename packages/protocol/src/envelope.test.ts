import { describe, expect, it } from "vitest";
import { controlChannel, eventChannel, eventChannels } from "./channels.js";
import {
  createPublishEnvelope,
  decodeEvent,
  encodePublish,
  parsePublishEnvelope,
} from "./envelope.js";
import { DecodeError } from "./errors.js";

describe("channels", () => {
  it("should use the default key", () => {
    expect(controlChannel()).toBe("juggernaut");
    expect(eventChannels()).toEqual([
      "juggernaut:subscribe",
      "juggernaut:unsubscribe",
      "juggernaut:custom",
    ]);
  });

  it("should scope channels under a custom key", () => {
    expect(controlChannel("chat")).toBe("chat");
    expect(eventChannel("unsubscribe", "chat")).toBe("chat:unsubscribe");
  });
});

describe("encodePublish", () => {
  it("should wrap a single channel in a list", () => {
    expect(encodePublish("news", { message: "Hello World!" })).toBe(
      '{"channels":["news"],"data":{"message":"Hello World!"}}'
    );
  });

  it("should deduplicate and sort channels", () => {
    const envelope = createPublishEnvelope(["b", "a", "b"], 1);
    expect(envelope).toEqual({ channels: ["a", "b"], data: 1 });
  });

  it("should include except only when sessions are excluded", () => {
    expect(createPublishEnvelope("a", 1, { except: "s1" })).toEqual({
      channels: ["a"],
      data: 1,
      except: ["s1"],
    });
    expect(createPublishEnvelope("a", 1, { except: [] })).toEqual({
      channels: ["a"],
      data: 1,
    });
  });

  it("should let extra options overwrite envelope keys", () => {
    const wire = encodePublish("a", 1, { channels: ["z"], ttl: 5 });
    expect(JSON.parse(wire)).toEqual({ channels: ["z"], data: 1, ttl: 5 });
  });

  it("should produce envelopes the schema accepts", () => {
    const result = parsePublishEnvelope(
      createPublishEnvelope(new Set(["a"]), null, { except: ["s2", "s1"] })
    );
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.except).toEqual(["s1", "s2"]);
    }
  });

  it("should reject envelopes without channels", () => {
    expect(parsePublishEnvelope({ data: 1 }).success).toBe(false);
  });
});

describe("decodeEvent", () => {
  it("should split the event name from the channel", () => {
    const decoded = decodeEvent(
      "juggernaut:subscribe",
      '{"session_id":"s1","meta":{"user_id":42}}'
    );
    expect(decoded).toEqual({
      event: "subscribe",
      data: { session_id: "s1", meta: { user_id: 42 } },
    });
  });

  it("should only split on the first delimiter", () => {
    const decoded = decodeEvent("a:b:c", '{"session_id":"s1"}');
    expect(decoded.event).toBe("b:c");
  });

  it("should accept buffers", () => {
    const decoded = decodeEvent(
      "juggernaut:unsubscribe",
      Buffer.from('{"session_id":"s9","meta":null}')
    );
    expect(decoded.data).toEqual({ session_id: "s9", meta: null });
  });

  it("should keep unknown keys", () => {
    const decoded = decodeEvent(
      "juggernaut:custom",
      '{"session_id":"s1","channel":"room-1"}'
    );
    expect(decoded.data.channel).toBe("room-1");
  });

  it("should recover channels and data from a publish envelope", () => {
    const decoded = decodeEvent(
      "juggernaut:custom",
      encodePublish(["x", "y", "x"], { text: "hi" })
    );
    expect(decoded.event).toBe("custom");
    expect(decoded.data.channels).toEqual(["x", "y"]);
    expect(decoded.data.data).toEqual({ text: "hi" });
  });

  it("should fail on malformed JSON", () => {
    let caught: unknown;
    try {
      decodeEvent("juggernaut:subscribe", "{not json");
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(DecodeError);
    expect(caught).toMatchObject({
      code: "DECODE_ERROR",
      channel: "juggernaut:subscribe",
    });
  });

  it("should fail when the payload is not an object", () => {
    expect(() => decodeEvent("juggernaut:custom", "[1,2]")).toThrow(
      DecodeError
    );
  });

  it("should fail when meta is not a mapping", () => {
    expect(() =>
      decodeEvent("juggernaut:subscribe", '{"session_id":"s1","meta":"x"}')
    ).toThrow(DecodeError);
  });

  it("should decode a connection event without a session id", () => {
    expect(decodeEvent("juggernaut:subscribe", "{}")).toEqual({
      event: "subscribe",
      data: {},
    });
  });

  it("should fail when the channel has no event name", () => {
    expect(() => decodeEvent("juggernaut", "{}")).toThrow(
      "Cannot decode event on juggernaut: channel has no event name"
    );
  });
});
