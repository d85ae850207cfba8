import {
  controlChannel,
  DEFAULT_CHANNEL_KEY,
  type EventData,
  encodePublish,
  eventChannels,
  type PublishOptions,
} from "@relay-roster/protocol";
import type { Redis } from "ioredis";
import { createLogger } from "../utils/index.js";
import { EventStream, type EventStreamOptions } from "./event-stream.js";

const log = createLogger({ module: "event-bus" });

export interface EventBusOptions {
  /** Broker connection used for publishing; subscribers are duplicated from it */
  redis: Redis;
  /** Control channel key */
  key?: string;
}

/**
 * Handler invoked for each event received by EventBus.subscribe()
 */
export type EventHandler = (
  event: string,
  data: EventData
) => void | Promise<void>;

/**
 * Client for the broker's publish and event channels
 */
export class EventBus {
  readonly key: string;
  private redis: Redis;

  constructor(options: EventBusOptions) {
    this.redis = options.redis;
    this.key = options.key ?? DEFAULT_CHANNEL_KEY;
  }

  /**
   * Publish data to one or more channels through the control channel.
   * Resolves once the broker accepted the message, not when clients got it.
   *
   * @example
   * ```typescript
   * await bus.publish("room-1", { text: "hi" }, { except: sessionId });
   * ```
   */
  async publish(
    channels: string | Iterable<string>,
    data: unknown,
    options?: PublishOptions
  ): Promise<void> {
    const message = encodePublish(channels, data, options);
    const receivers = await this.redis.publish(
      controlChannel(this.key),
      message
    );
    log.debug({ key: this.key, receivers }, "Published message");
  }

  /**
   * Open a dedicated subscriber connection and stream connection events
   */
  subscribeListen(options: EventStreamOptions = {}): EventStream {
    return new EventStream(
      this.redis.duplicate(),
      eventChannels(this.key),
      options
    );
  }

  /**
   * Await the handler for every event, in order. A handler or stream error
   * rejects the returned promise and closes the stream.
   */
  async subscribe(
    handler: EventHandler,
    options: EventStreamOptions = {}
  ): Promise<void> {
    const stream = this.subscribeListen(options);
    try {
      for await (const { event, data } of stream) {
        await handler(event, data);
      }
    } finally {
      stream.close();
    }
  }
}
