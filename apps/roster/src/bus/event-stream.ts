import { type BusEvent, decodeEvent } from "@relay-roster/protocol";
import type { Redis } from "ioredis";
import { createLogger } from "../utils/index.js";

const log = createLogger({ module: "event-stream" });

export interface EventStreamOptions {
  /** Closes the stream when aborted */
  signal?: AbortSignal;
}

interface PendingRead {
  resolve: (result: IteratorResult<BusEvent>) => void;
  reject: (error: unknown) => void;
}

/**
 * Pull-based stream of decoded broker events.
 *
 * Owns a dedicated subscriber connection. Iteration ends when the stream is
 * closed, the signal aborts or the connection ends. A decode or connection
 * error is thrown from next() once the events received before it are
 * consumed, and the stream closes.
 */
export class EventStream implements AsyncIterableIterator<BusEvent> {
  /** Settles once the channel subscription is in place (or has failed) */
  readonly ready: Promise<void>;

  private buffer: BusEvent[] = [];
  private readers: PendingRead[] = [];
  private failure: { error: unknown } | null = null;
  private closed = false;
  private signal?: AbortSignal;

  constructor(
    private subscriber: Redis,
    readonly channels: string[],
    options: EventStreamOptions = {}
  ) {
    this.signal = options.signal;

    subscriber.on("message", this.handleMessage);
    subscriber.on("error", this.handleError);
    subscriber.on("end", this.handleEnd);
    this.signal?.addEventListener("abort", this.handleAbort, { once: true });

    this.ready = subscriber.subscribe(...channels).then(
      () => {
        log.debug({ channels }, "Subscribed to event channels");
      },
      (error: unknown) => {
        this.fail(error);
      }
    );

    if (this.signal?.aborted) {
      this.close();
    }
  }

  [Symbol.asyncIterator](): AsyncIterableIterator<BusEvent> {
    return this;
  }

  async next(): Promise<IteratorResult<BusEvent>> {
    const value = this.buffer.shift();
    if (value) {
      return { value, done: false };
    }

    if (this.failure) {
      const { error } = this.failure;
      this.failure = null;
      throw error;
    }

    if (this.closed) {
      return { value: undefined, done: true };
    }

    return new Promise<IteratorResult<BusEvent>>((resolve, reject) => {
      this.readers.push({ resolve, reject });
    });
  }

  async return(): Promise<IteratorResult<BusEvent>> {
    this.close();
    return { value: undefined, done: true };
  }

  /**
   * Whether the stream has stopped receiving events
   */
  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Stop consuming: pending and later reads report the end of the stream and
   * the subscriber connection is dropped.
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.buffer = [];
    this.finish();
    log.debug({ channels: this.channels }, "Event stream closed");
  }

  private handleMessage = (channel: string, message: string): void => {
    if (this.closed) {
      return;
    }

    let event: BusEvent;
    try {
      event = decodeEvent(channel, message);
    } catch (error) {
      this.fail(error);
      return;
    }

    const reader = this.readers.shift();
    if (reader) {
      reader.resolve({ value: event, done: false });
    } else {
      this.buffer.push(event);
    }
  };

  private handleError = (error: unknown): void => {
    log.error({ error, channels: this.channels }, "Subscriber connection error");
    this.fail(error);
  };

  private handleEnd = (): void => {
    if (!this.closed) {
      log.warn({ channels: this.channels }, "Subscriber connection ended");
      this.finish();
    }
  };

  private handleAbort = (): void => {
    this.close();
  };

  private fail(error: unknown): void {
    if (this.closed) {
      return;
    }

    // Readers only wait on an empty buffer, so the first one gets the error
    const reader = this.readers.shift();
    if (reader) {
      reader.reject(error);
    } else {
      this.failure = { error };
    }
    this.finish();
  }

  private finish(): void {
    this.closed = true;

    for (const reader of this.readers.splice(0)) {
      reader.resolve({ value: undefined, done: true });
    }

    this.subscriber.off("message", this.handleMessage);
    this.subscriber.off("error", this.handleError);
    this.subscriber.off("end", this.handleEnd);
    this.signal?.removeEventListener("abort", this.handleAbort);
    this.subscriber.disconnect();
  }
}
