import { EventEmitter } from "node:events";
import { ADD_TO_SET_SCRIPT, REMOVE_FROM_SET_SCRIPT } from "../sets.js";

/**
 * State shared by every connection of one fake broker: set keys, pub/sub
 * subscribers and an optional outage.
 */
export class FakeRedisServer {
  readonly sets = new Map<string, Set<string>>();
  readonly subscribers = new Set<FakeRedis>();
  readonly published: Array<{ channel: string; message: string }> = [];
  private outage: Error | null = null;

  /**
   * Make every subsequent command fail with the given error
   */
  fail(error: Error = new Error("connect ECONNREFUSED 127.0.0.1:6379")): void {
    this.outage = error;
  }

  /**
   * Clear an outage started with fail()
   */
  recover(): void {
    this.outage = null;
  }

  /** @internal */
  assertAvailable(): void {
    if (this.outage) {
      throw this.outage;
    }
  }

  /** @internal */
  set(key: string): Set<string> {
    let set = this.sets.get(key);
    if (!set) {
      set = new Set();
      this.sets.set(key, set);
    }
    return set;
  }

  /** @internal */
  sadd(key: string, members: string[]): number {
    const set = this.set(key);
    let added = 0;
    for (const member of members) {
      if (!set.has(member)) {
        set.add(member);
        added++;
      }
    }
    return added;
  }

  /** @internal */
  srem(key: string, members: string[]): number {
    const set = this.sets.get(key);
    if (!set) {
      return 0;
    }
    let removed = 0;
    for (const member of members) {
      if (set.delete(member)) {
        removed++;
      }
    }
    // Redis drops empty sets
    if (set.size === 0) {
      this.sets.delete(key);
    }
    return removed;
  }

  /** @internal */
  scard(key: string): number {
    return this.sets.get(key)?.size ?? 0;
  }
}

/**
 * In-process stand-in for the part of an ioredis client this project uses.
 * Connections made with duplicate() share one FakeRedisServer, so a
 * subscriber connection receives what another connection publishes.
 * Messages are delivered asynchronously, in publish order. eval() runs the
 * set scripts of this package, applied in one step like a Lua script.
 */
export class FakeRedis extends EventEmitter {
  status: "ready" | "end" = "ready";
  private channels = new Set<string>();

  constructor(readonly server: FakeRedisServer = new FakeRedisServer()) {
    super();
  }

  duplicate(): FakeRedis {
    return new FakeRedis(this.server);
  }

  private assertWritable(): void {
    if (this.status === "end") {
      throw new Error("Connection is closed.");
    }
    this.server.assertAvailable();
  }

  async publish(channel: string, message: string): Promise<number> {
    this.assertWritable();
    this.server.published.push({ channel, message });

    let receivers = 0;
    for (const subscriber of this.server.subscribers) {
      if (subscriber.channels.has(channel)) {
        receivers++;
        queueMicrotask(() => subscriber.emit("message", channel, message));
      }
    }
    return receivers;
  }

  async subscribe(...channels: string[]): Promise<number> {
    this.assertWritable();
    for (const channel of channels) {
      this.channels.add(channel);
    }
    this.server.subscribers.add(this);
    return this.channels.size;
  }

  async unsubscribe(...channels: string[]): Promise<number> {
    this.assertWritable();
    if (channels.length === 0) {
      this.channels.clear();
    }
    for (const channel of channels) {
      this.channels.delete(channel);
    }
    return this.channels.size;
  }

  /**
   * Channels this connection currently listens to
   */
  subscriptions(): string[] {
    return [...this.channels];
  }

  async quit(): Promise<"OK"> {
    this.assertWritable();
    this.end();
    return "OK";
  }

  disconnect(): void {
    if (this.status !== "end") {
      this.end();
    }
  }

  async eval(
    script: string,
    numKeys: number,
    ...args: string[]
  ): Promise<[before: number, after: number]> {
    this.assertWritable();
    const [key, indexKey] = args.slice(0, numKeys);
    const [member, indexMember] = args.slice(numKeys);
    if (key === undefined || member === undefined) {
      throw new Error("ERR wrong number of arguments for 'eval' command");
    }
    const index =
      indexKey !== undefined && indexMember !== undefined
        ? { key: indexKey, member: indexMember }
        : null;

    const before = this.server.scard(key);
    if (script === ADD_TO_SET_SCRIPT) {
      this.server.sadd(key, [member]);
      const after = this.server.scard(key);
      if (index && before === 0 && after > 0) {
        this.server.sadd(index.key, [index.member]);
      }
      return [before, after];
    }
    if (script === REMOVE_FROM_SET_SCRIPT) {
      this.server.srem(key, [member]);
      const after = this.server.scard(key);
      if (index && before > 0 && after === 0) {
        this.server.srem(index.key, [index.member]);
      }
      return [before, after];
    }
    throw new Error("NOSCRIPT script not supported by FakeRedis");
  }

  async sadd(key: string, ...members: string[]): Promise<number> {
    this.assertWritable();
    return this.server.sadd(key, members);
  }

  async srem(key: string, ...members: string[]): Promise<number> {
    this.assertWritable();
    return this.server.srem(key, members);
  }

  async scard(key: string): Promise<number> {
    this.assertWritable();
    return this.server.scard(key);
  }

  async smembers(key: string): Promise<string[]> {
    this.assertWritable();
    return [...(this.server.sets.get(key) ?? [])];
  }

  private end(): void {
    this.status = "end";
    this.channels.clear();
    this.server.subscribers.delete(this);
    this.emit("close");
    this.emit("end");
  }
}
