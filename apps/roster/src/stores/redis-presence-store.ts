import {
  addMember,
  addToSet,
  cardinality,
  members,
  removeFromSet,
  removeMember,
} from "@relay-roster/redis";
import type { Redis } from "ioredis";
import { createLogger, StoreUnavailableError } from "../utils/index.js";
import {
  type ConnectionChange,
  DEFAULT_KEY_PREFIX,
  type PresenceStore,
} from "./types.js";

const log = createLogger({ module: "redis-presence-store" });

export interface RedisPresenceStoreOptions {
  redis: Redis;
  keyPrefix?: string;
}

/**
 * Presence store kept in Redis sets, shared by every roster process that
 * points at the same broker.
 *
 * Layout:
 * - `<prefix>connections:<userId>` set of session ids
 * - `<prefix>online-users` set of user ids
 *
 * Connection changes and the online-users update run as one server-side
 * script.
 */
export class RedisPresenceStore implements PresenceStore {
  readonly keyPrefix: string;
  private redis: Redis;

  constructor(options: RedisPresenceStoreOptions) {
    this.redis = options.redis;
    this.keyPrefix = options.keyPrefix ?? DEFAULT_KEY_PREFIX;
  }

  connectionsKey(userId: string): string {
    return `${this.keyPrefix}connections:${userId}`;
  }

  get onlineUsersKey(): string {
    return `${this.keyPrefix}online-users`;
  }

  addConnection(userId: string, sessionId: string): Promise<ConnectionChange> {
    return this.call("addConnection", () =>
      addToSet(this.redis, this.connectionsKey(userId), sessionId, {
        key: this.onlineUsersKey,
        member: userId,
      })
    );
  }

  removeConnection(
    userId: string,
    sessionId: string
  ): Promise<ConnectionChange> {
    return this.call("removeConnection", () =>
      removeFromSet(this.redis, this.connectionsKey(userId), sessionId, {
        key: this.onlineUsersKey,
        member: userId,
      })
    );
  }

  connectionCount(userId: string): Promise<number> {
    return this.call("connectionCount", () =>
      cardinality(this.redis, this.connectionsKey(userId))
    );
  }

  async markOnline(userId: string): Promise<void> {
    await this.call("markOnline", () =>
      addMember(this.redis, this.onlineUsersKey, userId)
    );
  }

  async markOffline(userId: string): Promise<void> {
    await this.call("markOffline", () =>
      removeMember(this.redis, this.onlineUsersKey, userId)
    );
  }

  async onlineUsers(): Promise<string[]> {
    const users = await this.call("onlineUsers", () =>
      members(this.redis, this.onlineUsersKey)
    );
    return users.sort();
  }

  async isOnline(userId: string): Promise<boolean> {
    return (await this.connectionCount(userId)) > 0;
  }

  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      log.error({ error, operation }, "Presence store command failed");
      throw new StoreUnavailableError(operation, error);
    }
  }
}
