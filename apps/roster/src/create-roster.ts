import {
  closeRedisTCPClient,
  createRedisTCPClientFromConfig,
  type RedisClientLogger,
} from "@relay-roster/redis";
import type { Redis } from "ioredis";
import { EventBus } from "./bus/index.js";
import type { Config } from "./config.js";
import { Roster, type RosterHooks } from "./managers/index.js";
import { RedisPresenceStore } from "./stores/index.js";
import { createLogger } from "./utils/index.js";

const log = createLogger({ module: "redis" });

const redisLogger: RedisClientLogger = {
  info: (message) => log.info(message),
  warn: (message) => log.warn(message),
  error: (error, message) => log.error({ error }, message),
};

/**
 * Components wired by createRoster
 */
export interface RosterRuntime {
  redis: Redis;
  bus: EventBus;
  store: RedisPresenceStore;
  roster: Roster;
  /** Stop the roster and quit the broker connection */
  close(): Promise<void>;
}

/**
 * Connect to Redis and build a roster from the runtime configuration
 *
 * @example
 * ```typescript
 * const { roster, close } = createRoster(config, {
 *   onSignedIn: (userId) => console.log(`${userId} is online`),
 * });
 * await roster.run();
 * ```
 */
export function createRoster(
  config: Config,
  hooks: RosterHooks = {}
): RosterRuntime {
  const redis = createRedisTCPClientFromConfig(config, {
    logger: redisLogger,
  });
  const bus = new EventBus({ redis, key: config.JUGGERNAUT_KEY });
  const store = new RedisPresenceStore({
    redis,
    keyPrefix: config.ROSTER_KEY_PREFIX,
  });
  const roster = new Roster({
    bus,
    store,
    userMetaKey: config.ROSTER_USER_META_KEY,
    hooks,
  });

  log.info(
    {
      host: config.REDIS_HOST,
      port: config.REDIS_PORT,
      key: config.JUGGERNAUT_KEY,
    },
    "Roster created"
  );

  return {
    redis,
    bus,
    store,
    roster,
    async close() {
      roster.stop();
      await closeRedisTCPClient(redis);
    },
  };
}
