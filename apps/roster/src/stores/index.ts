export { MemoryPresenceStore } from "./memory-presence-store.js";
export {
  RedisPresenceStore,
  type RedisPresenceStoreOptions,
} from "./redis-presence-store.js";
export {
  type ConnectionChange,
  DEFAULT_KEY_PREFIX,
  type PresenceStore,
} from "./types.js";
