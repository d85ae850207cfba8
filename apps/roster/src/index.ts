export {
  EventBus,
  type EventBusOptions,
  type EventHandler,
  EventStream,
  type EventStreamOptions,
} from "./bus/index.js";
export { type Config, loadConfig } from "./config.js";
export { createRoster, type RosterRuntime } from "./create-roster.js";
export {
  type PresenceListener,
  Roster,
  type RosterHooks,
  type RosterOptions,
  type RosterRunOptions,
} from "./managers/index.js";
export {
  type ConnectionChange,
  DEFAULT_KEY_PREFIX,
  MemoryPresenceStore,
  type PresenceStore,
  RedisPresenceStore,
  type RedisPresenceStoreOptions,
} from "./stores/index.js";
export {
  AlreadyRunningError,
  ConfigError,
  DecodeError,
  RosterError,
  StoreUnavailableError,
  ValidationError,
} from "./utils/index.js";
