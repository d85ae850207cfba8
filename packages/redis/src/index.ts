// Configuration
export {
  parseRedisTCPConfig,
  type RedisTCPConfig,
  RedisTCPConfigSchema,
} from "./config.js";
// Set operations
export type { SetChange, SetIndex } from "./sets.js";
export {
  addMember,
  addToSet,
  cardinality,
  members,
  removeFromSet,
  removeMember,
} from "./sets.js";
// TCP Client
export type { RedisClientLogger, RedisTCPClientOptions } from "./tcp-client.js";
export {
  closeRedisTCPClient,
  createRedisTCPClient,
  createRedisTCPClientFromConfig,
} from "./tcp-client.js";
