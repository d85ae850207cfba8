export {
  AlreadyRunningError,
  ConfigError,
  DecodeError,
  RosterError,
  StoreUnavailableError,
  ValidationError,
} from "./errors.js";
export { createLogger, logger } from "./logger.js";
