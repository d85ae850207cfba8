import { RosterError } from "@relay-roster/protocol";

export { DecodeError, RosterError } from "@relay-roster/protocol";

/**
 * The presence store could not be reached or rejected a command
 */
export class StoreUnavailableError extends RosterError {
  constructor(
    public operation: string,
    cause: unknown
  ) {
    super(
      "STORE_UNAVAILABLE",
      `Presence store unavailable during ${operation}: ${
        cause instanceof Error ? cause.message : String(cause)
      }`,
      { cause }
    );
    this.name = "StoreUnavailableError";
  }
}

/**
 * Event data is missing a field its event type requires
 */
export class ValidationError extends RosterError {
  constructor(message: string) {
    super("VALIDATION_ERROR", message);
    this.name = "ValidationError";
  }
}

/**
 * Invalid runtime configuration
 */
export class ConfigError extends RosterError {
  constructor(public issues: string[]) {
    super("CONFIG_ERROR", `Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

/**
 * Roster.run() called while the roster is already consuming events
 */
export class AlreadyRunningError extends RosterError {
  constructor() {
    super("ALREADY_RUNNING", "Roster is already running");
    this.name = "AlreadyRunningError";
  }
}
