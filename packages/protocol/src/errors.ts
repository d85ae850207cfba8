/**
 * Base error class for roster and relay errors
 */
export class RosterError extends Error {
  constructor(
    public code: string,
    message: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = "RosterError";
  }
}

/**
 * Malformed envelope received from the broker
 */
export class DecodeError extends RosterError {
  constructor(
    public channel: string,
    message: string
  ) {
    super("DECODE_ERROR", `Cannot decode event on ${channel}: ${message}`);
    this.name = "DecodeError";
  }
}
