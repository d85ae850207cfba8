// Channels
export type { BusEventType } from "./channels.js";
export {
  BusEventTypeSchema,
  CHANNEL_DELIMITER,
  controlChannel,
  DEFAULT_CHANNEL_KEY,
  eventChannel,
  eventChannels,
} from "./channels.js";
// Envelope
export type {
  BusEvent,
  ConnectionEventData,
  EventData,
  PublishEnvelope,
  PublishOptions,
} from "./envelope.js";
export {
  createPublishEnvelope,
  decodeEvent,
  EventDataSchema,
  encodePublish,
  isConnectionEventData,
  PublishEnvelopeSchema,
  parsePublishEnvelope,
} from "./envelope.js";
// Errors
export { DecodeError, RosterError } from "./errors.js";
