import { z } from "zod";
import { CHANNEL_DELIMITER } from "./channels.js";
import { DecodeError } from "./errors.js";

/**
 * Outbound publish envelope, sent on the control channel.
 * Unknown keys are extra options forwarded to the broker untouched.
 */
export const PublishEnvelopeSchema = z
  .object({
    channels: z.array(z.string()),
    data: z.unknown(),
    except: z.array(z.string()).optional(),
  })
  .passthrough();

export type PublishEnvelope = z.infer<typeof PublishEnvelopeSchema>;

/**
 * Payload of an inbound event.
 * `meta` is whatever the client attached when it connected.
 */
export const EventDataSchema = z
  .object({
    session_id: z.string().optional(),
    meta: z.record(z.unknown()).nullable().optional(),
  })
  .passthrough();

export type EventData = z.infer<typeof EventDataSchema>;

/**
 * Payload of a subscribe or unsubscribe event that names its session
 */
export type ConnectionEventData = EventData & { session_id: string };

/**
 * A decoded event as yielded by the bus
 */
export interface BusEvent {
  event: string;
  data: EventData;
}

/**
 * Whether event data carries the session id of its connection
 */
export function isConnectionEventData(
  data: EventData
): data is ConnectionEventData {
  return typeof data.session_id === "string";
}

/**
 * Options accepted next to channels and data when publishing
 */
export interface PublishOptions {
  /** Session ids that must not receive the message */
  except?: string | Iterable<string>;
  /** Extra envelope keys, merged last */
  [option: string]: unknown;
}

// One name or a collection of names, as a set
function toNameSet(names: string | Iterable<string>): Set<string> {
  return typeof names === "string" ? new Set([names]) : new Set(names);
}

/**
 * Build the publish envelope. Channels are deduplicated and sorted, extra
 * options overwrite earlier keys.
 */
export function createPublishEnvelope(
  channels: string | Iterable<string>,
  data: unknown,
  options: PublishOptions = {}
): PublishEnvelope {
  const { except, ...extra } = options;
  const envelope: PublishEnvelope = {
    channels: [...toNameSet(channels)].sort(),
    data,
  };

  if (except !== undefined) {
    const excluded = [...toNameSet(except)].sort();
    if (excluded.length > 0) {
      envelope.except = excluded;
    }
  }

  return { ...envelope, ...extra };
}

/**
 * Serialize a publish envelope to the wire format
 */
export function encodePublish(
  channels: string | Iterable<string>,
  data: unknown,
  options?: PublishOptions
): string {
  return JSON.stringify(createPublishEnvelope(channels, data, options));
}

/**
 * Safe parse a publish envelope
 */
export function parsePublishEnvelope(
  data: unknown
):
  | { success: true; data: PublishEnvelope }
  | { success: false; error: z.ZodError } {
  const result = PublishEnvelopeSchema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, error: result.error };
}

/**
 * Decode a message received on an event channel.
 * The event name is everything after the first delimiter of the channel.
 *
 * A missing session id is left for the consumer to judge: events of
 * anonymous connections are dropped before it matters.
 *
 * @throws {DecodeError} If the channel has no event part or the payload is
 * not a JSON object of the event shape
 */
export function decodeEvent(
  channel: string,
  payload: string | Buffer
): BusEvent {
  const separator = channel.indexOf(CHANNEL_DELIMITER);
  if (separator === -1) {
    throw new DecodeError(channel, "channel has no event name");
  }
  const event = channel.slice(separator + CHANNEL_DELIMITER.length);

  let parsed: unknown;
  try {
    parsed = JSON.parse(
      typeof payload === "string" ? payload : payload.toString("utf8")
    );
  } catch (error) {
    throw new DecodeError(
      channel,
      error instanceof Error ? error.message : String(error)
    );
  }

  const result = EventDataSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "payload"}: ${issue.message}`)
      .join("; ");
    throw new DecodeError(channel, issues);
  }

  return { event, data: result.data };
}
