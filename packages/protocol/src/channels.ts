import { z } from "zod";

/** Key of the control channel when none is configured */
export const DEFAULT_CHANNEL_KEY = "juggernaut";

/** Separator between the channel key and the event name */
export const CHANNEL_DELIMITER = ":";

/**
 * Events the broker emits about connections
 */
export const BusEventTypeSchema = z.enum(["subscribe", "unsubscribe", "custom"]);

export type BusEventType = z.infer<typeof BusEventTypeSchema>;

/**
 * Channel that receives outbound publishes
 */
export function controlChannel(key: string = DEFAULT_CHANNEL_KEY): string {
  return key;
}

/**
 * Inbound channel for a single event type, e.g. "juggernaut:subscribe"
 */
export function eventChannel(
  event: BusEventType,
  key: string = DEFAULT_CHANNEL_KEY
): string {
  return `${key}${CHANNEL_DELIMITER}${event}`;
}

/**
 * All inbound event channels under a key
 */
export function eventChannels(key: string = DEFAULT_CHANNEL_KEY): string[] {
  return BusEventTypeSchema.options.map((event) => eventChannel(event, key));
}
