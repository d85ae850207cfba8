export { type EventBusOptions, EventBus, type EventHandler } from "./event-bus.js";
export { EventStream, type EventStreamOptions } from "./event-stream.js";
