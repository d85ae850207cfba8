import {
  type EventData,
  isConnectionEventData,
} from "@relay-roster/protocol";
import type { EventBus, EventStream } from "../bus/index.js";
import type { PresenceStore } from "../stores/index.js";
import {
  AlreadyRunningError,
  createLogger,
  ValidationError,
} from "../utils/index.js";

const log = createLogger({ module: "roster" });

/**
 * Called when a user's presence changes
 */
export type PresenceListener = (userId: string) => void | Promise<void>;

export interface RosterHooks {
  /** A user went from no connections to at least one */
  onSignedIn?: PresenceListener;
  /** A user's last connection closed */
  onSignedOut?: PresenceListener;
}

export interface RosterOptions {
  bus: EventBus;
  store: PresenceStore;
  /** Key of the user id inside the connection's meta */
  userMetaKey?: string;
  /** Replaces the meta lookup when set */
  resolveUserId?: (data: EventData) => string | null;
  hooks?: RosterHooks;
}

export interface RosterRunOptions {
  signal?: AbortSignal;
}

/**
 * Tracks which users are online from the broker's connection events.
 *
 * A user with several open connections counts once: signed-in fires when the
 * first connection opens and signed-out when the last one closes.
 */
export class Roster {
  readonly userMetaKey: string;

  private bus: EventBus;
  private store: PresenceStore;
  private resolveUserId?: (data: EventData) => string | null;
  private signedInListeners: PresenceListener[] = [];
  private signedOutListeners: PresenceListener[] = [];
  private stream: EventStream | null = null;

  constructor(options: RosterOptions) {
    this.bus = options.bus;
    this.store = options.store;
    this.userMetaKey = options.userMetaKey ?? "user_id";
    this.resolveUserId = options.resolveUserId;

    if (options.hooks?.onSignedIn) {
      this.signedInListeners.push(options.hooks.onSignedIn);
    }
    if (options.hooks?.onSignedOut) {
      this.signedOutListeners.push(options.hooks.onSignedOut);
    }
  }

  /**
   * Register a signed-in listener
   *
   * @returns Function that removes the listener
   */
  onSignedIn(listener: PresenceListener): () => void {
    return addListener(this.signedInListeners, listener);
  }

  /**
   * Register a signed-out listener
   *
   * @returns Function that removes the listener
   */
  onSignedOut(listener: PresenceListener): () => void {
    return addListener(this.signedOutListeners, listener);
  }

  /**
   * User id of the connection an event belongs to, or null for anonymous
   * connections. Numeric ids are converted to strings.
   */
  getUserId(data: EventData): string | null {
    if (this.resolveUserId) {
      return this.resolveUserId(data);
    }

    const value = data.meta?.[this.userMetaKey];
    if (typeof value === "string") {
      return value === "" ? null : value;
    }
    if (typeof value === "number" && Number.isFinite(value)) {
      return String(value);
    }
    return null;
  }

  /**
   * Record a new connection, signing the user in if it is their first
   */
  async onSubscribe(userId: string, data: EventData): Promise<void> {
    const sessionId = requireSessionId("subscribe", data);
    const { before, after } = await this.store.addConnection(
      userId,
      sessionId
    );
    log.debug({ userId, sessionId, before, after }, "Connection added");

    // The store put the user in the online set as part of the add
    if (before === 0 && after > 0) {
      log.info({ userId }, "User signed in");
      await notify(this.signedInListeners, userId);
    }
  }

  /**
   * Forget a connection, signing the user out if it was their last
   */
  async onUnsubscribe(userId: string, data: EventData): Promise<void> {
    const sessionId = requireSessionId("unsubscribe", data);
    const { before, after } = await this.store.removeConnection(
      userId,
      sessionId
    );
    log.debug({ userId, sessionId, before, after }, "Connection removed");

    if (before > 0 && after === 0) {
      log.info({ userId }, "User signed out");
      await notify(this.signedOutListeners, userId);
    }
  }

  /**
   * Apply a single event. Events of anonymous connections and events other
   * than subscribe/unsubscribe are ignored.
   */
  async handleEvent(event: string, data: EventData): Promise<void> {
    const userId = this.getUserId(data);
    if (userId === null) {
      log.debug({ event, sessionId: data.session_id }, "Event without user");
      return;
    }

    switch (event) {
      case "subscribe":
        await this.onSubscribe(userId, data);
        break;
      case "unsubscribe":
        await this.onUnsubscribe(userId, data);
        break;
      default:
        log.debug({ event, userId }, "Ignoring event");
    }
  }

  /**
   * Consume connection events until the stream ends or stop() is called.
   * Rejects on the first decode, store or listener error.
   */
  async run(options: RosterRunOptions = {}): Promise<void> {
    if (this.stream) {
      throw new AlreadyRunningError();
    }

    const stream = this.bus.subscribeListen(options);
    this.stream = stream;
    log.info({ key: this.bus.key }, "Roster started");

    try {
      for await (const { event, data } of stream) {
        await this.handleEvent(event, data);
      }
      log.info("Roster stopped");
    } catch (error) {
      log.error({ error }, "Roster stopped on error");
      throw error;
    } finally {
      stream.close();
      this.stream = null;
    }
  }

  /**
   * Wait until run() is listening on the broker
   */
  async ready(): Promise<void> {
    await this.stream?.ready;
  }

  /**
   * Stop a running roster; run() resolves once the current event is handled
   */
  stop(): void {
    this.stream?.close();
  }

  get isRunning(): boolean {
    return this.stream !== null;
  }

  getOnlineUsers(): Promise<string[]> {
    return this.store.onlineUsers();
  }

  isUserOnline(userId: string): Promise<boolean> {
    return this.store.isOnline(userId);
  }

  getConnectionCount(userId: string): Promise<number> {
    return this.store.connectionCount(userId);
  }
}

function addListener(
  listeners: PresenceListener[],
  listener: PresenceListener
): () => void {
  listeners.push(listener);
  return () => {
    const index = listeners.indexOf(listener);
    if (index !== -1) {
      listeners.splice(index, 1);
    }
  };
}

async function notify(
  listeners: PresenceListener[],
  userId: string
): Promise<void> {
  // Copy so a listener can unsubscribe itself
  for (const listener of [...listeners]) {
    await listener(userId);
  }
}

function requireSessionId(event: string, data: EventData): string {
  if (!isConnectionEventData(data)) {
    throw new ValidationError(`${event} event has no session_id`);
  }
  return data.session_id;
}
