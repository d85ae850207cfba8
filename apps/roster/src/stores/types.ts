import type { SetChange } from "@relay-roster/redis";

/** Key prefix of the presence keys when none is configured */
export const DEFAULT_KEY_PREFIX = "juggernaut-roster:";

/**
 * Connection count of a user immediately before and after an add or remove
 */
export type ConnectionChange = SetChange;

/**
 * Durable presence state: the open sessions of each user and the set of users
 * believed online
 */
export interface PresenceStore {
  /**
   * Record a session for a user. The counts are read, and a user with no
   * sessions before joins the online set, in the same atomic operation as
   * the add.
   */
  addConnection(userId: string, sessionId: string): Promise<ConnectionChange>;

  /**
   * Forget a session of a user. The counts are read, and a user left with no
   * sessions leaves the online set, in the same atomic operation as the
   * removal.
   */
  removeConnection(
    userId: string,
    sessionId: string
  ): Promise<ConnectionChange>;

  connectionCount(userId: string): Promise<number>;

  /** Idempotent; sets online-set membership directly */
  markOnline(userId: string): Promise<void>;

  /** Idempotent */
  markOffline(userId: string): Promise<void>;

  /**
   * Users in the online set, sorted
   */
  onlineUsers(): Promise<string[]>;

  /**
   * Whether the user has at least one recorded session
   */
  isOnline(userId: string): Promise<boolean>;
}
