import type { ConnectionChange, PresenceStore } from "./types.js";

/**
 * Presence store held in process memory. State is lost on exit and not shared
 * between processes.
 */
export class MemoryPresenceStore implements PresenceStore {
  // userId -> session ids
  private connections = new Map<string, Set<string>>();
  private online = new Set<string>();

  async addConnection(
    userId: string,
    sessionId: string
  ): Promise<ConnectionChange> {
    let sessions = this.connections.get(userId);
    if (!sessions) {
      sessions = new Set();
      this.connections.set(userId, sessions);
    }

    const before = sessions.size;
    sessions.add(sessionId);
    if (before === 0) {
      this.online.add(userId);
    }
    return { before, after: sessions.size };
  }

  async removeConnection(
    userId: string,
    sessionId: string
  ): Promise<ConnectionChange> {
    const sessions = this.connections.get(userId);
    if (!sessions) {
      return { before: 0, after: 0 };
    }

    const before = sessions.size;
    sessions.delete(sessionId);
    if (sessions.size === 0) {
      this.connections.delete(userId);
      this.online.delete(userId);
    }
    return { before, after: sessions.size };
  }

  async connectionCount(userId: string): Promise<number> {
    return this.connections.get(userId)?.size ?? 0;
  }

  async markOnline(userId: string): Promise<void> {
    this.online.add(userId);
  }

  async markOffline(userId: string): Promise<void> {
    this.online.delete(userId);
  }

  async onlineUsers(): Promise<string[]> {
    return [...this.online].sort();
  }

  async isOnline(userId: string): Promise<boolean> {
    return (await this.connectionCount(userId)) > 0;
  }

  /**
   * Drop all recorded state
   */
  clear(): void {
    this.connections.clear();
    this.online.clear();
  }
}
