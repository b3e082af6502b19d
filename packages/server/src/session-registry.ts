/**
 * Session Registry
 *
 * Live mapping of session id to session. Every operation completes within one
 * event-loop turn, so no request or socket event observes a half-applied change.
 */

import type { Session } from "./types.js";
import { DuplicateSessionError } from "./errors.js";

function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export class SessionRegistry {
  private sessions = new Map<string, Session>();

  /**
   * Register a new session. Ids are never reused while live.
   */
  put(id: string, session: Session): void {
    if (this.sessions.has(id)) {
      throw new DuplicateSessionError(id);
    }
    this.sessions.set(id, session);
  }

  get(id: string): Session | undefined {
    return this.sessions.get(id);
  }

  has(id: string): boolean {
    return this.sessions.has(id);
  }

  /**
   * Deregister a session. Removing an absent id does nothing.
   * @returns whether an entry was removed
   */
  remove(id: string): boolean {
    return this.sessions.delete(id);
  }

  get size(): number {
    return this.sessions.size;
  }

  /** Live ids in sorted order */
  ids(): string[] {
    return Array.from(this.sessions.keys()).sort(compareIds);
  }

  /** Live sessions, ordered by id */
  values(): Session[] {
    return Array.from(this.sessions.entries())
      .sort(([a], [b]) => compareIds(a, b))
      .map(([, session]) => session);
  }
}
