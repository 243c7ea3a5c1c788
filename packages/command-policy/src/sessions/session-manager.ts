import { SessionApprovalInvalidError } from "@shellgate/errors";
import type { ApprovableCategory, Category, Session } from "../types.js";
import { deepFreeze } from "../utils/deep-freeze.js";
import { mapDelete, mapSet } from "../utils/immutable-map.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface SessionManagerConfig {
  /** Inactivity window in ms; a function is re-read on every check */
  readonly ttlMs: number | (() => number);
  /** Clock in epoch ms; defaults to `Date.now` */
  readonly now?: () => number;
}

/**
 * - `created`: first use of an id
 * - `renewed`: an expired session was replaced by a fresh one
 * - `approved`: a category or exact command was added
 * - `expired`: removed by `sweep()`
 */
export type SessionEvent = "created" | "renewed" | "approved" | "expired";

export type SessionEventHandler = (event: SessionEvent, session: Session) => void;

export function isApprovableCategory(category: string): category is ApprovableCategory {
  return category === "write" || category === "system";
}

// ---------------------------------------------------------------------------
// SessionManager
// ---------------------------------------------------------------------------

/**
 * Tracks approvals per session id with inactivity expiry.
 *
 * Approvals only grow while a session lives. An expired session is never
 * partially invalidated: the next `touch` replaces it with an empty one,
 * and `sweep()` drops the ones nobody touched.
 */
export class SessionManager {
  private sessions: ReadonlyMap<string, Session> = new Map();
  private onEventHandlers: SessionEventHandler[] = [];
  private readonly config: SessionManagerConfig;
  private readonly now: () => number;

  constructor(config: SessionManagerConfig) {
    this.config = config;
    this.now = config.now ?? Date.now;
  }

  get size(): number {
    return this.sessions.size;
  }

  /**
   * Record activity on a session, creating it or replacing an expired one.
   */
  touch(id: string): Session {
    const now = this.now();
    const ttlMs = this.ttl();
    const existing = this.sessions.get(id);

    if (existing !== undefined && !this.isExpired(existing, now)) {
      return this.store({ ...existing, lastActivityAt: now, ttlMs });
    }

    const fresh = this.store({
      id,
      createdAt: now,
      lastActivityAt: now,
      ttlMs,
      approvedCategories: [],
      approvedCommands: [],
    });
    this.emit(existing === undefined ? "created" : "renewed", fresh);
    return fresh;
  }

  /**
   * Approve a category for the session. Idempotent.
   *
   * @throws {SessionApprovalInvalidError} for anything but write or system
   */
  approve(id: string, category: string): Session {
    if (!isApprovableCategory(category)) {
      throw new SessionApprovalInvalidError(category);
    }
    const session = this.touch(id);
    if (session.approvedCategories.includes(category)) {
      return session;
    }
    const updated = this.store({
      ...session,
      approvedCategories: [...session.approvedCategories, category],
    });
    this.emit("approved", updated);
    return updated;
  }

  /**
   * Approve one exact command string for the session. Idempotent.
   */
  approveCommand(id: string, command: string): Session {
    const session = this.touch(id);
    if (session.approvedCommands.includes(command)) {
      return session;
    }
    const updated = this.store({
      ...session,
      approvedCommands: [...session.approvedCommands, command],
    });
    this.emit("approved", updated);
    return updated;
  }

  isApproved(id: string, category: Category): boolean {
    switch (category) {
      case "read":
        return true;
      case "blocked":
      case "unrecognized":
        return false;
      case "write":
      case "system":
        return this.get(id)?.approvedCategories.includes(category) ?? false;
    }
  }

  isCommandApproved(id: string, command: string): boolean {
    return this.get(id)?.approvedCommands.includes(command) ?? false;
  }

  /**
   * Get a live session. Expired sessions read as absent.
   */
  get(id: string): Session | undefined {
    const session = this.sessions.get(id);
    if (session === undefined || this.isExpired(session, this.now())) {
      return undefined;
    }
    return session;
  }

  /**
   * Remove expired sessions. Returns the removed ids.
   */
  sweep(): readonly string[] {
    const now = this.now();
    const removed: string[] = [];
    for (const session of this.sessions.values()) {
      if (this.isExpired(session, now)) {
        removed.push(session.id);
        this.sessions = mapDelete(this.sessions, session.id);
        this.emit("expired", session);
      }
    }
    return removed;
  }

  /**
   * Register a handler for session lifecycle events.
   */
  onEvent(handler: SessionEventHandler): void {
    this.onEventHandlers = [...this.onEventHandlers, handler];
  }

  /**
   * Drop all sessions and handlers. Call on shutdown.
   */
  dispose(): void {
    this.sessions = new Map();
    this.onEventHandlers = [];
  }

  // -------------------------------------------------------------------------
  // Private
  // -------------------------------------------------------------------------

  private ttl(): number {
    return typeof this.config.ttlMs === "function" ? this.config.ttlMs() : this.config.ttlMs;
  }

  private isExpired(session: Session, now: number): boolean {
    return now - session.lastActivityAt > this.ttl();
  }

  private store(session: Session): Session {
    const frozen = deepFreeze(session);
    this.sessions = mapSet(this.sessions, session.id, frozen);
    return frozen;
  }

  private emit(event: SessionEvent, session: Session): void {
    for (const handler of this.onEventHandlers) {
      handler(event, session);
    }
  }
}
