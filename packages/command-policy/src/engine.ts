/**
 * Policy decision engine: the entry point of the command pipeline.
 *
 * Pipeline per request:
 * 1. Resolve the session id (anonymous unless ids are required)
 * 2. Capture one configuration snapshot
 * 3. Parse into segments
 * 4. Dangerous patterns (raw string, then segments)
 * 5. Classify; blocked or unlisted commands are rejected
 * 6. Session approvals decide between approved and requires-approval
 *
 * Every step is synchronous, so a decision never observes a half-applied
 * configuration update or session mutation.
 */

import {
  CommandApprovalRequiredError,
  CommandDangerousPatternError,
  CommandMalformedInputError,
  CommandNotPermittedError,
  type CommandPolicyError,
  type SessionError,
  SessionRequiredError,
} from "@shellgate/errors";
import { classifySegment } from "./classifier.js";
import type { ConfigSnapshot } from "./config/store.js";
import { ANONYMOUS_SESSION_ID } from "./constants.js";
import type { Logger } from "./logger.js";
import { noopLogger } from "./logger.js";
import { parseCommandLine } from "./parser.js";
import { matchDangerousPattern } from "./patterns.js";
import type { SessionManager } from "./sessions/session-manager.js";
import type {
  ApprovableCategory,
  Category,
  CommandSegment,
  RawCommand,
  RejectedVerdict,
  Session,
  Verdict,
} from "./types.js";

/** Anything that exposes the live snapshot; usually a ConfigStore. */
export interface SnapshotSource {
  readonly snapshot: ConfigSnapshot;
}

export interface PolicyEngineDeps {
  readonly config: SnapshotSource;
  readonly sessions: SessionManager;
  readonly logger?: Logger | undefined;
}

export class PolicyEngine {
  private readonly config: SnapshotSource;
  private readonly sessions: SessionManager;
  private readonly logger: Logger;

  constructor(deps: PolicyEngineDeps) {
    this.config = deps.config;
    this.sessions = deps.sessions;
    this.logger = deps.logger ?? noopLogger;
  }

  decide(request: RawCommand): Verdict {
    const command = request.command;
    const snapshot = this.config.snapshot;

    const sessionId = resolveSessionId(request.sessionId, snapshot);
    if (sessionId === null) {
      return this.reject({
        kind: "rejected",
        code: "session-required",
        command,
        reason: "session id required",
        segmentIndex: null,
      });
    }

    let segments: readonly CommandSegment[];
    try {
      segments = parseCommandLine(command, snapshot.separators);
    } catch (error: unknown) {
      if (error instanceof CommandMalformedInputError) {
        return this.reject({
          kind: "rejected",
          code: "malformed-input",
          command,
          reason: error.message,
          detail: error.detail,
          segmentIndex: null,
        });
      }
      throw error;
    }

    const match = matchDangerousPattern(command, segments, snapshot.patterns);
    if (match !== null) {
      return this.reject({
        kind: "rejected",
        code: "dangerous-pattern",
        command,
        reason: `dangerous pattern: ${match.pattern}`,
        pattern: match.pattern,
        segmentIndex: match.segmentIndex,
      });
    }

    const allowUnrecognized = snapshot.config.security.allow_unrecognized_commands;
    const categories: Category[] = [];
    for (const segment of segments) {
      const category = classifySegment(segment, snapshot.classification);
      if (category === "blocked" || (category === "unrecognized" && !allowUnrecognized)) {
        return this.reject({
          kind: "rejected",
          code: "command-not-permitted",
          command,
          reason: `command not permitted: ${segment.baseCommand}`,
          baseCommand: segment.baseCommand,
          category,
          segmentIndex: segment.index,
        });
      }
      categories.push(category);
    }

    this.sessions.touch(sessionId);

    const needsApproval =
      snapshot.config.security.allow_user_confirmation &&
      !this.sessions.isCommandApproved(sessionId, command);
    const pending = needsApproval ? this.pendingCategories(sessionId, categories) : [];

    if (pending.length > 0) {
      this.logger.info(`approval required (${pending.join(", ")}) in session ${sessionId}`);
      return { kind: "requires-approval", command, categories: pending, sessionId, segments };
    }

    this.logger.debug(`approved "${command}" in session ${sessionId}`);
    return {
      kind: "approved",
      plan: {
        command,
        segments,
        background: segments.some((segment) => segment.background),
        sessionId,
      },
      segments,
      categories,
    };
  }

  /**
   * @throws {SessionRequiredError} when ids are required and none is given
   * @throws {SessionApprovalInvalidError} for anything but write or system
   */
  approve(sessionId: string | undefined, category: string): Session {
    const id = this.requireSessionId(sessionId);
    const session = this.sessions.approve(id, category);
    this.logger.info(`approved ${category} commands for session ${id}`);
    return session;
  }

  /**
   * @throws {SessionRequiredError} when ids are required and none is given
   */
  approveCommand(sessionId: string | undefined, command: string): Session {
    const id = this.requireSessionId(sessionId);
    const session = this.sessions.approveCommand(id, command);
    this.logger.info(`approved command "${command}" for session ${id}`);
    return session;
  }

  // -------------------------------------------------------------------------
  // Private
  // -------------------------------------------------------------------------

  private requireSessionId(sessionId: string | undefined): string {
    const id = resolveSessionId(sessionId, this.config.snapshot);
    if (id === null) {
      throw new SessionRequiredError();
    }
    return id;
  }

  /** Unapproved write/system categories, write first; unlisted commands count as system. */
  private pendingCategories(
    sessionId: string,
    categories: readonly Category[],
  ): ApprovableCategory[] {
    const required = new Set<ApprovableCategory>();
    for (const category of categories) {
      if (category === "write" || category === "system") {
        required.add(category);
      } else if (category === "unrecognized") {
        required.add("system");
      }
    }
    const ordered: readonly ApprovableCategory[] = ["write", "system"];
    return ordered.filter(
      (category) => required.has(category) && !this.sessions.isApproved(sessionId, category),
    );
  }

  private reject(verdict: RejectedVerdict): RejectedVerdict {
    this.logger.warn(`rejected "${verdict.command}": ${verdict.reason}`);
    return verdict;
  }
}

/**
 * Resolves the session id for a request: the given id, the anonymous id
 * when ids are optional, or null when an id is required but missing.
 */
export function resolveSessionId(
  sessionId: string | undefined,
  snapshot: ConfigSnapshot,
): string | null {
  const trimmed = sessionId?.trim();
  if (trimmed) return trimmed;
  return snapshot.config.security.require_session_id ? null : ANONYMOUS_SESSION_ID;
}

/**
 * Maps a non-approved verdict to its error class; approved verdicts map to null.
 */
export function verdictToError(verdict: Verdict): CommandPolicyError | SessionError | null {
  switch (verdict.kind) {
    case "approved":
      return null;
    case "requires-approval":
      return new CommandApprovalRequiredError(
        verdict.command,
        verdict.categories,
        verdict.sessionId,
      );
    case "rejected":
      switch (verdict.code) {
        case "malformed-input":
          return new CommandMalformedInputError(verdict.command, verdict.detail);
        case "dangerous-pattern":
          return new CommandDangerousPatternError(
            verdict.command,
            verdict.pattern,
            verdict.segmentIndex,
          );
        case "command-not-permitted":
          return new CommandNotPermittedError(
            verdict.command,
            verdict.baseCommand,
            verdict.category,
            verdict.segmentIndex,
          );
        case "session-required":
          return new SessionRequiredError();
      }
  }
}
