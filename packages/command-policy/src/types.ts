/**
 * Core type definitions for @shellgate/command-policy
 */

// ---------------------------------------------------------------------------
// Segments
// ---------------------------------------------------------------------------

/** Separator that introduced a segment; the first segment is always "none". */
export type Separator = "pipe" | "sequence" | "background" | "none";

/** Separators that can be enabled or disabled in configuration. */
export type SeparatorKind = Exclude<Separator, "none">;

export interface CommandSegment {
  readonly index: number;
  /** Trimmed source slice, quotes intact */
  readonly text: string;
  /** Quote-stripped, escape-resolved tokens */
  readonly tokens: readonly string[];
  readonly separator: Separator;
  readonly baseCommand: string;
  /** True when the segment is terminated by `&` */
  readonly background: boolean;
}

// ---------------------------------------------------------------------------
// Classification
// ---------------------------------------------------------------------------

export type Category = "read" | "write" | "system" | "blocked" | "unrecognized";

export type ApprovableCategory = "write" | "system";

export type ListedCategory = Exclude<Category, "unrecognized">;

export type ClassificationMap = ReadonlyMap<string, ListedCategory>;

/** A command listed in more than one of the read/write/system lists. */
export interface ClassificationConflict {
  readonly command: string;
  readonly listedIn: readonly ListedCategory[];
  readonly resolved: ListedCategory;
}

// ---------------------------------------------------------------------------
// Requests and verdicts
// ---------------------------------------------------------------------------

export interface RawCommand {
  readonly command: string;
  readonly sessionId?: string | undefined;
}

export interface ExecutionPlan {
  readonly command: string;
  readonly segments: readonly CommandSegment[];
  /** True when any segment runs in the background */
  readonly background: boolean;
  readonly sessionId: string;
}

export interface ApprovedVerdict {
  readonly kind: "approved";
  readonly plan: ExecutionPlan;
  readonly segments: readonly CommandSegment[];
  /** Category per segment, aligned by index */
  readonly categories: readonly Category[];
}

export interface RequiresApprovalVerdict {
  readonly kind: "requires-approval";
  readonly command: string;
  /** Unapproved categories, write before system */
  readonly categories: readonly ApprovableCategory[];
  readonly sessionId: string;
  readonly segments: readonly CommandSegment[];
}

interface RejectedBase {
  readonly kind: "rejected";
  readonly command: string;
  readonly reason: string;
}

export interface MalformedInputRejection extends RejectedBase {
  readonly code: "malformed-input";
  readonly detail: string;
  readonly segmentIndex: null;
}

export interface DangerousPatternRejection extends RejectedBase {
  readonly code: "dangerous-pattern";
  readonly pattern: string;
  readonly segmentIndex: number | null;
}

export interface CommandNotPermittedRejection extends RejectedBase {
  readonly code: "command-not-permitted";
  readonly baseCommand: string;
  readonly category: "blocked" | "unrecognized";
  readonly segmentIndex: number;
}

export interface SessionRequiredRejection extends RejectedBase {
  readonly code: "session-required";
  readonly segmentIndex: null;
}

export type RejectedVerdict =
  | MalformedInputRejection
  | DangerousPatternRejection
  | CommandNotPermittedRejection
  | SessionRequiredRejection;

export type RejectionCode = RejectedVerdict["code"];

export type Verdict = ApprovedVerdict | RequiresApprovalVerdict | RejectedVerdict;

// ---------------------------------------------------------------------------
// Sessions
// ---------------------------------------------------------------------------

export interface Session {
  readonly id: string;
  readonly createdAt: number;
  readonly lastActivityAt: number;
  readonly ttlMs: number;
  readonly approvedCategories: readonly ApprovableCategory[];
  readonly approvedCommands: readonly string[];
}
