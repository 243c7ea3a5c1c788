/**
 * Dangerous pattern matching.
 *
 * Patterns are plain regex sources, compiled once per configuration
 * snapshot. The full raw string is checked first so that constructs
 * spanning separators are caught; segments are checked only when no
 * pattern matches the raw string.
 */

import { CommandPolicyConfigurationError, type ValidationIssue } from "@shellgate/errors";
import type { CommandSegment } from "./types.js";

export interface CompiledPattern {
  readonly source: string;
  readonly regex: RegExp;
}

export interface PatternMatch {
  readonly pattern: string;
  /** First segment whose text matches, or null when only the raw string does */
  readonly segmentIndex: number | null;
}

/**
 * Compiles pattern sources in order.
 *
 * @throws {CommandPolicyConfigurationError} listing every invalid regex
 */
export function compilePatterns(
  sources: readonly string[],
  field = "commands.dangerous_patterns",
): readonly CompiledPattern[] {
  const compiled: CompiledPattern[] = [];
  const issues: ValidationIssue[] = [];

  sources.forEach((source, index) => {
    try {
      compiled.push({ source, regex: new RegExp(source) });
    } catch (error: unknown) {
      issues.push({
        field: `${field}.${index}`,
        message: error instanceof Error ? error.message : String(error),
        code: "invalid_regex",
      });
    }
  });

  if (issues.length > 0) {
    const summary = issues.map((issue) => `${issue.field}: ${issue.message}`).join("; ");
    throw new CommandPolicyConfigurationError(`invalid dangerous pattern (${summary})`, issues);
  }

  return compiled;
}

export function matchDangerousPattern(
  raw: string,
  segments: readonly CommandSegment[],
  patterns: readonly CompiledPattern[],
): PatternMatch | null {
  for (const pattern of patterns) {
    if (pattern.regex.test(raw)) {
      const segment = segments.find((s) => pattern.regex.test(s.text));
      return { pattern: pattern.source, segmentIndex: segment?.index ?? null };
    }
  }

  for (const segment of segments) {
    for (const pattern of patterns) {
      if (pattern.regex.test(segment.text)) {
        return { pattern: pattern.source, segmentIndex: segment.index };
      }
    }
  }

  return null;
}
