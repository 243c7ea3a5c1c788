/**
 * Quote- and escape-aware splitter for chained shell input.
 *
 * Not a shell interpreter: no expansion, globbing or subshells. Quoted
 * spans never split. Single quotes keep every character literal, double
 * quotes resolve only `\"` and `\\`, and outside quotes a backslash makes
 * the next character literal. An unquoted `#` at the start of a word begins
 * a comment that runs to the end of the input. Only enabled separators
 * split; a disabled one stays in the segment text and tokens.
 */

import { posix } from "node:path";
import { CommandMalformedInputError } from "@shellgate/errors";
import { MAX_COMMAND_LENGTH, SEPARATOR_CHARS } from "./constants.js";
import type { CommandSegment, Separator, SeparatorKind } from "./types.js";

function separatorKind(ch: string): SeparatorKind | null {
  switch (ch) {
    case SEPARATOR_CHARS.pipe:
      return "pipe";
    case SEPARATOR_CHARS.sequence:
      return "sequence";
    case SEPARATOR_CHARS.background:
      return "background";
    default:
      return null;
  }
}

/**
 * Splits `raw` into ordered segments.
 *
 * @throws {CommandMalformedInputError} on empty or oversized input, an
 *   unterminated quote, an empty segment, or an unquoted line break
 */
export function parseCommandLine(
  raw: string,
  enabledSeparators: ReadonlySet<SeparatorKind>,
): readonly CommandSegment[] {
  const malformed = (detail: string) => new CommandMalformedInputError(raw, detail);

  if (raw.length > MAX_COMMAND_LENGTH) {
    throw malformed(`command exceeds ${MAX_COMMAND_LENGTH} characters`);
  }
  if (raw.trim().length === 0) {
    throw malformed("empty command");
  }

  const segments: CommandSegment[] = [];
  let tokens: string[] = [];
  let current = "";
  let inToken = false;
  let quote: "'" | '"' | null = null;
  let quoteStart = 0;
  let segmentStart = 0;
  let separator: Separator = "none";
  let end = raw.length;

  const endToken = (): void => {
    if (inToken) {
      tokens.push(current);
      current = "";
      inToken = false;
    }
  };

  const pushSegment = (end: number, background: boolean): void => {
    const first = tokens[0] ?? "";
    segments.push({
      index: segments.length,
      text: raw.slice(segmentStart, end).trim(),
      tokens,
      separator,
      baseCommand: posix.basename(first),
      background,
    });
    tokens = [];
  };

  for (let i = 0; i < raw.length; i++) {
    const ch = raw.charAt(i);

    if (quote !== null) {
      if (quote === '"' && ch === "\\" && i + 1 < raw.length) {
        const next = raw.charAt(i + 1);
        if (next === '"' || next === "\\") {
          current += next;
          i++;
          continue;
        }
      }
      if (ch === quote) {
        quote = null;
      } else {
        current += ch;
      }
      continue;
    }

    if (ch === "'" || ch === '"') {
      quote = ch;
      quoteStart = i;
      inToken = true;
      continue;
    }

    if (ch === "#" && !inToken) {
      end = i;
      break;
    }

    if (ch === "\\") {
      current += i + 1 < raw.length ? raw.charAt(++i) : ch;
      inToken = true;
      continue;
    }

    if (ch === "\n" || ch === "\r") {
      throw malformed(`unquoted line break at position ${i}`);
    }

    const kind = separatorKind(ch);
    if (kind !== null && enabledSeparators.has(kind)) {
      endToken();
      if (tokens.length === 0) {
        throw malformed(`empty command before "${ch}" at position ${i}`);
      }
      pushSegment(i, kind === "background");
      separator = kind;
      segmentStart = i + 1;
      continue;
    }

    if (ch === " " || ch === "\t") {
      endToken();
      continue;
    }

    current += ch;
    inToken = true;
  }

  if (quote !== null) {
    const which = quote === "'" ? "single" : "double";
    throw malformed(`unterminated ${which} quote at position ${quoteStart}`);
  }

  endToken();
  if (tokens.length > 0) {
    pushSegment(end, false);
  } else if (separator === "none") {
    throw malformed("empty command");
  } else if (separator !== "background") {
    throw malformed(`missing command after trailing "${SEPARATOR_CHARS[separator]}"`);
  }

  return segments;
}
