/**
 * Base command → Category lookup.
 *
 * Precedence: blocked > system > write > read > unrecognized.
 * Arguments are never inspected.
 */

import type { CommandsConfig } from "./config/schema.js";
import type {
  Category,
  ClassificationConflict,
  ClassificationMap,
  CommandSegment,
  ListedCategory,
} from "./types.js";

const PRECEDENCE: Readonly<Record<ListedCategory, number>> = {
  read: 0,
  write: 1,
  system: 2,
  blocked: 3,
};

export interface ClassificationTable {
  readonly map: ClassificationMap;
  /** Commands listed in more than one of read/write/system */
  readonly conflicts: readonly ClassificationConflict[];
}

export function buildClassificationMap(commands: CommandsConfig): ClassificationTable {
  const lists: readonly (readonly [ListedCategory, readonly string[]])[] = [
    ["read", commands.read_commands],
    ["write", commands.write_commands],
    ["system", commands.system_commands],
    ["blocked", commands.blocked_commands],
  ];

  const memberships = new Map<string, ListedCategory[]>();
  for (const [category, names] of lists) {
    for (const name of names) {
      const listed = memberships.get(name);
      if (listed === undefined) {
        memberships.set(name, [category]);
      } else if (!listed.includes(category)) {
        listed.push(category);
      }
    }
  }

  const map = new Map<string, ListedCategory>();
  const conflicts: ClassificationConflict[] = [];

  for (const [name, listed] of memberships) {
    const resolved = listed.reduce((winner, category) =>
      PRECEDENCE[category] > PRECEDENCE[winner] ? category : winner,
    );
    map.set(name, resolved);

    const trustLists = listed.filter((category) => category !== "blocked");
    if (trustLists.length > 1) {
      conflicts.push({ command: name, listedIn: trustLists, resolved });
    }
  }

  return { map, conflicts };
}

export function classifySegment(segment: CommandSegment, map: ClassificationMap): Category {
  return map.get(segment.baseCommand) ?? "unrecognized";
}
