/**
 * Canonical checklist writer: two spaces per level, a blank line after
 * each top-level block.
 */

import type { ChecklistEntry, ChecklistTree } from "../types/checklist.js";
import { markerForDone } from "./markers.js";

const INDENT = "  ";

function serializeEntry(entry: ChecklistEntry, level: number): string {
  let out = `${INDENT.repeat(level)}${markerForDone(entry.done)}${entry.content}\n`;
  if (entry.hasSub && entry.sub) {
    out += serializeEntry(entry.sub, level + 1);
  }
  return out;
}

export function serializeChecklist(tree: ChecklistTree): string {
  return tree.map((entry) => serializeEntry(entry, 0) + "\n").join("");
}
