/**
 * Progress calculation
 *
 * Rest-done rule: walking a chain (entry, then its sub-entry), once a
 * parent evaluates as done every later node of the chain is done too.
 * The rule is applied as a pure transformation; the input tree is never
 * mutated.
 */

import type {
  ChecklistEntry,
  ChecklistTree,
  EmptyChecklistPolicy,
  ProgressCount,
  ProgressResult,
} from "../types/checklist.js";
import { EmptyChecklistError } from "../utils/errors.js";

export interface CalculateOptions {
  /** Default: "zero" */
  emptyChecklist?: EmptyChecklistPolicy;
}

function propagateEntry(entry: ChecklistEntry, restDone: boolean): ChecklistEntry {
  const done = entry.done || restDone;
  const copy: ChecklistEntry = { done, content: entry.content, hasSub: entry.hasSub };
  if (entry.sub) {
    copy.sub = propagateEntry(entry.sub, restDone || (done && entry.hasSub));
  }
  return copy;
}

/**
 * Return a copy of the tree with the rest-done rule applied
 */
export function propagateRestDone(tree: ChecklistTree): ChecklistTree {
  return tree.map((entry) => propagateEntry(entry, false));
}

function countEntry(entry: ChecklistEntry, restDone: boolean, count: ProgressCount): void {
  let rest = restDone;
  if (entry.done || rest) {
    count.done++;
    if (entry.hasSub) {
      rest = true;
    }
  }
  count.total++;

  if (entry.sub) {
    countEntry(entry.sub, rest, count);
  }
}

/**
 * Count done and total nodes (top-level and sub-entries) under the rest-done rule
 */
export function countProgress(tree: ChecklistTree): ProgressCount {
  const count: ProgressCount = { done: 0, total: 0 };
  for (const entry of tree) {
    countEntry(entry, false, count);
  }
  return count;
}

export function toPercentage(count: ProgressCount, options: CalculateOptions = {}): number {
  if (count.total === 0) {
    if ((options.emptyChecklist ?? "zero") === "error") {
      throw new EmptyChecklistError();
    }
    return 0;
  }
  return (count.done / count.total) * 100;
}

export function calculateProgress(
  tree: ChecklistTree,
  options: CalculateOptions = {},
): ProgressResult {
  const count = countProgress(tree);
  return {
    ...count,
    percentage: toPercentage(count, options),
    tree: propagateRestDone(tree),
  };
}
