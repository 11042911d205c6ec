/**
 * Checklist types for todo-progress
 */

/**
 * One line item of the checklist
 */
export interface ChecklistEntry {
  done: boolean;
  /** Text after the checkbox marker, verbatim (leading space included) */
  content: string;
  /** True iff `sub` is present */
  hasSub: boolean;
  /** Nested entry; a sub-entry never has one of its own */
  sub?: ChecklistEntry;
}

/**
 * Top-level entries in file line order
 */
export type ChecklistTree = ChecklistEntry[];

/**
 * Checkbox state
 */
export type CheckStatus = "done" | "undone";

/**
 * What to do when a second indented line follows the same parent
 */
export type SubEntryPolicy =
  | "replace" // keep the last sub-entry
  | "reject"; // fail with DuplicateSubEntryError

/**
 * Percentage reported for a checklist without entries
 */
export type EmptyChecklistPolicy =
  | "zero" // report 0%
  | "error"; // fail with EmptyChecklistError

export interface ProgressCount {
  done: number;
  total: number;
}

export interface ProgressResult extends ProgressCount {
  /** done / total * 100 */
  percentage: number;
  /** Tree with the rest-done rule applied */
  tree: ChecklistTree;
}
