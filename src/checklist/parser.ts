/**
 * Checklist parser
 *
 * Reads the two-level checkbox format:
 *
 *   - [ ] top-level content
 *     - [X] sub content
 *
 * Any indentation (spaces only) marks a sub-entry of the preceding
 * top-level entry. Blank lines are skipped.
 */

import type { CheckStatus, ChecklistTree, SubEntryPolicy } from "../types/checklist.js";
import { DONE_MARKER, statusFromMarker } from "./markers.js";
import {
  DuplicateSubEntryError,
  MalformedLineError,
  OrphanSubEntryError,
} from "../utils/errors.js";

export interface ParseOptions {
  /** Default: "replace" */
  subEntryPolicy?: SubEntryPolicy;
}

export interface ParsedLine {
  indent: number;
  status: CheckStatus;
  content: string;
}

const MARKER_LENGTH = DONE_MARKER.length;
const BLANK_LINE = /^ *$/;

/**
 * Decode a single non-blank line, or null when it does not follow the grammar
 */
export function parseLine(line: string): ParsedLine | null {
  let indent = 0;
  while (line[indent] === " ") {
    indent++;
  }

  const status = statusFromMarker(line.slice(indent, indent + MARKER_LENGTH));
  if (status === null) {
    return null;
  }

  return { indent, status, content: line.slice(indent + MARKER_LENGTH) };
}

export function parseChecklist(text: string, options: ParseOptions = {}): ChecklistTree {
  const policy = options.subEntryPolicy ?? "replace";
  const tree: ChecklistTree = [];
  // line number of the current parent's sub-entry, if any
  let subLine: number | undefined;

  const lines = text.split("\n");
  for (let i = 0; i < lines.length; i++) {
    const lineNumber = i + 1;
    const line = (lines[i] ?? "").replace(/\r$/, "");

    if (BLANK_LINE.test(line)) continue;

    const parsed = parseLine(line);
    if (!parsed) {
      throw new MalformedLineError(lineNumber, line);
    }

    const entry = { done: parsed.status === "done", content: parsed.content, hasSub: false };

    if (parsed.indent === 0) {
      tree.push(entry);
      subLine = undefined;
      continue;
    }

    const parent = tree[tree.length - 1];
    if (!parent) {
      throw new OrphanSubEntryError(lineNumber);
    }
    if (subLine !== undefined && policy === "reject") {
      throw new DuplicateSubEntryError(lineNumber, subLine);
    }

    parent.hasSub = true;
    parent.sub = entry;
    subLine = lineNumber;
  }

  return tree;
}
