import type { CheckStatus } from "../types/checklist.js";

export const DONE_MARKER = "- [X]";
export const UNDONE_MARKER = "- [ ]";

export function markerFor(status: CheckStatus): string {
  return status === "done" ? DONE_MARKER : UNDONE_MARKER;
}

export function markerForDone(done: boolean): string {
  return markerFor(done ? "done" : "undone");
}

/**
 * Decode a marker token. Matching is exact, so "[x]" or "[-]" yield null.
 */
export function statusFromMarker(token: string): CheckStatus | null {
  switch (token) {
    case DONE_MARKER:
      return "done";
    case UNDONE_MARKER:
      return "undone";
    default:
      return null;
  }
}
