/**
 * Checklist exports
 */

export { parseChecklist, parseLine, type ParseOptions, type ParsedLine } from "./parser.js";
export { serializeChecklist } from "./serializer.js";
export {
  calculateProgress,
  countProgress,
  propagateRestDone,
  toPercentage,
  type CalculateOptions,
} from "./progress.js";
export {
  DONE_MARKER,
  UNDONE_MARKER,
  markerFor,
  markerForDone,
  statusFromMarker,
} from "./markers.js";
