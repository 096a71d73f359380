export {
  buildPuzzle,
  buildPuzzleFromStructureString,
  Direction,
  generateSlotsFromStructure,
  parseStructure,
  Puzzle,
  PuzzleError,
  Slot,
} from "./puzzle.js";
export type { Arc, GridCoord, Overlap, SlotId, SlotSpec, Structure } from "./puzzle.js";
export { DomainStore, DomainStoreError } from "./domain-store.js";
export type { DomainSnapshot } from "./domain-store.js";
export { enforceNodeConsistency, establishArcConsistency, revise } from "./arc-consistency.js";
export type { ConsistencyFailure, ConsistencyResult } from "./arc-consistency.js";
export { isComplete, isConsistent, usedWords } from "./assignment.js";
export type { Assignment } from "./assignment.js";
export {
  backtrack,
  eliminationCost,
  findFill,
  orderDomainValues,
  selectUnassignedSlot,
  Statistics,
} from "./backtracking-search.js";
export type { FillFailure, FillResult, FillSuccess, SearchContext } from "./backtracking-search.js";
export { normalizeWord, parseWordListFileContents, WordList, WordListError } from "./word-list.js";
export type { WordListEntry, WordListSourceConfig } from "./word-list.js";
export { letterGrid, renderGrid, renderSvg } from "./render.js";
