import type { Puzzle, SlotId } from "./puzzle.js";

/**
 * A (possibly partial) mapping from slot to the word placed in it.
 */
export type Assignment = Map<SlotId, string>;

/**
 * Check that no word is used twice, every word fits its slot, and every pair of assigned crossing
 * slots agrees on their shared cell.
 */
export function isConsistent(puzzle: Puzzle, assignment: ReadonlyMap<SlotId, string>): boolean {
  const seenWords = new Set<string>();

  for (const [slotId, word] of assignment) {
    if (seenWords.has(word)) {
      return false;
    }
    seenWords.add(word);

    if (word.length !== puzzle.slot(slotId).length) {
      return false;
    }

    for (const neighborId of puzzle.neighbors(slotId)) {
      const neighborWord = assignment.get(neighborId);
      const overlap = puzzle.overlap(slotId, neighborId);
      if (neighborWord === undefined || !overlap) {
        continue;
      }
      if (word[overlap[0]] !== neighborWord[overlap[1]]) {
        return false;
      }
    }
  }

  return true;
}

/**
 * Does the assignment fill every slot in the puzzle?
 */
export function isComplete(puzzle: Puzzle, assignment: ReadonlyMap<SlotId, string>): boolean {
  return puzzle.slots.every((slot) => assignment.has(slot.id));
}

/**
 * The words placed anywhere in the assignment other than `exceptSlotId`.
 */
export function usedWords(
  assignment: ReadonlyMap<SlotId, string>,
  exceptSlotId?: SlotId,
): Set<string> {
  const words = new Set<string>();
  for (const [slotId, word] of assignment) {
    if (slotId !== exceptSlotId) {
      words.add(word);
    }
  }
  return words;
}
