import type { Arc, Puzzle, SlotId } from "./puzzle.js";
import type { DomainStore } from "./domain-store.js";

/**
 * Result from a failed consistency pass: the slot that was left with no options.
 */
export interface ConsistencyFailure {
  emptiedSlotId: SlotId;
}

/**
 * Result from a consistency pass. `undefined` means every domain still has at least one word.
 */
export type ConsistencyResult = ConsistencyFailure | undefined;

/**
 * Remove every word whose length doesn't match its slot. Returns a failure naming the first slot
 * left empty, if any.
 */
export function enforceNodeConsistency(puzzle: Puzzle, domains: DomainStore): ConsistencyResult {
  let failure: ConsistencyResult;

  for (const slot of puzzle.slots) {
    const wrongLength = [...domains.getDomain(slot.id)].filter((word) => word.length !== slot.length);
    for (const word of wrongLength) {
      domains.removeWord(slot.id, word);
    }
    if (failure === undefined && domains.size(slot.id) === 0) {
      failure = { emptiedSlotId: slot.id };
    }
  }

  return failure;
}

/**
 * Make `x` arc consistent with `y` by removing each word of `x` that has no partner in `y` agreeing
 * on their shared cell. Returns whether anything was removed.
 */
export function revise(puzzle: Puzzle, domains: DomainStore, x: SlotId, y: SlotId): boolean {
  const overlap = puzzle.overlap(x, y);
  if (!overlap) {
    return false;
  }
  const [offsetX, offsetY] = overlap;

  const supportedGlyphs = new Set<string>();
  for (const word of domains.getDomain(y)) {
    if (offsetY < word.length) {
      supportedGlyphs.add(word[offsetY]);
    }
  }

  const unsupported = [...domains.getDomain(x)].filter(
    (word) => offsetX >= word.length || !supportedGlyphs.has(word[offsetX]),
  );
  for (const word of unsupported) {
    domains.removeWord(x, word);
  }

  return unsupported.length > 0;
}

/**
 * Propagate arc consistency (AC-3) from the given arcs, or from every arc in the puzzle if none are
 * given. Arcs are processed first-in, first-out; an arc already waiting in the queue isn't queued
 * twice.
 */
export function establishArcConsistency(
  puzzle: Puzzle,
  domains: DomainStore,
  initialArcs: readonly Arc[] = puzzle.arcs(),
): ConsistencyResult {
  const queue: Arc[] = [];
  const queued = new Set<string>();
  let head = 0;

  const enqueue = (arc: Arc) => {
    const key = `${arc[0]},${arc[1]}`;
    if (!queued.has(key)) {
      queued.add(key);
      queue.push(arc);
    }
  };

  for (const arc of initialArcs) {
    enqueue(arc);
  }

  while (head < queue.length) {
    const [x, y] = queue[head++];
    queued.delete(`${x},${y}`);

    if (!revise(puzzle, domains, x, y)) {
      continue;
    }
    if (domains.size(x) === 0) {
      return { emptiedSlotId: x };
    }
    for (const z of puzzle.neighbors(x)) {
      if (z !== y) {
        enqueue([z, x]);
      }
    }
  }

  return undefined;
}
