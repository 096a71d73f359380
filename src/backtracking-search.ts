import type { Arc, Puzzle, SlotId } from "./puzzle.js";
import type { Assignment } from "./assignment.js";
import type { DomainSnapshot } from "./domain-store.js";
import { isComplete, isConsistent, usedWords } from "./assignment.js";
import { DomainStore } from "./domain-store.js";
import { enforceNodeConsistency, establishArcConsistency } from "./arc-consistency.js";

/**
 * A class tracking stats about the filling process.
 */
export class Statistics {
  /** How many tentative word choices were made. */
  public states = 0;
  /** How many slots ran out of candidates and had to be abandoned. */
  public backtracks = 0;
  public totalTime = 0;
}

/**
 * A struct representing the results of a fill operation.
 */
export interface FillSuccess {
  type: "Success";
  statistics: Statistics;
  assignment: Assignment;
}

export interface FillFailure {
  type: "NoSolution";
  statistics: Statistics;
}

export type FillResult = FillSuccess | FillFailure;

/**
 * Everything a search owns while it runs. Nothing here is shared between searches.
 */
export interface SearchContext {
  puzzle: Puzzle;
  domains: DomainStore;
  assignment: Assignment;
  statistics: Statistics;
}

/**
 * One level of the search: the slot being tried, its ordered candidates, and the domain state to
 * return to before each attempt.
 */
interface SearchFrame {
  slotId: SlotId;
  candidates: string[];
  nextCandidate: number;
  snapshot: DomainSnapshot;
}

/**
 * Pick the unassigned slot with the fewest remaining options, preferring the slot with the most
 * neighbors and then the lowest id.
 */
export function selectUnassignedSlot(context: SearchContext): SlotId | undefined {
  const { puzzle, domains, assignment } = context;
  let best: SlotId | undefined;

  for (const slot of puzzle.slots) {
    if (assignment.has(slot.id)) {
      continue;
    }
    if (best === undefined) {
      best = slot.id;
      continue;
    }

    const sizeDiff = domains.size(slot.id) - domains.size(best);
    if (sizeDiff < 0 || (sizeDiff === 0 && puzzle.degree(slot.id) > puzzle.degree(best))) {
      best = slot.id;
    }
  }

  return best;
}

/**
 * How many options choosing `word` for `slotId` would rule out among its neighbors: every
 * neighbor word that disagrees on the shared cell, plus one for each neighbor that could otherwise
 * have used the same word.
 */
export function eliminationCost(context: SearchContext, slotId: SlotId, word: string): number {
  const { puzzle, domains } = context;
  let cost = 0;

  for (const neighborId of puzzle.neighbors(slotId)) {
    const overlap = puzzle.overlap(slotId, neighborId);
    if (!overlap) {
      continue;
    }
    const [offset, neighborOffset] = overlap;
    if (domains.has(neighborId, word)) {
      cost++;
    }
    for (const neighborWord of domains.getDomain(neighborId)) {
      if (word[offset] !== neighborWord[neighborOffset]) {
        cost++;
      }
    }
  }

  return cost;
}

/**
 * Order a slot's remaining words so the least constraining one comes first, leaving out words
 * already placed elsewhere. Ties are broken alphabetically.
 */
export function orderDomainValues(context: SearchContext, slotId: SlotId): string[] {
  const used = usedWords(context.assignment, slotId);
  const costs = new Map<string, number>();

  for (const word of context.domains.getDomain(slotId)) {
    if (!used.has(word)) {
      costs.set(word, eliminationCost(context, slotId, word));
    }
  }

  return [...costs.keys()].sort((a, b) => {
    const costDiff = (costs.get(a) ?? 0) - (costs.get(b) ?? 0);
    if (costDiff !== 0) {
      return costDiff;
    }
    return a < b ? -1 : a > b ? 1 : 0;
  });
}

/**
 * Try the frame's remaining candidates in order until one survives propagation and the
 * consistency check. Returns false, with the frame's slot unassigned and its snapshot restored,
 * once the candidates run out.
 */
function tryNextCandidate(context: SearchContext, frame: SearchFrame): boolean {
  const { puzzle, domains, assignment, statistics } = context;

  while (frame.nextCandidate < frame.candidates.length) {
    domains.restore(frame.snapshot);
    assignment.delete(frame.slotId);

    const word = frame.candidates[frame.nextCandidate++];
    statistics.states++;

    assignment.set(frame.slotId, word);
    domains.setDomain(frame.slotId, [word]);

    const arcs = puzzle.neighbors(frame.slotId)
      .filter((neighborId) => !assignment.has(neighborId))
      .map((neighborId): Arc => [neighborId, frame.slotId]);

    if (
      establishArcConsistency(puzzle, domains, arcs) === undefined &&
      isConsistent(puzzle, assignment)
    ) {
      return true;
    }
  }

  domains.restore(frame.snapshot);
  assignment.delete(frame.slotId);
  return false;
}

/**
 * Depth-first search for a complete assignment, extending the context's assignment one slot per
 * frame. Returns the first complete assignment found, or `undefined` once every branch fails.
 *
 * The frames live on an explicit stack, so puzzle size isn't limited by the call stack.
 */
export function backtrack(context: SearchContext): Assignment | undefined {
  const { puzzle, domains, assignment, statistics } = context;
  const frames: SearchFrame[] = [];
  let descend = true;

  while (true) {
    if (descend) {
      if (isComplete(puzzle, assignment)) {
        return assignment;
      }
      const slotId = selectUnassignedSlot(context);
      if (slotId === undefined) {
        return undefined;
      }
      frames.push({
        slotId,
        candidates: orderDomainValues(context, slotId),
        nextCandidate: 0,
        snapshot: domains.snapshot(),
      });
    }

    const frame = frames[frames.length - 1];
    if (!frame) {
      return undefined;
    }

    descend = tryNextCandidate(context, frame);
    if (!descend) {
      frames.pop();
      statistics.backtracks++;
    }
  }
}

/**
 * Search for a valid fill for the given puzzle: establish node and arc consistency over the whole
 * grid, then backtrack from an empty assignment.
 */
export function findFill(puzzle: Puzzle, vocabulary: Iterable<string>): FillResult {
  const start = Date.now();
  const statistics = new Statistics();
  const domains = DomainStore.forPuzzle(puzzle, vocabulary);

  const noSolution = (): FillFailure => {
    statistics.totalTime = Date.now() - start;
    return { type: "NoSolution", statistics };
  };

  if (enforceNodeConsistency(puzzle, domains) || establishArcConsistency(puzzle, domains)) {
    return noSolution();
  }

  const assignment = backtrack({ puzzle, domains, assignment: new Map(), statistics });
  if (!assignment) {
    return noSolution();
  }

  statistics.totalTime = Date.now() - start;
  return { type: "Success", statistics, assignment: new Map(assignment) };
}
