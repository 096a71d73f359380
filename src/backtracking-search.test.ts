import { expect, test } from "vitest";
import { buildPuzzleFromStructureString, type Puzzle } from "./puzzle.js";
import { DomainStore } from "./domain-store.js";
import { enforceNodeConsistency, establishArcConsistency } from "./arc-consistency.js";
import { type Assignment, isComplete, isConsistent } from "./assignment.js";
import {
  eliminationCost,
  findFill,
  orderDomainValues,
  type SearchContext,
  selectUnassignedSlot,
  Statistics,
} from "./backtracking-search.js";

const crossingGrid = "___#\n#_##\n#___\n";
const ladderGrid = "_____\n_#_#_\n_____\n";
const threeLetterWords = ["CAT", "CAR", "ART", "TAR"];

function createContext(puzzle: Puzzle, vocabulary: string[]): SearchContext {
  const domains = DomainStore.forPuzzle(puzzle, vocabulary);
  enforceNodeConsistency(puzzle, domains);
  return { puzzle, domains, assignment: new Map(), statistics: new Statistics() };
}

function expectValidSolution(puzzle: Puzzle, assignment: Assignment) {
  expect(isComplete(puzzle, assignment)).toBe(true);
  expect(isConsistent(puzzle, assignment)).toBe(true);
  expect(new Set(assignment.values()).size).toBe(puzzle.slots.length);
}

/**
 * Exhaustively look for any valid fill, without propagation or ordering heuristics.
 */
function bruteForceHasSolution(puzzle: Puzzle, vocabulary: string[]): boolean {
  const assignment: Assignment = new Map();
  const extend = (slotIndex: number): boolean => {
    const slot = puzzle.slots[slotIndex];
    if (!slot) {
      return true;
    }
    for (const word of vocabulary) {
      assignment.set(slot.id, word);
      if (isConsistent(puzzle, assignment) && extend(slotIndex + 1)) {
        return true;
      }
      assignment.delete(slot.id);
    }
    return false;
  };
  return extend(0);
}

/**
 * Small deterministic pseudo-random generator, so generated fixtures are stable across runs.
 */
function createRandom(seed: number): () => number {
  let state = seed;
  return () => {
    state = (state * 48271) % 2147483647;
    return state / 2147483647;
  };
}

function randomWords(random: () => number, count: number, length: number, letters: string): string[] {
  return Array.from({ length: count }, () =>
    Array.from({ length }, () => letters[Math.floor(random() * letters.length)]).join("")
  );
}

test("selectUnassignedSlot breaks ties on domain size by degree", () => {
  const context = createContext(buildPuzzleFromStructureString(crossingGrid), threeLetterWords);

  expect(selectUnassignedSlot(context)).toBe(2);
});

test("selectUnassignedSlot prefers the smallest domain", () => {
  const puzzle = buildPuzzleFromStructureString(crossingGrid);
  const context = createContext(puzzle, threeLetterWords);
  establishArcConsistency(puzzle, context.domains);

  // Slots 1 and 2 are both down to one word; slot 2 has more neighbors.
  expect(selectUnassignedSlot(context)).toBe(2);

  context.assignment.set(2, "ART");
  expect(selectUnassignedSlot(context)).toBe(1);

  context.assignment.set(1, "TAR");
  context.assignment.set(0, "CAR");
  expect(selectUnassignedSlot(context)).toBeUndefined();
});

test("eliminationCost counts conflicting and identical neighbor words", () => {
  const context = createContext(buildPuzzleFromStructureString(crossingGrid), threeLetterWords);

  // "CAT" shares its "A" with only one of the down slot's first letters, and could have been
  // used by the down slot itself.
  expect(eliminationCost(context, 0, "CAT")).toBe(4);
  expect(eliminationCost(context, 0, "ART")).toBe(5);
});

test("orderDomainValues puts the least constraining word first", () => {
  const context = createContext(buildPuzzleFromStructureString(crossingGrid), threeLetterWords);

  expect(orderDomainValues(context, 0)).toEqual(["CAR", "CAT", "TAR", "ART"]);

  context.assignment.set(1, "CAT");
  expect(orderDomainValues(context, 0)).toEqual(["CAR", "TAR", "ART"]);
});

test("findFill on a grid with two crossings", () => {
  const puzzle = buildPuzzleFromStructureString(crossingGrid);
  const result = findFill(puzzle, threeLetterWords);

  expect(result.type).toBe("Success");
  if (result.type !== "Success") {
    return;
  }
  expectValidSolution(puzzle, result.assignment);
  expect(result.assignment).toEqual(new Map([[2, "ART"], [1, "TAR"], [0, "CAR"]]));
  expect(result.statistics.states).toBe(3);
  expect(result.statistics.backtracks).toBe(0);
});

test("findFill backtracks out of a dead end", () => {
  const puzzle = buildPuzzleFromStructureString(ladderGrid);
  const vocabulary = [
    "AOEAE", "ORETE", "ESTAA", "RTSST", "EEORO", "OOERE",
    "RSE", "RAO", "TER", "ERO", "RRR", "TSA", "SAT", "ARE",
  ];
  const result = findFill(puzzle, vocabulary);

  expect(result.type).toBe("Success");
  if (result.type !== "Success") {
    return;
  }
  expectValidSolution(puzzle, result.assignment);
  expect(Object.fromEntries(result.assignment)).toEqual({
    0: "RTSST",
    1: "ESTAA",
    2: "RSE",
    3: "SAT",
    4: "TSA",
  });
  expect(result.statistics.backtracks).toBeGreaterThan(0);
});

test("findFill gives up before searching when a slot has no word of its length", () => {
  const puzzle = buildPuzzleFromStructureString(crossingGrid);
  const result = findFill(puzzle, ["CART", "ARTS", "AT"]);

  expect(result.type).toBe("NoSolution");
  expect(result.statistics.states).toBe(0);
});

test("findFill gives up before searching when crossings can't agree", () => {
  const puzzle = buildPuzzleFromStructureString(crossingGrid);
  const result = findFill(puzzle, ["CAT", "COT", "CUT"]);

  expect(result.type).toBe("NoSolution");
  expect(result.statistics.states).toBe(0);
});

test("findFill never places the same word twice", () => {
  // Four slots, but only three words.
  const puzzle = buildPuzzleFromStructureString("___\n_#_\n___\n");
  const result = findFill(puzzle, ["TAR", "TOT", "ROT"]);

  expect(result.type).toBe("NoSolution");
  expect(bruteForceHasSolution(puzzle, ["TAR", "TOT", "ROT"])).toBe(false);
});

test("findFill fills slots with no neighbors", () => {
  const puzzle = buildPuzzleFromStructureString("___#_\n#_##_\n#___#\n");
  expect(puzzle.neighbors(3)).toEqual([]);

  const result = findFill(puzzle, [...threeLetterWords, "GO"]);

  expect(result.type).toBe("Success");
  if (result.type !== "Success") {
    return;
  }
  expectValidSolution(puzzle, result.assignment);
  expect(result.assignment.get(3)).toBe("GO");
});

test("findFill on a puzzle with no slots", () => {
  const result = findFill(buildPuzzleFromStructureString("#_#\n"), threeLetterWords);

  expect(result.type).toBe("Success");
  if (result.type === "Success") {
    expect(result.assignment.size).toBe(0);
  }
});

test("findFill agrees with exhaustive search", () => {
  const random = createRandom(7);
  const puzzles = [crossingGrid, ladderGrid, "__#\n#_#\n#__\n"].map(buildPuzzleFromStructureString);

  for (const puzzle of puzzles) {
    for (let trial = 0; trial < 25; trial++) {
      const vocabulary = [
        ...new Set([
          ...randomWords(random, 5, 2, "AEST"),
          ...randomWords(random, 6, 3, "AEST"),
          ...randomWords(random, 5, 5, "AEST"),
        ]),
      ];
      const result = findFill(puzzle, vocabulary);

      expect(result.type === "Success").toBe(bruteForceHasSolution(puzzle, vocabulary));
      if (result.type === "Success") {
        expectValidSolution(puzzle, result.assignment);
      }
    }
  }
});
