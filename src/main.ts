#!/usr/bin/env node
import { realpathSync } from "node:fs";
import { readFile, writeFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import minimist from "minimist";
import { buildPuzzle, parseStructure, PuzzleError } from "./puzzle.js";
import { DEFAULT_MIN_SCORE, WordList } from "./word-list.js";
import { findFill } from "./backtracking-search.js";
import { renderGrid, renderSvg } from "./render.js";

const USAGE = "Usage: crossword-fill <STRUCTURE_PATH> <WORDS_PATH> [OUTPUT_PATH] [--min-score <N>] [--stats]";

/**
 * How many word list problems we print before summarizing the rest.
 */
const MAX_REPORTED_WORD_LIST_ERRORS = 5;

export const EXIT_SUCCESS = 0;
export const EXIT_NO_SOLUTION = 1;
export const EXIT_USAGE = 2;

export async function main(args: string[]): Promise<number> {
  const flags = minimist(args, {
    string: ["min-score"],
    boolean: ["help", "stats"],
    alias: { h: "help" },
  });

  if (flags.help === true) {
    console.log(USAGE);
    return EXIT_SUCCESS;
  }

  const [structurePath, wordsPath, outputPath] = flags._.map(String);
  if (structurePath === undefined || wordsPath === undefined) {
    console.error(USAGE);
    return EXIT_USAGE;
  }

  const rawMinScore: unknown = flags["min-score"];
  const minScore = rawMinScore === undefined || rawMinScore === ""
    ? DEFAULT_MIN_SCORE
    : Number(String(rawMinScore).trim());
  if (!Number.isInteger(minScore)) {
    console.error(`Error: Invalid --min-score: ${String(rawMinScore)}`);
    return EXIT_USAGE;
  }

  try {
    const puzzle = buildPuzzle(parseStructure(await readFile(structurePath, "utf8")));

    const wordList = new WordList();
    const errors = await wordList.replaceList([
      { type: "file", id: "words", enabled: true, path: wordsPath },
    ]);
    const unreadable = errors.find((error) => isFileSystemError(error.cause));
    if (unreadable) {
      console.error(`Error: ${unreadable.message}`);
      return EXIT_USAGE;
    }
    for (const error of errors.slice(0, MAX_REPORTED_WORD_LIST_ERRORS)) {
      console.error(`Warning: ${error.message}`);
    }
    if (errors.length > MAX_REPORTED_WORD_LIST_ERRORS) {
      console.error(`Warning: ${errors.length - MAX_REPORTED_WORD_LIST_ERRORS} more word list problems`);
    }

    const result = findFill(puzzle, wordList.vocabulary(minScore));

    if (flags.stats === true) {
      const { states, backtracks, totalTime } = result.statistics;
      console.error(`States: ${states}, backtracks: ${backtracks}, time: ${totalTime}ms`);
    }

    if (result.type === "NoSolution") {
      console.log("No solution.");
      return EXIT_NO_SOLUTION;
    }

    console.log(renderGrid(puzzle, result.assignment));
    if (outputPath !== undefined) {
      const output = outputPath.toLowerCase().endsWith(".svg")
        ? renderSvg(puzzle, result.assignment)
        : `${renderGrid(puzzle, result.assignment)}\n`;
      await writeFile(outputPath, output, "utf8");
    }
    return EXIT_SUCCESS;
  } catch (e) {
    if (e instanceof PuzzleError || isFileSystemError(e)) {
      console.error(`Error: ${e.message}`);
      return EXIT_USAGE;
    }
    throw e;
  }
}

function isFileSystemError(e: unknown): e is NodeJS.ErrnoException {
  return e instanceof Error && "code" in e && "syscall" in e;
}

function isEntryPoint(): boolean {
  const scriptPath = process.argv[1];
  if (scriptPath === undefined) {
    return false;
  }
  try {
    return realpathSync(scriptPath) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  process.exitCode = await main(process.argv.slice(2));
}
