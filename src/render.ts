import type { Puzzle, SlotId } from "./puzzle.js";

/**
 * The glyph drawn for a blocked cell in text output.
 */
export const BLOCK_GLYPH = "█";

/**
 * Dimensions, in SVG user units, of a rendered cell.
 */
export const CELL_SIZE = 100;
export const CELL_BORDER = 2;
export const FONT_SIZE = 80;

/**
 * Lay the assigned words out on the grid. The result is indexed as `[y][x]`; cells no word covers
 * are `undefined`.
 */
export function letterGrid(
  puzzle: Puzzle,
  assignment: ReadonlyMap<SlotId, string>,
): (string | undefined)[][] {
  const letters: (string | undefined)[][] = Array.from(
    { length: puzzle.height },
    () => Array<string | undefined>(puzzle.width).fill(undefined),
  );

  for (const [slotId, word] of assignment) {
    for (const [cellIndex, [x, y]] of puzzle.slot(slotId).cellCoords().entries()) {
      letters[y][x] = word[cellIndex];
    }
  }

  return letters;
}

/**
 * Turn the given puzzle and assignment into a rendered string: one line per row, blocked cells as
 * `█` and unfilled open cells as spaces.
 */
export function renderGrid(puzzle: Puzzle, assignment: ReadonlyMap<SlotId, string>): string {
  const letters = letterGrid(puzzle, assignment);
  const { open } = puzzle.structure;

  return letters
    .map((row, y) =>
      row.map((letter, x) => (open[y][x] ? letter ?? " " : BLOCK_GLYPH)).join("")
    )
    .join("\n");
}

function escapeXml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

/**
 * Render the puzzle and assignment as a standalone SVG document: black background, a white square
 * per open cell, and the assigned letter centered in it.
 */
export function renderSvg(puzzle: Puzzle, assignment: ReadonlyMap<SlotId, string>): string {
  const letters = letterGrid(puzzle, assignment);
  const { open } = puzzle.structure;
  const width = puzzle.width * CELL_SIZE;
  const height = puzzle.height * CELL_SIZE;
  const interior = CELL_SIZE - 2 * CELL_BORDER;

  const cells: string[] = [];
  for (let y = 0; y < puzzle.height; y++) {
    for (let x = 0; x < puzzle.width; x++) {
      if (!open[y][x]) {
        continue;
      }
      const left = x * CELL_SIZE + CELL_BORDER;
      const top = y * CELL_SIZE + CELL_BORDER;
      cells.push(
        `<rect x="${left}" y="${top}" width="${interior}" height="${interior}" fill="white"/>`,
      );

      const letter = letters[y][x];
      if (letter !== undefined) {
        cells.push(
          `<text x="${left + interior / 2}" y="${top + interior / 2}" font-family="Open Sans, sans-serif" ` +
            `font-size="${FONT_SIZE}" text-anchor="middle" dominant-baseline="central" fill="black">` +
            `${escapeXml(letter)}</text>`,
        );
      }
    }
  }

  return [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">`,
    `<rect width="${width}" height="${height}" fill="black"/>`,
    ...cells,
    "</svg>",
    "",
  ].join("\n");
}
