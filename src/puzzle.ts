/**
 * An identifier for a given slot: its index in the `Puzzle`'s `slots` field.
 */
export type SlotId = number;

/**
 * Zero-indexed x and y coords for a cell in the grid, where y = 0 in the top row.
 */
export type GridCoord = [number, number];

/**
 * The direction that a slot is facing.
 */
export enum Direction {
  Across = "across",
  Down = "down",
}

/**
 * The pair of character offsets `[offsetInX, offsetInY]` at which two crossing slots share a cell.
 */
export type Overlap = [number, number];

/**
 * A directed constraint between two neighboring slots, read as "`x` must be consistent with `y`".
 */
export type Arc = [SlotId, SlotId];

/**
 * A struct identifying a specific slot in the grid.
 */
export interface SlotSpec {
  startCell: GridCoord;
  direction: Direction;
  length: number;
}

/**
 * The open/blocked layout of a grid, indexed as `open[y][x]`.
 */
export interface Structure {
  width: number;
  height: number;
  open: boolean[][];
}

/**
 * An error raised when a structure or set of slots doesn't describe a valid grid.
 */
export class PuzzleError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PuzzleError";
  }
}

/**
 * A fillable run of cells. Slots never change once the puzzle is built.
 */
export class Slot {
  public readonly id: SlotId;
  public readonly startCell: GridCoord;
  public readonly direction: Direction;
  public readonly length: number;

  constructor(id: SlotId, startCell: GridCoord, direction: Direction, length: number) {
    this.id = id;
    this.startCell = startCell;
    this.direction = direction;
    this.length = length;
  }

  /**
   * Generate the coords for each cell of this slot.
   */
  public cellCoords(): GridCoord[] {
    const coords: GridCoord[] = [];
    for (let i = 0; i < this.length; i++) {
      if (this.direction === Direction.Across) {
        coords.push([this.startCell[0] + i, this.startCell[1]]);
      } else {
        coords.push([this.startCell[0], this.startCell[1] + i]);
      }
    }
    return coords;
  }

  public toString(): string {
    const [x, y] = this.startCell;
    return `${this.direction} @ (${x}, ${y}) [${this.length}]`;
  }
}

/**
 * The read-only description of a grid to fill: its slots and the overlaps between them.
 */
export class Puzzle {
  public readonly structure: Structure;
  public readonly slots: readonly Slot[];
  private readonly overlapsBySlot: ReadonlyMap<SlotId, Overlap>[];
  private readonly neighborIds: SlotId[][];

  constructor(structure: Structure, slots: Slot[], overlapsBySlot: Map<SlotId, Overlap>[]) {
    this.structure = structure;
    this.slots = slots;
    this.overlapsBySlot = overlapsBySlot;
    this.neighborIds = overlapsBySlot.map((overlaps) => [...overlaps.keys()].sort((a, b) => a - b));
  }

  public get width(): number {
    return this.structure.width;
  }

  public get height(): number {
    return this.structure.height;
  }

  public slot(slotId: SlotId): Slot {
    const slot = this.slots[slotId];
    if (!slot) {
      throw new PuzzleError(`Unknown slot: ${slotId}`);
    }
    return slot;
  }

  /**
   * The offsets at which `x` and `y` share a cell, or `undefined` if they don't cross.
   */
  public overlap(x: SlotId, y: SlotId): Overlap | undefined {
    return this.overlapsBySlot[x]?.get(y);
  }

  public neighbors(slotId: SlotId): readonly SlotId[] {
    return this.neighborIds[slotId] ?? [];
  }

  public degree(slotId: SlotId): number {
    return this.neighbors(slotId).length;
  }

  /**
   * Every directed arc in the puzzle, in slot order.
   */
  public arcs(): Arc[] {
    return this.slots.flatMap((slot) =>
      this.neighbors(slot.id).map((neighborId): Arc => [slot.id, neighborId])
    );
  }
}

/**
 * Parse a structure string into an open/blocked layout.
 *
 * In the structure string:
 * - `#` represents a block
 * - `_` or `.` represents an open cell
 *
 * Rows shorter than the widest row are padded with blocks.
 */
export function parseStructure(text: string): Structure {
  const lines = text.replace(/\r/g, "").replace(/\n+$/, "").split("\n");
  if (lines.length === 0 || (lines.length === 1 && lines[0].trim().length === 0)) {
    throw new PuzzleError("Structure is empty");
  }

  const width = Math.max(...lines.map((line) => [...line].length));
  const open = lines.map((line, y) => {
    const chars = [...line];
    return Array.from({ length: width }, (_, x) => {
      const char = chars[x];
      if (char === undefined || char === "#") {
        return false;
      }
      if (char === "_" || char === ".") {
        return true;
      }
      throw new PuzzleError(`Invalid character "${char}" at row ${y + 1}, column ${x + 1}`);
    });
  });

  return { width, height: lines.length, open };
}

/**
 * Generate a list of `SlotSpec`s from a structure: every maximal run of two or more open cells,
 * across slots first.
 */
export function generateSlotsFromStructure(structure: Structure): SlotSpec[] {
  const { width, height, open } = structure;
  const slotSpecs: SlotSpec[] = [];

  const flush = (run: GridCoord[], direction: Direction) => {
    if (run.length > 1) {
      slotSpecs.push({ startCell: run[0], length: run.length, direction });
    }
  };

  for (let y = 0; y < height; y++) {
    let run: GridCoord[] = [];
    for (let x = 0; x < width; x++) {
      if (open[y][x]) {
        run.push([x, y]);
      } else {
        flush(run, Direction.Across);
        run = [];
      }
    }
    flush(run, Direction.Across);
  }

  for (let x = 0; x < width; x++) {
    let run: GridCoord[] = [];
    for (let y = 0; y < height; y++) {
      if (open[y][x]) {
        run.push([x, y]);
      } else {
        flush(run, Direction.Down);
        run = [];
      }
    }
    flush(run, Direction.Down);
  }

  return slotSpecs;
}

/**
 * Given `SlotSpec`s specifying the positions of the slots in a grid, build a `Puzzle` with the
 * overlap between every pair of crossing slots.
 */
export function buildPuzzle(
  structure: Structure,
  slotSpecs: SlotSpec[] = generateSlotsFromStructure(structure),
): Puzzle {
  const slots = slotSpecs.map((spec, id) => {
    if (!Number.isInteger(spec.length) || spec.length < 1) {
      throw new PuzzleError(`Slot ${id} has invalid length ${spec.length}`);
    }
    return new Slot(id, spec.startCell, spec.direction, spec.length);
  });

  const cellByLoc = new Map<string, { slotId: SlotId; cellIndex: number }[]>();
  for (const slot of slots) {
    for (const [cellIndex, [x, y]] of slot.cellCoords().entries()) {
      if (!structure.open[y]?.[x]) {
        throw new PuzzleError(`Slot ${slot} covers a blocked or missing cell at (${x}, ${y})`);
      }
      const key = `${x},${y}`;
      let entries = cellByLoc.get(key);
      if (!entries) {
        entries = [];
        cellByLoc.set(key, entries);
      }
      entries.push({ slotId: slot.id, cellIndex });
    }
  }

  const overlapsBySlot = slots.map(() => new Map<SlotId, Overlap>());
  for (const entries of cellByLoc.values()) {
    for (const a of entries) {
      for (const b of entries) {
        if (a.slotId === b.slotId) {
          continue;
        }
        const overlaps = overlapsBySlot[a.slotId];
        if (overlaps.has(b.slotId)) {
          throw new PuzzleError(
            `Slots ${slots[a.slotId]} and ${slots[b.slotId]} share more than one cell`,
          );
        }
        overlaps.set(b.slotId, [a.cellIndex, b.cellIndex]);
      }
    }
  }

  return new Puzzle(structure, slots, overlapsBySlot);
}

/**
 * Build a `Puzzle` directly from a structure string.
 */
export function buildPuzzleFromStructureString(text: string): Puzzle {
  return buildPuzzle(parseStructure(text));
}
