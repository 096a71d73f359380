import { readFile } from "node:fs/promises";

/**
 * The score given to entries that don't specify one.
 */
export const DEFAULT_WORD_SCORE = 50;

/**
 * The lowest score a word can have and still be offered to the solver, unless overridden.
 */
export const DEFAULT_MIN_SCORE = 0;

/**
 * How many per-line errors we collect from a single source before giving up on it.
 */
export const MAX_ERRORS_PER_SOURCE = 100;

/**
 * Given a canonical word string from a dictionary file, turn it into the normalized form we'll
 * use in the actual fill engine.
 */
export function normalizeWord(canonical: string): string {
  return canonical
    .toUpperCase()
    .normalize("NFC")
    .replace(/\s/g, "");
}

/**
 * Whether every letter of a normalized word fits in one grid cell. Characters outside the BMP take
 * two code units, which would throw off the word's length against its slot.
 */
export function hasOnlyBmpLetters(normalized: string): boolean {
  return [...normalized].length === normalized.length;
}

/**
 * An error that occurs while loading a word list.
 */
export class WordListError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "WordListError";
  }
}

/**
 * Configuration for a word list source that is loaded from an in-memory array.
 */
export interface WordListSourceConfigMemory {
  type: "memory";
  id: string;
  enabled: boolean;
  words: (string | [string, number])[];
}

/**
 * Configuration for a word list source that is loaded from a file.
 */
export interface WordListSourceConfigFile {
  type: "file";
  id: string;
  enabled: boolean;
  path: string;
}

/**
 * Configuration for a word list source that is loaded from a string.
 */
export interface WordListSourceConfigFileContents {
  type: "fileContents";
  id: string;
  enabled: boolean;
  contents: string;
}

/**
 * Configuration describing a source of wordlist entries.
 */
export type WordListSourceConfig =
  | WordListSourceConfigMemory
  | WordListSourceConfigFile
  | WordListSourceConfigFileContents;

/**
 * A single word list entry as read from a source.
 */
export interface RawWordListEntry {
  normalized: string;
  canonical: string;
  score: number;
}

/**
 * A loaded word list entry.
 */
export interface WordListEntry extends RawWordListEntry {
  /** The id of the source the entry was first loaded from. */
  sourceId: string;
}

/**
 * Parse the contents of a word list file: one entry per line, optionally followed by `;score`.
 */
export function parseWordListFileContents(
  fileContents: string,
  errors: WordListError[],
): RawWordListEntry[] {
  const entries: RawWordListEntry[] = [];
  const seen = new Set<string>();
  let errorCount = 0;

  for (const [lineIndex, line] of fileContents.split(/\r?\n/).entries()) {
    if (errorCount > MAX_ERRORS_PER_SOURCE) {
      break;
    }

    const lineParts = line.split(";");

    if (lineParts[0].includes("\uFFFD")) {
      errors.push(new WordListError(`Invalid word on line ${lineIndex + 1}: ${lineParts[0]}`));
      errorCount++;
      continue;
    }

    const canonical = lineParts[0].trim();
    const normalized = normalizeWord(canonical);
    if (normalized.length === 0 || seen.has(normalized)) {
      continue;
    }
    if (!hasOnlyBmpLetters(normalized)) {
      errors.push(new WordListError(`Invalid word on line ${lineIndex + 1}: ${canonical}`));
      errorCount++;
      continue;
    }

    let score = DEFAULT_WORD_SCORE;
    if (lineParts.length >= 2) {
      const parsedScore = Number.parseInt(lineParts[1].trim(), 10);
      if (Number.isNaN(parsedScore)) {
        errors.push(new WordListError(`Invalid score on line ${lineIndex + 1}: ${lineParts[1]}`));
        errorCount++;
        continue;
      }
      score = parsedScore;
    }

    seen.add(normalized);
    entries.push({ normalized, canonical, score });
  }

  return entries;
}

/**
 * The currently-loaded word list(s).
 */
export class WordList {
  /**
   * Every loaded entry, keyed by its normalized string. When the same word appears in more than
   * one source, the first enabled source wins.
   */
  public entries: Map<string, WordListEntry> = new Map();

  /**
   * The most recently-received word list sources, as an ordered list.
   */
  public sourceConfigs: WordListSourceConfig[] = [];

  /**
   * Problems found while loading the current sources.
   */
  public errors: WordListError[] = [];

  constructor(sourceConfigs: WordListSourceConfig[] = []) {
    this.sourceConfigs = sourceConfigs;
  }

  public get size(): number {
    return this.entries.size;
  }

  /**
   * Replace the loaded words with the contents of the given sources. Returns the errors collected
   * along the way; a source that can't be read contributes an error and no words.
   */
  public async replaceList(sourceConfigs: WordListSourceConfig[]): Promise<WordListError[]> {
    this.sourceConfigs = sourceConfigs;
    this.entries = new Map();
    this.errors = [];

    for (const source of this.sourceConfigs) {
      if (!source.enabled) {
        continue;
      }

      const entries = await this.loadWordsFromSource(source);
      for (const entry of entries) {
        if (!this.entries.has(entry.normalized)) {
          this.entries.set(entry.normalized, { ...entry, sourceId: source.id });
        }
      }
    }

    return this.errors;
  }

  /**
   * The set of normalized words scoring at least `minScore`.
   */
  public vocabulary(minScore = DEFAULT_MIN_SCORE): Set<string> {
    const words = new Set<string>();
    for (const entry of this.entries.values()) {
      if (entry.score >= minScore) {
        words.add(entry.normalized);
      }
    }
    return words;
  }

  private async loadWordsFromSource(
    source: WordListSourceConfig,
  ): Promise<RawWordListEntry[]> {
    switch (source.type) {
      case "memory": {
        const seen = new Set<string>();
        const entries: RawWordListEntry[] = [];
        for (const item of source.words) {
          const [canonical, score]: [string, number] =
            typeof item === "string" ? [item, DEFAULT_WORD_SCORE] : item;
          const normalized = normalizeWord(canonical);
          if (normalized.length === 0 || seen.has(normalized)) {
            continue;
          }
          if (!hasOnlyBmpLetters(normalized)) {
            this.errors.push(new WordListError(`Invalid word in source "${source.id}": ${canonical}`));
            continue;
          }
          seen.add(normalized);
          entries.push({ normalized, canonical, score });
        }
        return entries;
      }
      case "file": {
        let contents: string;
        try {
          contents = await readFile(source.path, "utf8");
        } catch (e) {
          this.errors.push(new WordListError(`Can't read file: "${source.path}"`, { cause: e }));
          return [];
        }
        return parseWordListFileContents(contents, this.errors);
      }
      case "fileContents": {
        return parseWordListFileContents(source.contents, this.errors);
      }
    }
  }
}
