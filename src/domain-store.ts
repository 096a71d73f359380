import type { Puzzle, SlotId } from "./puzzle.js";

/**
 * An error raised when the domain store is used outside of its contract.
 */
export class DomainStoreError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DomainStoreError";
  }
}

/**
 * A single recorded change to one slot's domain, kept so that it can be undone.
 */
interface DomainChange {
  slotId: SlotId;
  word: string;
  type: "removed" | "added";
  serial: number;
}

/**
 * An opaque handle to a past state of a `DomainStore`.
 */
export interface DomainSnapshot {
  readonly position: number;
  readonly lastSerial: number;
}

/**
 * The set of words still possible for each slot.
 *
 * Changes are recorded in an undo log, so taking a snapshot is just remembering the log position,
 * and restoring one unwinds the log back to that position.
 */
export class DomainStore {
  public readonly vocabulary: ReadonlySet<string>;
  private domains: Set<string>[];
  private undoLog: DomainChange[] = [];
  private nextSerial = 0;

  constructor(slotCount: number, vocabulary: Iterable<string>) {
    this.vocabulary = new Set(vocabulary);
    this.domains = Array.from({ length: slotCount }, () => new Set(this.vocabulary));
  }

  /**
   * Create a store with every slot of the puzzle starting from the full vocabulary.
   */
  public static forPuzzle(puzzle: Puzzle, vocabulary: Iterable<string>): DomainStore {
    return new DomainStore(puzzle.slots.length, vocabulary);
  }

  public get slotCount(): number {
    return this.domains.length;
  }

  /**
   * The live domain of the given slot. It reflects later changes, so copy it before mutating the
   * store if it needs to be iterated meanwhile.
   */
  public getDomain(slotId: SlotId): ReadonlySet<string> {
    return this.domainFor(slotId);
  }

  public size(slotId: SlotId): number {
    return this.domainFor(slotId).size;
  }

  public has(slotId: SlotId, word: string): boolean {
    return this.domainFor(slotId).has(word);
  }

  public setDomain(slotId: SlotId, words: Iterable<string>) {
    const domain = this.domainFor(slotId);
    const next = new Set(words);
    for (const word of next) {
      if (!this.vocabulary.has(word)) {
        throw new DomainStoreError(`"${word}" is not in the vocabulary`);
      }
    }

    for (const word of [...domain]) {
      if (!next.has(word)) {
        domain.delete(word);
        this.record(slotId, word, "removed");
      }
    }
    for (const word of next) {
      if (!domain.has(word)) {
        domain.add(word);
        this.record(slotId, word, "added");
      }
    }
  }

  /**
   * Remove a word from a slot's domain. Returns whether the word was present.
   */
  public removeWord(slotId: SlotId, word: string): boolean {
    const domain = this.domainFor(slotId);
    if (!domain.delete(word)) {
      return false;
    }
    this.record(slotId, word, "removed");
    return true;
  }

  /**
   * Mark the current state of every domain. Snapshots are restored last-taken first: restoring one
   * invalidates every snapshot taken after it, even if nothing changed in between.
   */
  public snapshot(): DomainSnapshot {
    return { position: this.undoLog.length, lastSerial: this.lastSerialAt(this.undoLog.length) };
  }

  /**
   * Return every domain to the state it had when `snapshot` was taken. A snapshot stays usable
   * until an older one is restored.
   */
  public restore(snapshot: DomainSnapshot) {
    if (
      snapshot.position > this.undoLog.length ||
      this.lastSerialAt(snapshot.position) !== snapshot.lastSerial
    ) {
      throw new DomainStoreError(`Snapshot at ${snapshot.position} is no longer valid`);
    }

    while (this.undoLog.length > snapshot.position) {
      const change = this.undoLog.pop();
      if (!change) {
        break;
      }
      const domain = this.domainFor(change.slotId);
      if (change.type === "removed") {
        domain.add(change.word);
      } else {
        domain.delete(change.word);
      }
    }
  }

  private record(slotId: SlotId, word: string, type: DomainChange["type"]) {
    this.undoLog.push({ slotId, word, type, serial: this.nextSerial++ });
  }

  private lastSerialAt(position: number): number {
    return position === 0 ? -1 : this.undoLog[position - 1].serial;
  }

  private domainFor(slotId: SlotId): Set<string> {
    const domain = this.domains[slotId];
    if (!domain) {
      throw new DomainStoreError(`Unknown slot: ${slotId}`);
    }
    return domain;
  }
}
