/**
 * Undo journal for all-or-nothing operations.
 *
 * Every mutation of wallet state records the closure that reverses it.
 * A failed operation rolls back to its savepoint; a committed top-level
 * operation clears the journal.
 */

export type Undo = () => void;

export class Journal {
  private readonly entries: Undo[] = [];

  record(undo: Undo): void {
    this.entries.push(undo);
  }

  /** Savepoint for a (possibly nested) operation. */
  mark(): number {
    return this.entries.length;
  }

  /** Reverse every mutation recorded after `mark`, newest first. */
  rollbackTo(mark: number): void {
    while (this.entries.length > mark) {
      const undo = this.entries.pop();
      undo?.();
    }
  }

  commit(): void {
    this.entries.length = 0;
  }

  get size(): number {
    return this.entries.length;
  }
}
