/**
 * Single-slot versioned cell holding an immutable value.
 *
 * `replace()` swaps the reference in one assignment, so a reader that has
 * copied out `current()` keeps a consistent value for as long as it holds
 * the reference, and never sees a half-built replacement. The previous
 * value is garbage-collected once no reader references it.
 */

export interface Versioned<T> {
  readonly generation: number;
  readonly value: T;
}

export type CellListener<T> = (next: Versioned<T>, previous: Versioned<T>) => void;

export class SnapshotCell<T> {
  #slot: Versioned<T>;
  #listeners = new Set<CellListener<T>>();

  constructor(initial: T) {
    this.#slot = Object.freeze({ generation: 1, value: initial });
  }

  /** The live value. Copy it out once per unit of work. */
  current(): T {
    return this.#slot.value;
  }

  /** The live value together with its generation. */
  versioned(): Versioned<T> {
    return this.#slot;
  }

  get generation(): number {
    return this.#slot.generation;
  }

  /** Swap in a new value; returns the new generation. */
  replace(value: T): number {
    const previous = this.#slot;
    const next = Object.freeze({ generation: previous.generation + 1, value });
    this.#slot = next;

    for (const listener of this.#listeners) {
      listener(next, previous);
    }
    return next.generation;
  }

  /** Observe swaps. Returns an unsubscribe function. */
  onReplace(listener: CellListener<T>): () => void {
    this.#listeners.add(listener);
    return () => {
      this.#listeners.delete(listener);
    };
  }
}
