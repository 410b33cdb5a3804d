/**
 * Prefix iteration over ordered sequences.
 *
 * Used for incremental checks such as validating `a`, then `a::b`, then
 * `a::b::c` of a module path.
 */

/**
 * Restartable, double-ended view over all non-empty prefixes of a sequence.
 * Each prefix is sliced on demand; nothing is precomputed.
 */
export class Prefixes<T> implements Iterable<readonly T[]> {
  constructor(private readonly items: readonly T[]) {}

  /** Number of prefixes (equal to the sequence length) */
  get length(): number {
    return this.items.length;
  }

  /** Shortest first: [a], [a, b], ..., [a, b, ..., z] */
  *[Symbol.iterator](): Iterator<readonly T[]> {
    for (let len = 1; len <= this.items.length; len++) {
      yield this.items.slice(0, len);
    }
  }

  /** Longest first: the full sequence down to its first element */
  reversed(): Iterable<readonly T[]> {
    const items = this.items;
    return {
      *[Symbol.iterator](): Iterator<readonly T[]> {
        for (let len = items.length; len >= 1; len--) {
          yield items.slice(0, len);
        }
      },
    };
  }
}

/**
 * Iterate over all prefixes of `items`, smallest first.
 *
 * @example
 * [...iterPrefixes([1, 2, 3])]            // [[1], [1, 2], [1, 2, 3]]
 * [...iterPrefixes([1, 2, 3]).reversed()] // [[1, 2, 3], [1, 2], [1]]
 */
export function iterPrefixes<T>(items: readonly T[]): Prefixes<T> {
  return new Prefixes(items);
}
