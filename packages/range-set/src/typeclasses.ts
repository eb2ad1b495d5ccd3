/**
 * Collection Typeclasses
 *
 * Non-HKT, multi-parameter typeclasses for concrete collection types.
 *
 * Hierarchy:
 *   IterableOnce<I, A>
 *     └── Iterable<I, A>
 *           ├── Seq<S, A>
 *           └── SetLike<S, K>
 */

// ============================================================================
// IterableOnce — one-shot fold
// ============================================================================

/**
 * A structure that can be consumed by folding.
 */
export interface IterableOnce<I, A> {
  fold<B>(i: I, z: B, f: (acc: B, a: A) => B): B;
}

// ============================================================================
// Iterable — re-traversable, produces fresh iterators
// ============================================================================

/**
 * A structure that can be iterated repeatedly, producing a fresh JS iterator
 * each time.
 */
export interface Iterable<I, A> extends IterableOnce<I, A> {
  iterator(i: I): globalThis.IterableIterator<A>;
}

// ============================================================================
// Seq — ordered, indexed access
// ============================================================================

/**
 * An ordered, indexable sequence.
 */
export interface Seq<S, A> extends Iterable<S, A> {
  length(s: S): number;
  nth(s: S, index: number): A | undefined;
}

// ============================================================================
// SetLike — read-only set interface
// ============================================================================

/**
 * Read-only set operations.
 */
export interface SetLike<S, K> extends Iterable<S, K> {
  has(s: S, k: K): boolean;
  size(s: S): number;
}
