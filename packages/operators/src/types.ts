/**
 * Shared types for @seqkit/operators
 *
 * Callback shapes taken by the operators, plus the comparer and cast-target
 * abstractions that stand in for runtime type information.
 */

/** A test applied to each element */
export type Predicate<T> = (item: T) => boolean;

/** Maps a source element to a result element */
export type Transformer<TSource, TResult> = (item: TSource) => TResult;

/** Extracts the sort key of an element */
export type KeySelector<T, K> = (item: T) => K;

/** Result of a three-way comparison */
export type Ordering = -1 | 0 | 1;

/** Bare three-way compare function: negative, zero or positive */
export type CompareFn<K> = (x: K, y: K) => number;

/**
 * Total order over `K`.
 *
 * `compare` must be consistent: antisymmetric, transitive and total.
 */
export interface Comparer<K> {
  readonly compare: CompareFn<K>;
}

/** Anything accepted where a comparer is expected */
export type ComparerLike<K> = Comparer<K> | CompareFn<K>;

/** Objects that define their own natural order */
export interface Comparable<T> {
  compareTo(other: T): number;
}

/**
 * Runtime witness of a static element type.
 *
 * TypeScript erases types, so narrowing an untyped sequence needs a check
 * that can run per element.
 */
export interface CastTarget<T> {
  readonly name: string;
  readonly is: (value: unknown) => value is T;
}

/** Class constructor usable with `instanceof` */
export type Constructor<T> = abstract new (...args: never[]) => T;
