/**
 * Fluent, restartable sequence wrapper.
 *
 * Every sequence-producing operator returns a `Sequence`. It holds a
 * factory rather than an iterator, so each `for...of` starts a fresh
 * traversal. Methods delegate to the free functions and keep their
 * validation and laziness.
 *
 * @example
 * ```typescript
 * const names = from(users)
 *   .filter((u) => u.active)
 *   .sortBy((u) => u.lastName)
 *   .transform((u) => u.displayName)
 *   .toArray();
 * ```
 */

import { castTo } from "./cast.js";
import { filter, forAll, transform } from "./filter.js";
import { requireSource } from "./guards.js";
import { sortBy, sortByDescending } from "./sort.js";
import type { CastTarget, ComparerLike, KeySelector, Predicate, Transformer } from "./types.js";

export class Sequence<T> implements Iterable<T> {
  private readonly factory: () => Iterator<T>;

  /**
   * Cast target every element is known to satisfy, when one is known.
   * Lets `castTo` skip per-element checks.
   */
  readonly elementType: CastTarget<T> | undefined;

  constructor(factory: () => Iterator<T>, elementType?: CastTarget<T>) {
    this.factory = factory;
    this.elementType = elementType;
  }

  [Symbol.iterator](): Iterator<T> {
    return this.factory();
  }

  /** Keep only elements that satisfy the predicate */
  filter(predicate: Predicate<T>): Sequence<T> {
    return filter(this, predicate);
  }

  /** Transform each element */
  transform<U>(transformer: Transformer<T, U>): Sequence<U> {
    return transform(this, transformer);
  }

  /** Stable ascending sort by key */
  sortBy<K>(keySelector: KeySelector<T, K>, ...comparer: [comparer?: ComparerLike<K>]): Sequence<T> {
    return sortBy(this, keySelector, ...comparer);
  }

  /** Stable descending sort by key */
  sortByDescending<K>(
    keySelector: KeySelector<T, K>,
    ...comparer: [comparer?: ComparerLike<K>]
  ): Sequence<T> {
    return sortByDescending(this, keySelector, ...comparer);
  }

  /** Narrow each element to `target`, checked as elements are consumed */
  castTo<U>(target: CastTarget<U>): Sequence<U> {
    return castTo(this, target);
  }

  /** True if all elements satisfy the predicate */
  forAll(predicate: Predicate<T>): boolean {
    return forAll(this, predicate);
  }

  /** Collect all elements into an array */
  toArray(): T[] {
    const result: T[] = [];
    for (const value of this) {
      result.push(value);
    }
    return result;
  }
}

/** Wrap any iterable in a `Sequence` */
export function from<T>(source: Iterable<T>): Sequence<T> {
  requireSource(source);
  if (source instanceof Sequence) return source;
  return new Sequence(() => source[Symbol.iterator]());
}

/** True when `value` is a `Sequence` whose elements are known to satisfy `target` */
export function isSequenceOf<T>(value: Iterable<unknown>, target: CastTarget<T>): value is Sequence<T> {
  return value instanceof Sequence && value.elementType === target;
}
