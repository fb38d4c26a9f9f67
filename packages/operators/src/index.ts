/**
 * @seqkit/operators — Lazy, composable sequence operators
 *
 * Filtering, mapping, stable key-based sorting, checked casts, a universal
 * quantifier and a bounded integer generator over any `Iterable`.
 * Sequence-producing operators return a restartable `Sequence` that can be
 * chained fluently or passed back into the free functions.
 *
 * @example
 * ```typescript
 * import { from, generator, sortByDescending } from "@seqkit/operators";
 *
 * const evens = generator(10, 1).filter((n) => n % 2 === 0); // 2, 4, 6, 8, 10
 * sortByDescending(evens, (n) => n).toArray(); // [10, 8, 6, 4, 2]
 *
 * from(["pear", "fig", "apple"])
 *   .sortBy((s) => s.length)
 *   .transform((s) => s.toUpperCase())
 *   .toArray(); // ["FIG", "PEAR", "APPLE"]
 * ```
 */

export { Sequence, from, isSequenceOf } from "./sequence.js";
export { filter, transform, forAll } from "./filter.js";
export { sortBy, sortByDescending } from "./sort.js";
export { castTo, castTarget, castTargets, instanceOf } from "./cast.js";
export { generator } from "./generator.js";
export {
  LT,
  EQ,
  GT,
  naturalCompare,
  naturalComparer,
  resolveNaturalComparer,
  toComparer,
  comparerBy,
  reverseComparer,
} from "./comparer.js";
export {
  SequenceError,
  InvalidArgumentError,
  InvalidConfigurationError,
  InvalidCastError,
  describeValueType,
} from "./errors.js";
export type { SequenceErrorKind } from "./errors.js";

export type {
  Predicate,
  Transformer,
  KeySelector,
  Ordering,
  CompareFn,
  Comparer,
  ComparerLike,
  Comparable,
  CastTarget,
  Constructor,
} from "./types.js";
