/**
 * Key-based sorting.
 *
 * The source is read once, fully, when the operator is called. Keys are
 * extracted once per element and the snapshot is sorted immediately; the
 * returned sequence replays the sorted snapshot on every traversal.
 * Elements with equal keys keep their source order in both directions.
 */

import { resolveNaturalComparer, toComparer } from "./comparer.js";
import { requireComparer, requireFunction, requireSource } from "./guards.js";
import { Sequence } from "./sequence.js";
import type { Comparer, ComparerLike, KeySelector } from "./types.js";

type Direction = 1 | -1;

interface KeyedEntry<T, K> {
  readonly item: T;
  readonly key: K;
  readonly index: number;
}

/**
 * Sort ascending by key.
 *
 * Without a comparer the keys' natural order is used (see
 * `naturalCompare`); keys without one raise `InvalidConfigurationError`.
 * Passing `null` or `undefined` as the comparer raises
 * `InvalidArgumentError`.
 *
 * @example
 * ```typescript
 * sortBy([3, 1, 2], (x) => x).toArray(); // [1, 2, 3]
 * sortBy(words, (w) => w, (a, b) => a.localeCompare(b));
 * ```
 */
export function sortBy<T, K>(
  source: Iterable<T>,
  keySelector: KeySelector<T, K>,
  ...comparer: [comparer?: ComparerLike<K>]
): Sequence<T> {
  return sortSequence(source, keySelector, comparer, 1);
}

/** Sort descending by key. Same rules as `sortBy`. */
export function sortByDescending<T, K>(
  source: Iterable<T>,
  keySelector: KeySelector<T, K>,
  ...comparer: [comparer?: ComparerLike<K>]
): Sequence<T> {
  return sortSequence(source, keySelector, comparer, -1);
}

function sortSequence<T, K>(
  source: Iterable<T>,
  keySelector: KeySelector<T, K>,
  comparerArg: [comparer?: ComparerLike<K>],
  direction: Direction
): Sequence<T> {
  requireSource(source);
  requireFunction(keySelector, "keySelector");

  // An explicitly passed comparer must be present; leaving it out selects
  // the natural order.
  let explicit: Comparer<K> | undefined;
  if (comparerArg.length > 0) {
    const [supplied] = comparerArg;
    requireComparer(supplied);
    explicit = toComparer(supplied);
  }

  const entries: KeyedEntry<T, K>[] = [];
  let index = 0;
  for (const item of source) {
    entries.push({ item, key: keySelector(item), index: index++ });
  }

  const comparer = explicit ?? resolveNaturalComparer(entries.map((entry) => entry.key));
  entries.sort((a, b) => {
    const order = direction * Math.sign(comparer.compare(a.key, b.key));
    return order !== 0 ? order : a.index - b.index;
  });

  const sorted = entries.map((entry) => entry.item);
  const elementType = source instanceof Sequence ? source.elementType : undefined;
  return new Sequence<T>(() => sorted[Symbol.iterator](), elementType);
}
