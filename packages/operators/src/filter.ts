/**
 * Element-wise operators: filter, transform, forAll.
 */

import { requireFunction, requireSource } from "./guards.js";
import { Sequence } from "./sequence.js";
import type { Predicate, Transformer } from "./types.js";

/**
 * Lazily keep the elements of `source` that satisfy `predicate`, in order.
 *
 * Arguments are checked immediately; `predicate` first runs when the result
 * is iterated.
 */
export function filter<T>(source: Iterable<T>, predicate: Predicate<T>): Sequence<T> {
  requireSource(source);
  requireFunction(predicate, "predicate");

  const elementType = source instanceof Sequence ? source.elementType : undefined;
  return new Sequence<T>(() => filterIterator(source, predicate), elementType);
}

/**
 * Lazily map each element of `source` through `transformer`.
 *
 * Same order and length as `source`.
 */
export function transform<TSource, TResult>(
  source: Iterable<TSource>,
  transformer: Transformer<TSource, TResult>
): Sequence<TResult> {
  requireSource(source);
  requireFunction(transformer, "transformer");

  return new Sequence(() => transformIterator(source, transformer));
}

/**
 * True if every element satisfies `predicate`, or `source` is empty.
 *
 * Always consumes the whole source: the predicate sees every element even
 * after one fails.
 */
export function forAll<T>(source: Iterable<T>, predicate: Predicate<T>): boolean {
  requireSource(source);
  requireFunction(predicate, "predicate");

  let result = true;
  for (const item of source) {
    if (!predicate(item)) {
      result = false;
    }
  }
  return result;
}

function* filterIterator<T>(source: Iterable<T>, predicate: Predicate<T>): Generator<T> {
  for (const item of source) {
    if (predicate(item)) yield item;
  }
}

function* transformIterator<TSource, TResult>(
  source: Iterable<TSource>,
  transformer: Transformer<TSource, TResult>
): Generator<TResult> {
  for (const item of source) yield transformer(item);
}
