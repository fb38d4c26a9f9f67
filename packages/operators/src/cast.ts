/**
 * Type-narrowing casts over untyped sequences.
 *
 * A cast target is a runtime check for a static type. `castTo` applies it
 * to each element as the element is consumed, so a bad element fails only
 * when reached and the elements before it stay valid.
 */

import { InvalidArgumentError, InvalidCastError, describeValueType } from "./errors.js";
import { requirePresent, requireSource } from "./guards.js";
import { Sequence, isSequenceOf } from "./sequence.js";
import type { CastTarget, Constructor } from "./types.js";

/** Build a cast target from a type guard */
export function castTarget<T>(name: string, is: (value: unknown) => value is T): CastTarget<T> {
  return { name, is };
}

/** Cast target matching instances of a class (via `instanceof`) */
export function instanceOf<T>(ctor: Constructor<T>): CastTarget<T> {
  requirePresent(ctor, "ctor");
  return castTarget(ctor.name, (value): value is T => value instanceof ctor);
}

/** Built-in cast targets */
export const castTargets = {
  number: castTarget("number", (value): value is number => typeof value === "number"),
  string: castTarget("string", (value): value is string => typeof value === "string"),
  boolean: castTarget("boolean", (value): value is boolean => typeof value === "boolean"),
  bigint: castTarget("bigint", (value): value is bigint => typeof value === "bigint"),
  symbol: castTarget("symbol", (value): value is symbol => typeof value === "symbol"),
  function: castTarget(
    "function",
    (value): value is (...args: never[]) => unknown => typeof value === "function"
  ),
  object: castTarget(
    "object",
    (value): value is object => typeof value === "object" && value !== null
  ),
  date: instanceOf(Date),
};

/**
 * Narrow the elements of an untyped sequence to `TResult`.
 *
 * When `source` is a `Sequence` already known to hold `target` elements it
 * is returned as is. Otherwise each element is checked when consumed and
 * the first failure throws `InvalidCastError`.
 *
 * @example
 * ```typescript
 * const parsed: unknown[] = JSON.parse(text);
 * for (const n of castTo(parsed, castTargets.number)) total += n;
 * ```
 */
export function castTo<TResult>(source: Iterable<unknown>, target: CastTarget<TResult>): Sequence<TResult> {
  requireSource(source);
  requirePresent(target, "target");
  if (typeof target.is !== "function") {
    throw new InvalidArgumentError("target", "target.is must be a function");
  }

  if (isSequenceOf(source, target)) return source;
  return new Sequence(() => castIterator(source, target), target);
}

function* castIterator<T>(source: Iterable<unknown>, target: CastTarget<T>): Generator<T> {
  let index = 0;
  for (const item of source) {
    if (!target.is(item)) {
      throw new InvalidCastError(target.name, describeValueType(item), index);
    }
    yield item;
    index++;
  }
}
