/**
 * Eager argument checks shared by every operator.
 *
 * Each helper narrows its argument or throws `InvalidArgumentError` naming
 * the offending parameter. They run before any traversal starts.
 */

import { InvalidArgumentError } from "./errors.js";
import type { ComparerLike } from "./types.js";

function isAbsent(value: unknown): value is null | undefined {
  return value === null || value === undefined;
}

/** Require an iterable source */
export function requireSource<T>(source: Iterable<T>, paramName = "source"): void {
  if (isAbsent(source)) {
    throw new InvalidArgumentError(paramName, `${paramName} must not be null or undefined`);
  }
  if (typeof source[Symbol.iterator] !== "function") {
    throw new InvalidArgumentError(paramName, `${paramName} must be iterable`);
  }
}

/** Require a callback (predicate, transformer, key selector) */
export function requireFunction<F extends (...args: never[]) => unknown>(
  fn: F,
  paramName: string
): void {
  if (isAbsent(fn)) {
    throw new InvalidArgumentError(paramName, `${paramName} must not be null or undefined`);
  }
  if (typeof fn !== "function") {
    throw new InvalidArgumentError(paramName, `${paramName} must be a function`);
  }
}

/** Require a non-absent value of any other shape */
export function requirePresent<T>(value: T, paramName: string): void {
  if (isAbsent(value)) {
    throw new InvalidArgumentError(paramName, `${paramName} must not be null or undefined`);
  }
}

/** Require a positive safe integer */
export function requirePositiveInteger(value: number, paramName: string): void {
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new InvalidArgumentError(
      paramName,
      `${paramName} must be a positive integer, got ${String(value)}`
    );
  }
}

/** Require a comparer object or compare function */
export function requireComparer<K>(
  comparer: ComparerLike<K> | null | undefined,
  paramName = "comparer"
): asserts comparer is ComparerLike<K> {
  if (isAbsent(comparer)) {
    throw new InvalidArgumentError(paramName, `${paramName} must not be null or undefined`);
  }
  if (typeof comparer !== "function" && typeof comparer.compare !== "function") {
    throw new InvalidArgumentError(
      paramName,
      `${paramName} must be a compare function or an object with a compare method`
    );
  }
}
