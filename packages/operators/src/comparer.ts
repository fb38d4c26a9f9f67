/**
 * Comparers and natural-order resolution.
 *
 * Natural order covers numbers, bigints, strings, booleans, Dates and
 * `Comparable` objects. `null` and `undefined` sort before everything else.
 */

import { InvalidConfigurationError, describeValueType } from "./errors.js";
import type { Comparable, Comparer, ComparerLike, Ordering } from "./types.js";

export const LT: Ordering = -1;
export const EQ: Ordering = 0;
export const GT: Ordering = 1;

type NaturalKind = "nullish" | "number" | "bigint" | "string" | "boolean" | "date" | "comparable";

function isComparable(value: unknown): value is Comparable<unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    "compareTo" in value &&
    typeof value.compareTo === "function"
  );
}

function naturalKind(value: unknown): NaturalKind | undefined {
  if (value === null || value === undefined) return "nullish";
  switch (typeof value) {
    case "number":
      return "number";
    case "bigint":
      return "bigint";
    case "string":
      return "string";
    case "boolean":
      return "boolean";
  }
  if (value instanceof Date) return "date";
  if (isComparable(value)) return "comparable";
  return undefined;
}

function noNaturalOrder(detail: string): InvalidConfigurationError {
  return new InvalidConfigurationError(
    `${detail}; pass a comparer explicitly to sortBy/sortByDescending`
  );
}

function sign(n: number): Ordering {
  return n < 0 ? LT : n > 0 ? GT : EQ;
}

// NaN sorts before every other number
function compareNumbers(x: number, y: number): Ordering {
  if (x < y) return LT;
  if (x > y) return GT;
  if (x === y) return EQ;
  const xNaN = Number.isNaN(x);
  return xNaN === Number.isNaN(y) ? EQ : xNaN ? LT : GT;
}

/**
 * Three-way comparison by natural order.
 *
 * Strings compare by UTF-16 code unit, not by locale: `"B"` sorts before
 * `"a"`. Pass a comparer such as `(a, b) => a.localeCompare(b)` to sortBy or
 * sortByDescending for culture-aware order.
 *
 * @throws InvalidConfigurationError when the values have no natural order
 * or are of different kinds
 */
export function naturalCompare(x: unknown, y: unknown): Ordering {
  const xNullish = x === null || x === undefined;
  const yNullish = y === null || y === undefined;
  if (xNullish || yNullish) {
    return xNullish === yNullish ? EQ : xNullish ? LT : GT;
  }

  if (typeof x === "number" && typeof y === "number") return compareNumbers(x, y);
  if (typeof x === "bigint" && typeof y === "bigint") return x < y ? LT : x > y ? GT : EQ;
  if (typeof x === "string" && typeof y === "string") return x < y ? LT : x > y ? GT : EQ;
  if (typeof x === "boolean" && typeof y === "boolean") return x === y ? EQ : x ? GT : LT;
  if (x instanceof Date && y instanceof Date) return compareNumbers(x.getTime(), y.getTime());
  if (isComparable(x) && isComparable(y)) return sign(x.compareTo(y));

  const xType = describeValueType(x);
  const yType = describeValueType(y);
  throw noNaturalOrder(
    xType === yType
      ? `Keys of type ${xType} have no natural ordering`
      : `Keys of types ${xType} and ${yType} cannot be compared by natural order`
  );
}

/** The default comparer used when none is supplied */
export const naturalComparer: Comparer<unknown> = { compare: naturalCompare };

/**
 * Check that a set of keys can be ordered naturally and return the
 * natural comparer for them.
 *
 * @throws InvalidConfigurationError naming the first key that cannot be
 * ordered, or the first pair of incompatible kinds
 */
export function resolveNaturalComparer<K>(keys: readonly K[]): Comparer<K> {
  let seen: { kind: NaturalKind; type: string } | undefined;

  for (const key of keys) {
    const kind = naturalKind(key);
    if (kind === undefined) {
      throw noNaturalOrder(`Keys of type ${describeValueType(key)} have no natural ordering`);
    }
    if (kind === "nullish") continue;
    if (seen === undefined) {
      seen = { kind, type: describeValueType(key) };
    } else if (seen.kind !== kind) {
      throw noNaturalOrder(
        `Keys of types ${seen.type} and ${describeValueType(key)} cannot be compared by natural order`
      );
    }
  }

  return naturalComparer;
}

// ============================================================================
// Combinators
// ============================================================================

/** Normalize a compare function into a `Comparer` */
export function toComparer<K>(comparer: ComparerLike<K>): Comparer<K> {
  return typeof comparer === "function" ? { compare: comparer } : comparer;
}

/** Compare values by a derived key */
export function comparerBy<A, B>(comparer: ComparerLike<B>, selector: (value: A) => B): Comparer<A> {
  const base = toComparer(comparer);
  return { compare: (x, y) => base.compare(selector(x), selector(y)) };
}

/** Invert an order */
export function reverseComparer<K>(comparer: ComparerLike<K>): Comparer<K> {
  const base = toComparer(comparer);
  return { compare: (x, y) => base.compare(y, x) };
}
