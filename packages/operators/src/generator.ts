/**
 * Bounded integer sequences.
 */

import { castTargets } from "./cast.js";
import { requirePositiveInteger } from "./guards.js";
import { Sequence } from "./sequence.js";

/**
 * `count` consecutive integers starting at `start`.
 *
 * `count` must be a positive integer; `start` may be any number.
 *
 * @example
 * ```typescript
 * generator(5, 10).toArray(); // [10, 11, 12, 13, 14]
 * ```
 */
export function generator(count: number, start: number): Sequence<number> {
  requirePositiveInteger(count, "count");

  return new Sequence(() => countFrom(count, start), castTargets.number);
}

function* countFrom(count: number, start: number): Generator<number> {
  for (let i = 0; i < count; i++) yield start + i;
}
