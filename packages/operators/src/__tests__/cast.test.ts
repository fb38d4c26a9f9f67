import { describe, it, expect } from "vitest";
import { castTo, castTarget, castTargets, instanceOf } from "../cast.js";
import { filter } from "../filter.js";
import { generator } from "../generator.js";
import { sortBy, sortByDescending } from "../sort.js";
import { isSequenceOf } from "../sequence.js";
import { InvalidArgumentError, InvalidCastError } from "../errors.js";
import type { CastTarget } from "../types.js";
import { counted, thrown } from "./helpers.js";

class Shape {
  constructor(readonly sides: number) {}
}

class Square extends Shape {
  constructor() {
    super(4);
  }
}

// ===========================================================================
// Checked casts
// ===========================================================================

describe("castTo — checked casts", () => {
  it("yields elements that satisfy the target unchanged", () => {
    const source: unknown[] = [1, 2, 3];
    expect(castTo(source, castTargets.number).toArray()).toEqual([1, 2, 3]);
  });

  it("does not inspect elements at call time", () => {
    let checks = 0;
    const target = castTarget("string", (value): value is string => {
      checks++;
      return typeof value === "string";
    });
    const result = castTo(["a", 1], target);

    expect(checks).toBe(0);
    expect(() => result.toArray()).toThrow(InvalidCastError);
  });

  it("fails at the offending element and keeps earlier ones", () => {
    const iterator = castTo([1, "two", 3], castTargets.number)[Symbol.iterator]();

    expect(iterator.next()).toEqual({ value: 1, done: false });
    const error = thrown(() => iterator.next());
    expect(error).toBeInstanceOf(InvalidCastError);
    expect(error).toMatchObject({
      kind: "invalid-cast",
      targetName: "number",
      actualType: "string",
      index: 1,
      message: "Element at index 1 of type string cannot be cast to number",
    });
  });

  it("describes null elements", () => {
    const error = thrown(() => castTo([{}, null], castTargets.object).toArray());
    expect(error).toMatchObject({ actualType: "null", index: 1, targetName: "object" });
  });

  it("casts class instances with instanceOf", () => {
    const square = new Square();
    const shapes = castTo([new Shape(3), square], instanceOf(Shape)).toArray();

    expect(shapes.map((s) => s.sides)).toEqual([3, 4]);
    expect(thrown(() => castTo([square, new Shape(5)], instanceOf(Square)).toArray())).toMatchObject({
      targetName: "Square",
      actualType: "Shape",
      index: 1,
    });
  });

  it("casts with the built-in targets", () => {
    expect(castTo(["x", "y"], castTargets.string).toArray()).toEqual(["x", "y"]);
    expect(castTo([true], castTargets.boolean).toArray()).toEqual([true]);
    expect(castTo([1n], castTargets.bigint).toArray()).toEqual([1n]);

    const when = new Date(0);
    expect(castTo([when], castTargets.date).toArray()).toEqual([when]);
    expect(thrown(() => castTo([0], castTargets.date).toArray())).toMatchObject({
      targetName: "Date",
      actualType: "number",
    });
  });

  it("closes the source when the consumer stops early", () => {
    const { iterable, reads, closed } = counted<unknown>([1, 2, 3]);
    for (const value of castTo(iterable, castTargets.number)) {
      expect(value).toBe(1);
      break;
    }
    expect(reads()).toBe(1);
    expect(closed()).toBe(1);
  });

  it("re-checks the source on every traversal", () => {
    const { iterable, traversals } = counted<unknown>([1, 2]);
    const numbers = castTo(iterable, castTargets.number);

    numbers.toArray();
    numbers.toArray();
    expect(traversals()).toBe(2);
  });
});

// ===========================================================================
// Zero-cost reinterpretation
// ===========================================================================

describe("castTo — known element types", () => {
  it("returns a sequence already cast to the same target", () => {
    const numbers = castTo([1, 2], castTargets.number);
    expect(castTo(numbers, castTargets.number)).toBe(numbers);
  });

  it("returns generator output unchanged for the number target", () => {
    const range = generator(3, 0);
    const cast = castTo(range, castTargets.number);

    expect(cast).toBe(range);
    expect(cast.toArray()).toEqual([0, 1, 2]);
  });

  it("keeps the element type through filter and the sorts", () => {
    const numbers = castTo([3, 1, 2], castTargets.number);
    const odd = filter(numbers, (n) => n % 2 === 1);
    const sorted = sortBy(numbers, (n) => n);
    const descending = sortByDescending(numbers, (n) => n);

    expect(castTo(odd, castTargets.number)).toBe(odd);
    expect(castTo(sorted, castTargets.number)).toBe(sorted);
    expect(castTo(descending, castTargets.number)).toBe(descending);
    expect(descending.toArray()).toEqual([3, 2, 1]);
  });

  it("checks again for a different target", () => {
    const numbers = castTo([1], castTargets.number);
    const strings = castTo(numbers, castTargets.string);

    // identity check only; a deep comparison would iterate the failing cast
    expect(strings === numbers).toBe(false);
    expect(isSequenceOf(strings, castTargets.string)).toBe(true);
    expect(() => strings.toArray()).toThrow("Element at index 0 of type number cannot be cast to string");
  });
});

// ===========================================================================
// Argument validation
// ===========================================================================

describe("castTo — arguments", () => {
  it("rejects an absent source", () => {
    const error = thrown(() => castTo(null as unknown as Iterable<unknown>, castTargets.number));
    expect(error).toBeInstanceOf(InvalidArgumentError);
    expect(error).toMatchObject({ paramName: "source" });
  });

  it("rejects an absent or malformed target", () => {
    expect(thrown(() => castTo([1], undefined as unknown as CastTarget<number>))).toMatchObject({
      paramName: "target",
      message: "target must not be null or undefined",
    });
    expect(
      thrown(() => castTo([1], { name: "broken" } as unknown as CastTarget<number>))
    ).toMatchObject({ paramName: "target", message: "target.is must be a function" });
  });
});
