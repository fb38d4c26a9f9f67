// ---------------------------------------------------------------------------
// Test helpers shared by the operator suites
// ---------------------------------------------------------------------------

/**
 * Wrap an iterable and count reads, traversals, and how often a consumer
 * closed an iterator early
 */
export function counted<T>(source: Iterable<T>): {
  iterable: Iterable<T>;
  reads: () => number;
  traversals: () => number;
  closed: () => number;
} {
  let reads = 0;
  let traversals = 0;
  let closed = 0;
  const iterable: Iterable<T> = {
    [Symbol.iterator]() {
      traversals++;
      const iter = source[Symbol.iterator]();
      return {
        next() {
          const result = iter.next();
          if (!result.done) reads++;
          return result;
        },
        return(value?: unknown) {
          closed++;
          return { done: true, value };
        },
      };
    },
  };
  return { iterable, reads: () => reads, traversals: () => traversals, closed: () => closed };
}

/** Run `fn` and return what it threw */
export function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("expected function to throw");
}
