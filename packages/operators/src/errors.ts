/**
 * Sequence Error Types
 *
 * One class per failure mode of the operators. Callers can branch on
 * `instanceof` or on the `kind` discriminant.
 */

export type SequenceErrorKind = "invalid-argument" | "invalid-configuration" | "invalid-cast";

/**
 * Base class for all operator failures.
 */
export class SequenceError extends Error {
  constructor(
    message: string,
    public readonly kind: SequenceErrorKind
  ) {
    super(message);
    this.name = "SequenceError";
  }
}

/**
 * Thrown at call time when a required argument is missing or malformed.
 */
export class InvalidArgumentError extends SequenceError {
  constructor(
    public readonly paramName: string,
    message: string
  ) {
    super(message, "invalid-argument");
    this.name = "InvalidArgumentError";
  }
}

/**
 * Thrown when a sort needs a natural order the keys do not have.
 */
export class InvalidConfigurationError extends SequenceError {
  constructor(message: string) {
    super(message, "invalid-configuration");
    this.name = "InvalidConfigurationError";
  }
}

/**
 * Thrown while consuming a `castTo` result, for the first element that
 * fails the target check.
 */
export class InvalidCastError extends SequenceError {
  constructor(
    public readonly targetName: string,
    public readonly actualType: string,
    public readonly index: number
  ) {
    super(
      `Element at index ${index} of type ${actualType} cannot be cast to ${targetName}`,
      "invalid-cast"
    );
    this.name = "InvalidCastError";
  }
}

/** Short runtime type description used in error messages */
export function describeValueType(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "Array";
  if (typeof value === "object") {
    // null-prototype objects have no constructor
    const ctor: unknown = value.constructor;
    return typeof ctor === "function" && ctor.name !== "" ? ctor.name : "Object";
  }
  return typeof value;
}
