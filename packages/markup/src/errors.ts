/**
 * Markup Error Types
 *
 * Raised synchronously while an object graph is being built. Nothing in
 * texforge catches or logs them.
 */

/** Reason codes for markup construction failures. */
export type MarkupErrorKind = "shape" | "type-mismatch" | "definition";

/**
 * Base class for all markup construction errors.
 */
export class MarkupError extends Error {
  constructor(
    message: string,
    public readonly kind: MarkupErrorKind
  ) {
    super(message);
    this.name = "MarkupError";
  }
}

/**
 * Thrown when a grid has the wrong shape, e.g. a non-square determinant.
 */
export class ShapeError extends MarkupError {
  constructor(
    public readonly rows: number,
    public readonly cols: number,
    message: string
  ) {
    super(message, "shape");
    this.name = "ShapeError";
  }
}

/**
 * Thrown when a value of the wrong kind lands in a typed slot and cannot
 * be coerced, e.g. `Options` passed as a command's arguments.
 */
export class TypeMismatchError extends MarkupError {
  constructor(
    public readonly slot: string,
    public readonly expected: string,
    public readonly received: string
  ) {
    super(`Expected ${expected} for ${slot}, got ${received}`, "type-mismatch");
    this.name = "TypeMismatchError";
  }
}

/**
 * Thrown when a macro definition cannot be written as asked, e.g. a default
 * value for a macro that takes no parameters.
 */
export class DefinitionError extends MarkupError {
  constructor(
    public readonly macro: string,
    message: string
  ) {
    super(message, "definition");
    this.name = "DefinitionError";
  }
}
