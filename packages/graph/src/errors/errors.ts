/**
 * Custom Error Classes
 */

import type { PropertyKind } from "../element/property"

/**
 * Base error for all graph errors.
 */
export class GraphError extends Error {
  public override readonly cause?: Error

  constructor(message: string, cause?: Error) {
    super(message)
    this.name = "GraphError"
    this.cause = cause

    // V8-specific; hides the constructor frames
    Error.captureStackTrace(this, this.constructor)
  }
}

/**
 * Duplicate node error.
 * Thrown by the strict creation path when the id is already taken.
 */
export class DuplicateNodeError extends GraphError {
  constructor(public readonly nodeId: string) {
    super(`Duplicate node found: ${nodeId}`)
    this.name = "DuplicateNodeError"
  }
}

/**
 * Not found error.
 * Thrown when an edge endpoint or a direct lookup targets an unknown id.
 */
export class NodeNotFoundError extends GraphError {
  constructor(public readonly nodeId: string) {
    super(`Node not found: ${nodeId}`)
    this.name = "NodeNotFoundError"
  }
}

/**
 * Thrown when a typed accessor reads a key the element does not carry.
 */
export class PropertyMissingError extends GraphError {
  constructor(
    public readonly key: string,
    public readonly elementLabel: string,
  ) {
    super(`Property '${key}' is missing on ${elementLabel}`)
    this.name = "PropertyMissingError"
  }
}

/**
 * Thrown when a typed accessor finds a value of another kind.
 */
export class PropertyTypeMismatchError extends GraphError {
  constructor(
    public readonly key: string,
    public readonly expected: PropertyKind | "number",
    public readonly actual: PropertyKind,
  ) {
    super(`Property '${key}' is ${actual}, expected ${expected}`)
    this.name = "PropertyTypeMismatchError"
  }
}

/**
 * Thrown when a property value constructor rejects its input.
 */
export class InvalidPropertyValueError extends GraphError {
  constructor(
    public readonly kind: PropertyKind,
    public readonly received: unknown,
    message: string,
  ) {
    super(`Invalid ${kind} property value ${String(received)}: ${message}`)
    this.name = "InvalidPropertyValueError"
  }
}

/**
 * Thrown when a traversal sequence is reused after it was chained from or consumed.
 */
export class SequenceConsumedError extends GraphError {
  constructor() {
    super("Sequence has already been chained from or consumed")
    this.name = "SequenceConsumedError"
  }
}
