/**
 * Graph Element
 *
 * Shared shape of nodes and edges: a label plus a typed property bag.
 */

import { PropertyMissingError, PropertyTypeMismatchError, InvalidPropertyValueError } from "../errors"
import { propertyValueSchema, type PropertyValue, type PrimitiveValue } from "./property"

/**
 * Receives every property change on an element.
 * The graph installs one on each node to keep declared indices in sync.
 */
export interface PropertyObserver {
  propertyChanged(
    element: GraphElement,
    key: string,
    previous: PropertyValue | undefined,
    next: PropertyValue,
  ): void
}

/**
 * A labelled element carrying key-value properties.
 */
export abstract class GraphElement {
  private readonly properties = new Map<string, PropertyValue>()

  constructor(
    public readonly label: string,
    private readonly observer?: PropertyObserver,
  ) {}

  // ===========================================================================
  // PROPERTY BAG
  // ===========================================================================

  /**
   * Set (or replace) a property.
   * @throws InvalidPropertyValueError if the value is not a well-formed PropertyValue
   */
  setProperty(key: string, value: PropertyValue): this {
    const result = propertyValueSchema.safeParse(value)
    if (!result.success) {
      throw new InvalidPropertyValueError(
        value.kind,
        value.value,
        result.error.errors[0]?.message ?? "invalid value",
      )
    }

    const previous = this.properties.get(key)
    this.properties.set(key, value)
    this.observer?.propertyChanged(this, key, previous, value)
    return this
  }

  getProperty(key: string): PropertyValue | undefined {
    return this.properties.get(key)
  }

  hasProperty(key: string): boolean {
    return this.properties.has(key)
  }

  propertyKeys(): string[] {
    return Array.from(this.properties.keys())
  }

  /** Plain key-value view of the bag, for display and logging. */
  toRecord(): Record<string, PrimitiveValue> {
    const record: Record<string, PrimitiveValue> = {}
    for (const [key, property] of this.properties) {
      record[key] = property.value
    }
    return record
  }

  // ===========================================================================
  // TYPED ACCESSORS
  // ===========================================================================

  getString(key: string): string {
    const property = this.require(key)
    if (property.kind !== "string") throw new PropertyTypeMismatchError(key, "string", property.kind)
    return property.value
  }

  getInteger(key: string): number {
    const property = this.require(key)
    if (property.kind !== "integer") throw new PropertyTypeMismatchError(key, "integer", property.kind)
    return property.value
  }

  getFloat(key: string): number {
    const property = this.require(key)
    if (property.kind !== "float") throw new PropertyTypeMismatchError(key, "float", property.kind)
    return property.value
  }

  /**
   * Read an integer or float property as a number.
   */
  getNumber(key: string): number {
    const value = this.findNumber(key)
    if (value === undefined) throw new PropertyMissingError(key, this.describe())
    return value
  }

  /**
   * Like getString, but a missing key yields undefined.
   */
  findString(key: string): string | undefined {
    const property = this.properties.get(key)
    if (property === undefined) return undefined
    if (property.kind !== "string") throw new PropertyTypeMismatchError(key, "string", property.kind)
    return property.value
  }

  /**
   * Like getNumber, but a missing key yields undefined.
   */
  findNumber(key: string): number | undefined {
    const property = this.properties.get(key)
    if (property === undefined) return undefined
    if (property.kind === "string") throw new PropertyTypeMismatchError(key, "number", property.kind)
    return property.value
  }

  /** Short description used in error messages. */
  protected abstract describe(): string

  private require(key: string): PropertyValue {
    const property = this.properties.get(key)
    if (property === undefined) throw new PropertyMissingError(key, this.describe())
    return property
  }
}
