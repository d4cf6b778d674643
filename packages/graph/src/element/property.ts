/**
 * Property Values
 *
 * The closed set of value kinds a property bag can hold.
 */

import { z } from "zod"
import { InvalidPropertyValueError } from "../errors"

// =============================================================================
// VALUE TYPES
// =============================================================================

export type PropertyKind = "string" | "integer" | "float"

export type StringProperty = { readonly kind: "string"; readonly value: string }
export type IntegerProperty = { readonly kind: "integer"; readonly value: number }
export type FloatProperty = { readonly kind: "float"; readonly value: number }

/**
 * A typed property value.
 */
export type PropertyValue = StringProperty | IntegerProperty | FloatProperty

/**
 * The raw value carried by a property, as seen by predicates and indices.
 */
export type PrimitiveValue = PropertyValue["value"]

// =============================================================================
// SCHEMAS
// =============================================================================

const integerSchema = z.number().int().safe()
const floatSchema = z.number().finite()

export const propertyValueSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("string"), value: z.string() }),
  z.object({ kind: z.literal("integer"), value: integerSchema }),
  z.object({ kind: z.literal("float"), value: floatSchema }),
])

function checked(kind: PropertyKind, schema: z.ZodType<number>, value: number): number {
  const result = schema.safeParse(value)
  if (!result.success) {
    throw new InvalidPropertyValueError(kind, value, result.error.errors[0]?.message ?? "invalid value")
  }
  return result.data
}

// =============================================================================
// CONSTRUCTORS
// =============================================================================

/**
 * Property value constructors.
 *
 * @example
 * ```typescript
 * node.setProperty("title", Property.string("Dracula"))
 * edge.setProperty("rating", Property.integer(8))
 * ```
 */
export const Property = {
  string(value: string): StringProperty {
    return { kind: "string", value }
  },

  /** @throws InvalidPropertyValueError for non-integers and unsafe integers */
  integer(value: number): IntegerProperty {
    return { kind: "integer", value: checked("integer", integerSchema, value) }
  },

  /** @throws InvalidPropertyValueError for NaN and infinities */
  float(value: number): FloatProperty {
    return { kind: "float", value: checked("float", floatSchema, value) }
  },
} as const

/**
 * Check whether two property values are the same kind and value.
 */
export function samePropertyValue(a: PropertyValue | undefined, b: PropertyValue | undefined): boolean {
  if (a === undefined || b === undefined) return a === b
  return a.kind === b.kind && a.value === b.value
}
