export { GraphElement } from "./graph-element"
export type { PropertyObserver } from "./graph-element"
export { Node } from "./node"
export { Edge } from "./edge"
export { Property, propertyValueSchema, samePropertyValue } from "./property"
export type {
  PropertyKind,
  PropertyValue,
  PrimitiveValue,
  StringProperty,
  IntegerProperty,
  FloatProperty,
} from "./property"
