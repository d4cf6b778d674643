/**
 * In-Memory Property Graph
 *
 * Labelled nodes and edges with typed property bags, label and property
 * indexes, and a lazy traversal algebra.
 *
 * @example
 * ```typescript
 * import { Graph, Property } from '@bookgraph/graph'
 *
 * const graph = new Graph()
 * graph.addNode('b1', 'book').setProperty('title', Property.string('Dracula'))
 * graph.addNode('u1', 'user').setProperty('age', Property.integer(20))
 * graph.addEdge('reviewed', 'u1', 'b1').setProperty('rating', Property.integer(8))
 *
 * const ages = graph.query()
 *   .withProperty('book', 'title', 'Dracula')
 *   .in('reviewed').fromNodes()
 *   .numbers('age', { skipMissing: true })
 *   .average()
 * ```
 *
 * @packageDocumentation
 */

// =============================================================================
// STORE
// =============================================================================

export { Graph, KeyedIndex } from "./store"
export type { GraphStats } from "./store"

// =============================================================================
// ELEMENTS
// =============================================================================

export { GraphElement, Node, Edge, Property, propertyValueSchema, samePropertyValue } from "./element"
export type {
  PropertyObserver,
  PropertyKind,
  PropertyValue,
  PrimitiveValue,
  StringProperty,
  IntegerProperty,
  FloatProperty,
} from "./element"

// =============================================================================
// QUERY
// =============================================================================

export { Query, Sequence, Values, Numbers, Nodes, Relationships } from "./query"
export type { NumberProjectionOptions } from "./query"

// =============================================================================
// ERRORS
// =============================================================================

export {
  GraphError,
  DuplicateNodeError,
  NodeNotFoundError,
  PropertyMissingError,
  PropertyTypeMismatchError,
  InvalidPropertyValueError,
  SequenceConsumedError,
} from "./errors"
