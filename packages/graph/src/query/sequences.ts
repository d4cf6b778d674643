/**
 * Traversal Sequences
 *
 * Lazy, single-use collections that traversal steps compose over.
 * Each step wraps its upstream in a generator; nothing is visited until a
 * terminal operation (toArray, toSet, count, first, average, ...) runs.
 */

import type { Node, Edge, GraphElement, PrimitiveValue } from "../element"
import { SequenceConsumedError } from "../errors"

// =============================================================================
// LAZY HELPERS
// =============================================================================

function* filter<T>(source: Iterable<T>, predicate: (item: T) => boolean): Generator<T> {
  for (const item of source) {
    if (predicate(item)) yield item
  }
}

function* map<T, U>(source: Iterable<T>, fn: (item: T) => U): Generator<U> {
  for (const item of source) {
    yield fn(item)
  }
}

function* flatMap<T, U>(source: Iterable<T>, fn: (item: T) => Iterable<U>): Generator<U> {
  for (const item of source) {
    yield* fn(item)
  }
}

function* numbersOf(source: Iterable<GraphElement>, key: string, skipMissing: boolean): Generator<number> {
  for (const element of source) {
    if (!skipMissing) {
      yield element.getNumber(key)
      continue
    }
    const value = element.findNumber(key)
    if (value !== undefined) yield value
  }
}

/**
 * Options for numeric projections.
 */
export interface NumberProjectionOptions {
  /** Drop elements that lack the key instead of throwing PropertyMissingError */
  skipMissing?: boolean
}

// =============================================================================
// SEQUENCE
// =============================================================================

/**
 * Base class for all traversal sequences.
 * A sequence can be chained from or consumed exactly once.
 */
export abstract class Sequence<T> implements Iterable<T> {
  private consumed = false

  constructor(private readonly source: Iterable<T>) {}

  /**
   * Hand the upstream over to the next step or terminal operation.
   * @throws SequenceConsumedError on the second call
   */
  protected take(): Iterable<T> {
    if (this.consumed) {
      throw new SequenceConsumedError()
    }
    this.consumed = true
    return this.source
  }

  [Symbol.iterator](): Iterator<T> {
    return this.take()[Symbol.iterator]()
  }

  toArray(): T[] {
    return Array.from(this.take())
  }

  toSet(): Set<T> {
    return new Set(this.take())
  }

  count(): number {
    let count = 0
    for (const _item of this.take()) count++
    return count
  }

  first(): T | undefined {
    for (const item of this.take()) return item
    return undefined
  }
}

// =============================================================================
// VALUES
// =============================================================================

/**
 * Projected property values.
 */
export class Values<T extends PrimitiveValue> extends Sequence<T> {}

/**
 * Projected numeric property values.
 */
export class Numbers extends Values<number> {
  sum(): number {
    let total = 0
    for (const value of this.take()) total += value
    return total
  }

  /**
   * Arithmetic mean, or `fallback` when there are no values.
   */
  average(fallback = 0): number {
    let total = 0
    let count = 0
    for (const value of this.take()) {
      total += value
      count++
    }
    return count === 0 ? fallback : total / count
  }
}

// =============================================================================
// NODES
// =============================================================================

/**
 * A lazy set of nodes.
 *
 * @example
 * ```typescript
 * graph.query()
 *   .match("Bram Stoker")
 *   .in("writtenBy").fromNodes()
 *   .in("reviewed")
 *   .numbers("rating")
 *   .average()
 * ```
 */
export class Nodes extends Sequence<Node> {
  /** Follow outgoing edges with the given label */
  out(edgeLabel: string): Relationships {
    return new Relationships(flatMap(this.take(), (node) => node.outgoingWith(edgeLabel)))
  }

  /** Follow incoming edges with the given label */
  in(edgeLabel: string): Relationships {
    return new Relationships(flatMap(this.take(), (node) => node.incomingWith(edgeLabel)))
  }

  where(predicate: (node: Node) => boolean): Nodes {
    return new Nodes(filter(this.take(), predicate))
  }

  /**
   * Keep nodes whose raw property value satisfies the predicate.
   * Nodes without the property are dropped.
   */
  whereProperty(key: string, predicate: (value: PrimitiveValue) => boolean): Nodes {
    return this.where((node) => {
      const property = node.getProperty(key)
      return property !== undefined && predicate(property.value)
    })
  }

  /**
   * Drop repeated nodes, keeping first occurrences.
   */
  distinct(): Nodes {
    const seen = new Set<string>()
    return this.where((node) => {
      if (seen.has(node.id)) return false
      seen.add(node.id)
      return true
    })
  }

  numbers(key: string, options: NumberProjectionOptions = {}): Numbers {
    return new Numbers(numbersOf(this.take(), key, options.skipMissing ?? false))
  }

  /**
   * @throws PropertyMissingError / PropertyTypeMismatchError while consumed
   */
  strings(key: string): Values<string> {
    return new Values(map(this.take(), (node) => node.getString(key)))
  }

  ids(): Values<string> {
    return new Values(map(this.take(), (node) => node.id))
  }
}

// =============================================================================
// RELATIONSHIPS
// =============================================================================

/**
 * A lazy set of edges produced by a directional step.
 */
export class Relationships extends Sequence<Edge> {
  /** Project to edge targets, optionally keeping only targets with a label */
  toNodes(nodeLabel?: string): Nodes {
    const edges = this.take()
    const kept = nodeLabel === undefined ? edges : filter(edges, (edge) => edge.target.label === nodeLabel)
    return new Nodes(map(kept, (edge) => edge.target))
  }

  /** Project to edge sources, optionally keeping only sources with a label */
  fromNodes(nodeLabel?: string): Nodes {
    const edges = this.take()
    const kept = nodeLabel === undefined ? edges : filter(edges, (edge) => edge.source.label === nodeLabel)
    return new Nodes(map(kept, (edge) => edge.source))
  }

  where(predicate: (edge: Edge) => boolean): Relationships {
    return new Relationships(filter(this.take(), predicate))
  }

  numbers(key: string, options: NumberProjectionOptions = {}): Numbers {
    return new Numbers(numbersOf(this.take(), key, options.skipMissing ?? false))
  }
}
