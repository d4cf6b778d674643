/**
 * In-Memory Graph
 *
 * Owns every node and edge, keeps adjacency lists on the nodes and
 * maintains the label index and declared property indices.
 */

import { Node, Edge, samePropertyValue } from "../element"
import type { GraphElement, PropertyObserver, PropertyValue, PrimitiveValue } from "../element"
import { DuplicateNodeError, NodeNotFoundError } from "../errors"
import { Query } from "../query"
import { KeyedIndex } from "./keyed-index"

/**
 * Graph statistics.
 */
export interface GraphStats {
  nodes: number
  edges: number
  labels: number
  edgeLabels: number
}

/**
 * Append-only labelled property graph with:
 * - Strict and idempotent node creation
 * - Adjacency lists for traversal in both directions
 * - Label-based node lookup
 * - Exact-match property indexes
 */
export class Graph {
  /** All nodes by ID */
  private readonly nodesById = new Map<string, Node>()

  /** Nodes by label */
  private readonly nodesByLabel = new KeyedIndex<string, Node>()

  /** Declared property indexes: label -> property -> value -> nodes */
  private readonly propertyIndexes = new Map<string, Map<string, KeyedIndex<PrimitiveValue, Node>>>()

  private readonly edgeLabels = new Set<string>()
  private edgeCount = 0

  /** Keeps declared indexes in sync with node property writes */
  private readonly indexer: PropertyObserver = {
    propertyChanged: (element, key, previous, next) => this.reindex(element, key, previous, next),
  }

  // ===========================================================================
  // NODE OPERATIONS
  // ===========================================================================

  /**
   * Create a new node.
   * @throws DuplicateNodeError if the id is already taken
   */
  addNode(id: string, label: string): Node {
    if (this.nodesById.has(id)) {
      throw new DuplicateNodeError(id)
    }
    return this.insert(id, label)
  }

  /**
   * Return the node with this id, creating it if absent.
   * An existing node keeps its original label.
   */
  addNodeIfAbsent(id: string, label: string): Node {
    return this.nodesById.get(id) ?? this.insert(id, label)
  }

  getNode(id: string): Node | undefined {
    return this.nodesById.get(id)
  }

  /**
   * @throws NodeNotFoundError if no node has this id
   */
  getNodeOrFail(id: string): Node {
    const node = this.nodesById.get(id)
    if (!node) {
      throw new NodeNotFoundError(id)
    }
    return node
  }

  hasNode(id: string): boolean {
    return this.nodesById.has(id)
  }

  /**
   * All nodes carrying a label (empty set for an unknown label).
   */
  getNodesByLabel(label: string): ReadonlySet<Node> {
    return this.nodesByLabel.get(label)
  }

  nodes(): IterableIterator<Node> {
    return this.nodesById.values()
  }

  labels(): string[] {
    return Array.from(this.nodesByLabel.keys())
  }

  private insert(id: string, label: string): Node {
    const node = new Node(id, label, this.indexer)
    this.nodesById.set(id, node)
    this.nodesByLabel.put(label, node)
    return node
  }

  // ===========================================================================
  // EDGE OPERATIONS
  // ===========================================================================

  /**
   * Create a directed edge between two existing nodes.
   * @throws NodeNotFoundError if either endpoint is unknown
   */
  addEdge(label: string, fromId: string, toId: string): Edge {
    const from = this.getNodeOrFail(fromId)
    const to = this.getNodeOrFail(toId)

    const edge = new Edge(label, from, to)
    from.attachOutgoing(edge)
    to.attachIncoming(edge)

    this.edgeLabels.add(label)
    this.edgeCount++
    return edge
  }

  // ===========================================================================
  // PROPERTY INDEXES
  // ===========================================================================

  /**
   * Create a property index over the nodes of a label.
   * Existing nodes are indexed immediately; later writes are tracked.
   */
  createIndex(label: string, property: string): void {
    let byProperty = this.propertyIndexes.get(label)
    if (!byProperty) {
      byProperty = new Map()
      this.propertyIndexes.set(label, byProperty)
    }
    if (byProperty.has(property)) return

    const index = new KeyedIndex<PrimitiveValue, Node>()
    byProperty.set(property, index)

    for (const node of this.getNodesByLabel(label)) {
      const value = node.getProperty(property)
      if (value !== undefined) {
        index.put(value.value, node)
      }
    }
  }

  hasIndex(label: string, property: string): boolean {
    return this.propertyIndexes.get(label)?.has(property) ?? false
  }

  /**
   * Find nodes by exact property value.
   * Falls back to a label scan when no index is declared.
   */
  findByIndex(label: string, property: string, value: PrimitiveValue): ReadonlySet<Node> {
    const index = this.propertyIndexes.get(label)?.get(property)
    if (index) {
      return index.get(value)
    }

    const matches = new Set<Node>()
    for (const node of this.getNodesByLabel(label)) {
      if (node.getProperty(property)?.value === value) {
        matches.add(node)
      }
    }
    return matches
  }

  private reindex(
    element: GraphElement,
    key: string,
    previous: PropertyValue | undefined,
    next: PropertyValue,
  ): void {
    if (!(element instanceof Node) || samePropertyValue(previous, next)) return

    const index = this.propertyIndexes.get(element.label)?.get(key)
    if (!index) return

    if (previous !== undefined) {
      index.remove(previous.value, element)
    }
    index.put(next.value, element)
  }

  // ===========================================================================
  // QUERIES
  // ===========================================================================

  /**
   * Entry point for traversals over this graph.
   */
  query(): Query {
    return new Query(this)
  }

  stats(): GraphStats {
    return {
      nodes: this.nodesById.size,
      edges: this.edgeCount,
      labels: this.nodesByLabel.size,
      edgeLabels: this.edgeLabels.size,
    }
  }
}
