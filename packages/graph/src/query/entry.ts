/**
 * Query Entry Point
 *
 * Starting points for traversals. Only `match` can fail: every later
 * step yields an empty sequence instead of throwing.
 */

import type { Node, PrimitiveValue } from "../element"
import type { Graph } from "../store"
import { Nodes } from "./sequences"

export class Query {
  constructor(private readonly graph: Graph) {}

  /**
   * Start from a single named node.
   * @throws NodeNotFoundError if the id is unknown
   */
  match(id: string): Nodes {
    return new Nodes([this.graph.getNodeOrFail(id)])
  }

  /**
   * Start from a node if it exists, otherwise from nothing.
   */
  find(id: string): Nodes {
    const node = this.graph.getNode(id)
    return new Nodes(node ? [node] : [])
  }

  withLabel(label: string): Nodes {
    return new Nodes(this.graph.getNodesByLabel(label))
  }

  /**
   * Start from the nodes of a label with an exact property value.
   * Uses a declared index when one exists.
   */
  withProperty(label: string, property: string, value: PrimitiveValue): Nodes {
    return new Nodes(this.graph.findByIndex(label, property, value))
  }

  from(nodes: Iterable<Node>): Nodes {
    return new Nodes(nodes)
  }
}
