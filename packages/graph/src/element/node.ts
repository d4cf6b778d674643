/**
 * Graph Node
 */

import { GraphElement, type PropertyObserver } from "./graph-element"
import type { Edge } from "./edge"

/**
 * A labelled node. Identity is the id alone.
 */
export class Node extends GraphElement {
  private readonly outgoing: Edge[] = []
  private readonly incoming: Edge[] = []

  constructor(
    public readonly id: string,
    label: string,
    observer?: PropertyObserver,
  ) {
    super(label, observer)
  }

  /** Edges leaving this node, in creation order */
  get outgoingEdges(): readonly Edge[] {
    return this.outgoing
  }

  /** Edges arriving at this node, in creation order */
  get incomingEdges(): readonly Edge[] {
    return this.incoming
  }

  /**
   * Lazily yield outgoing edges, optionally only those with the given label.
   */
  *outgoingWith(edgeLabel?: string): Generator<Edge> {
    for (const edge of this.outgoing) {
      if (edgeLabel === undefined || edge.label === edgeLabel) yield edge
    }
  }

  /**
   * Lazily yield incoming edges, optionally only those with the given label.
   */
  *incomingWith(edgeLabel?: string): Generator<Edge> {
    for (const edge of this.incoming) {
      if (edgeLabel === undefined || edge.label === edgeLabel) yield edge
    }
  }

  /** @internal called by Graph.addEdge */
  attachOutgoing(edge: Edge): void {
    this.outgoing.push(edge)
  }

  /** @internal called by Graph.addEdge */
  attachIncoming(edge: Edge): void {
    this.incoming.push(edge)
  }

  equals(other: Node | undefined): boolean {
    return other !== undefined && other.id === this.id
  }

  override toString(): string {
    return `Node{label='${this.label}', id='${this.id}', properties=${JSON.stringify(this.toRecord())}}`
  }

  protected override describe(): string {
    return `${this.label} '${this.id}'`
  }
}
