/**
 * Graph Edge
 */

import { GraphElement } from "./graph-element"
import type { Node } from "./node"

/**
 * A directed, labelled edge. Edges carry no id of their own.
 */
export class Edge extends GraphElement {
  constructor(
    label: string,
    public readonly source: Node,
    public readonly target: Node,
  ) {
    super(label)
  }

  override toString(): string {
    return `Edge{(${this.source.id})-[${this.label}]->(${this.target.id})}`
  }

  protected override describe(): string {
    return `edge ${this.source.id}-[${this.label}]->${this.target.id}`
  }
}
