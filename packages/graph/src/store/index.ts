export { Graph } from "./graph"
export type { GraphStats } from "./graph"
export { KeyedIndex } from "./keyed-index"
