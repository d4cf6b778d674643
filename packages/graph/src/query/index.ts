/**
 * Query Module
 */

export { Query } from "./entry"
export { Sequence, Values, Numbers, Nodes, Relationships } from "./sequences"
export type { NumberProjectionOptions } from "./sequences"
