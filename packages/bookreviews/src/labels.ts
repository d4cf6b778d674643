/**
 * Node and edge labels of the book-review graph.
 */

export const NodeLabel = {
  BOOK: "book",
  USER: "user",
  PUBLISHER: "publisher",
  AUTHOR: "author",
  CITY: "city",
  STATE: "state",
  COUNTRY: "country",
} as const

export type NodeLabel = (typeof NodeLabel)[keyof typeof NodeLabel]

export const EdgeLabel = {
  PUBLISHED_BY: "publishedBy",
  WRITTEN_BY: "writtenBy",
  IN_CITY: "inCity",
  IN_STATE: "inState",
  IN_COUNTRY: "inCountry",
  REVIEWED: "reviewed",
} as const

export type EdgeLabel = (typeof EdgeLabel)[keyof typeof EdgeLabel]
