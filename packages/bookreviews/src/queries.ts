/**
 * Book Review Queries
 *
 * Multi-hop traversals answering the questions the report prints.
 */

import type { Graph, Node, Nodes, Relationships } from "@bookgraph/graph"
import type { BookReviewsGraph } from "./graph"
import { NodeLabel, EdgeLabel } from "./labels"

/**
 * A name paired with the value it is ranked by.
 */
export interface RankedEntry {
  name: string
  value: number
}

const byValueDescending = (a: RankedEntry, b: RankedEntry) => b.value - a.value

// =============================================================================
// AUTHORS
// =============================================================================

/** author <-writtenBy- book <-reviewed- user */
function reviewsOf(authors: Nodes): Relationships {
  return authors.in(EdgeLabel.WRITTEN_BY).fromNodes(NodeLabel.BOOK).in(EdgeLabel.REVIEWED)
}

function rankAuthors(graph: Graph, score: (reviews: Relationships) => number): RankedEntry[] {
  return Array.from(graph.getNodesByLabel(NodeLabel.AUTHOR), (author: Node) => ({
    name: author.getString("name"),
    value: score(reviewsOf(graph.query().from([author]))),
  })).sort(byValueDescending)
}

/**
 * Number of reviews of all books by an author.
 * @throws NodeNotFoundError if the author is unknown
 */
export function getReviewCountByAuthor(graph: Graph, author: string): number {
  return reviewsOf(graph.query().match(author)).count()
}

/**
 * Every author with the number of reviews of their books, most reviewed first.
 */
export function getAuthorsByNumberOfReviews(graph: Graph): RankedEntry[] {
  return rankAuthors(graph, (reviews) => reviews.count())
}

/**
 * Mean rating over all reviews of an author's books; 0 when there are none.
 * @throws NodeNotFoundError if the author is unknown
 */
export function getAverageRatingByAuthor(graph: Graph, author: string): number {
  return reviewsOf(graph.query().match(author)).numbers("rating").average(0)
}

/**
 * Every author with their average rating, highest first. Unreviewed authors score 0.
 */
export function getAuthorsByAverageRating(graph: Graph): RankedEntry[] {
  return rankAuthors(graph, (reviews) => reviews.numbers("rating").average(0))
}

// =============================================================================
// REGIONS
// =============================================================================

function titlesReviewedBy(users: Nodes): Set<string> {
  return users.out(EdgeLabel.REVIEWED).toNodes(NodeLabel.BOOK).strings("title").toSet()
}

/**
 * Titles reviewed by users living in a city with this name.
 */
export function getBooksReviewedByUsersInCity(graph: BookReviewsGraph, city: string): Set<string> {
  const users = graph.query().from(graph.citiesByName.get(city)).in(EdgeLabel.IN_CITY).fromNodes()
  return titlesReviewedBy(users)
}

/**
 * Titles reviewed by users living in a state with this name.
 */
export function getBooksReviewedByUsersInState(graph: BookReviewsGraph, state: string): Set<string> {
  const users = graph
    .query()
    .from(graph.statesByName.get(state))
    .in(EdgeLabel.IN_STATE)
    .fromNodes()
    .in(EdgeLabel.IN_CITY)
    .fromNodes()
  return titlesReviewedBy(users)
}

/**
 * Titles reviewed by users living in a country with this name.
 */
export function getBooksReviewedByUsersInCountry(graph: BookReviewsGraph, country: string): Set<string> {
  const users = graph
    .query()
    .from(graph.countriesByName.get(country))
    .in(EdgeLabel.IN_COUNTRY)
    .fromNodes()
    .in(EdgeLabel.IN_STATE)
    .fromNodes()
    .in(EdgeLabel.IN_CITY)
    .fromNodes()
  return titlesReviewedBy(users)
}

// =============================================================================
// READERS
// =============================================================================

/**
 * Mean age of the reviewers of every book with this title.
 * Reviewers without an age are left out; 0 when nobody qualifies.
 */
export function getAverageAgeByBookTitle(graph: Graph, title: string): number {
  return graph
    .query()
    .withProperty(NodeLabel.BOOK, "title", title)
    .in(EdgeLabel.REVIEWED)
    .fromNodes(NodeLabel.USER)
    .numbers("age", { skipMissing: true })
    .average(0)
}
