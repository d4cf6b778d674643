/**
 * Book Reviews Graph
 *
 * Builds the labelled graph from parsed CSV records:
 *
 *   (book)-[publishedBy {year}]->(publisher)
 *   (book)-[writtenBy]->(author)
 *   (user)-[reviewed {rating}]->(book)
 *   (user)-[inCity]->(city)-[inState]->(state)-[inCountry]->(country)
 */

import { Graph, KeyedIndex, Property, DuplicateNodeError, type Node } from "@bookgraph/graph"
import type { Book, BookRating, User, ParseResult } from "./csv"
import { NodeLabel, EdgeLabel } from "./labels"
import { parseLocation } from "./location"
import { createLogger, type Logger } from "./logger"

export interface BookReviewsGraphOptions {
  /** Declare a property index on book titles (default: true) */
  indexTitles?: boolean
  logger?: Logger
}

/**
 * Counts gathered while loading records.
 */
export interface BuildReport {
  books: number
  users: number
  reviews: number
  /** Books whose ISBN was already taken */
  duplicateBooks: number
  /** Users whose id was already taken */
  duplicateUsers: number
  /** Ratings naming an unknown user or book */
  danglingReviews: number
}

/**
 * Node id of a user. Prefixed so user ids cannot clash with ISBNs.
 */
export function userNodeId(userId: string): string {
  return `user:${userId}`
}

export class BookReviewsGraph extends Graph {
  /** Region lookups by display name; several regions may share a name */
  readonly countriesByName = new KeyedIndex<string, Node>()
  readonly statesByName = new KeyedIndex<string, Node>()
  readonly citiesByName = new KeyedIndex<string, Node>()

  private readonly logger: Logger

  constructor(options: BookReviewsGraphOptions = {}) {
    super()
    this.logger = options.logger ?? createLogger("graph", { level: "warn" })
    if (options.indexTitles ?? true) {
      this.createIndex(NodeLabel.BOOK, "title")
    }
  }

  /**
   * Load records in dependency order: books (with publishers and authors),
   * then users (with locations), then reviews.
   */
  load(source: ParseResult): BuildReport {
    const report: BuildReport = {
      books: 0,
      users: 0,
      reviews: 0,
      duplicateBooks: 0,
      duplicateUsers: 0,
      danglingReviews: 0,
    }

    for (const book of source.books) {
      if (this.addBook(book)) report.books++
      else report.duplicateBooks++
    }

    for (const user of source.users) {
      if (this.addUser(user)) report.users++
      else report.duplicateUsers++
    }

    for (const rating of source.bookRatings) {
      if (this.addReview(rating)) report.reviews++
      else report.danglingReviews++
    }

    if (report.duplicateBooks > 0 || report.duplicateUsers > 0) {
      this.logger.warn("Skipped records with duplicate ids", {
        books: report.duplicateBooks,
        users: report.duplicateUsers,
      })
    }
    this.logger.info("Graph built", { ...report, ...this.stats() })
    return report
  }

  // ===========================================================================
  // BOOKS
  // ===========================================================================

  private addBook(book: Book): boolean {
    const node = this.tryAddNode(book.isbn, NodeLabel.BOOK)
    if (!node) return false

    node.setProperty("isbn", Property.string(book.isbn))
    node.setProperty("title", Property.string(book.title))

    this.addNodeIfAbsent(book.publisher, NodeLabel.PUBLISHER).setProperty("name", Property.string(book.publisher))
    this.addEdge(EdgeLabel.PUBLISHED_BY, book.isbn, book.publisher).setProperty(
      "year",
      Property.integer(book.yearOfPublication),
    )

    this.addNodeIfAbsent(book.author, NodeLabel.AUTHOR).setProperty("name", Property.string(book.author))
    this.addEdge(EdgeLabel.WRITTEN_BY, book.isbn, book.author)
    return true
  }

  // ===========================================================================
  // USERS
  // ===========================================================================

  private addUser(user: User): boolean {
    const id = userNodeId(user.userId)
    const node = this.tryAddNode(id, NodeLabel.USER)
    if (!node) return false

    if (user.age !== undefined) {
      node.setProperty("age", Property.integer(user.age))
    }

    const { city, state, country } = parseLocation(user.location)

    if (country && !this.hasNode(country.id)) {
      const countryNode = this.addNode(country.id, NodeLabel.COUNTRY).setProperty("name", Property.string(country.name))
      this.countriesByName.put(country.name, countryNode)
    }

    if (state && !this.hasNode(state.id)) {
      const stateNode = this.addNode(state.id, NodeLabel.STATE).setProperty("name", Property.string(state.name))
      this.statesByName.put(state.name, stateNode)
      if (country) this.addEdge(EdgeLabel.IN_COUNTRY, state.id, country.id)
    }

    if (city && !this.hasNode(city.id)) {
      const cityNode = this.addNode(city.id, NodeLabel.CITY).setProperty("name", Property.string(city.name))
      this.citiesByName.put(city.name, cityNode)
      if (state) this.addEdge(EdgeLabel.IN_STATE, city.id, state.id)
    }

    if (city) this.addEdge(EdgeLabel.IN_CITY, id, city.id)
    return true
  }

  // ===========================================================================
  // REVIEWS
  // ===========================================================================

  private addReview(rating: BookRating): boolean {
    const userId = userNodeId(rating.userId)
    if (!this.hasNode(userId) || !this.hasNode(rating.isbn)) {
      this.logger.debug("Skipping review with unknown endpoint", { user: rating.userId, isbn: rating.isbn })
      return false
    }

    this.addEdge(EdgeLabel.REVIEWED, userId, rating.isbn).setProperty("rating", Property.integer(rating.rating))
    return true
  }

  /**
   * Strict node creation where a duplicate id skips the record.
   */
  private tryAddNode(id: string, label: NodeLabel): Node | undefined {
    try {
      return this.addNode(id, label)
    } catch (error) {
      if (!(error instanceof DuplicateNodeError)) throw error
      this.logger.debug("Duplicate node id", { id, label })
      return undefined
    }
  }
}
