/**
 * Book Reviews
 *
 * Loads the book-review dataset into an in-memory property graph and
 * answers questions about authors, ratings, regions and readers.
 *
 * @example
 * ```typescript
 * import { loadConfig, loadBookReviewsGraph, getAverageRatingByAuthor, createLogger } from '@bookgraph/bookreviews'
 *
 * const config = loadConfig({ dataDir: './data' })
 * const { graph } = await loadBookReviewsGraph(config, createLogger('example'))
 * const average = getAverageRatingByAuthor(graph, 'Bram Stoker')
 * ```
 *
 * @packageDocumentation
 */

export { BookReviewsGraph, userNodeId } from "./graph"
export type { BookReviewsGraphOptions, BuildReport } from "./graph"
export { NodeLabel, EdgeLabel } from "./labels"
export { parseLocation, cityNodeId, stateNodeId, countryNodeId } from "./location"
export type { ParsedLocation } from "./location"
export { loadBookReviewsGraph } from "./load"
export type { LoadedGraph } from "./load"

export {
  getReviewCountByAuthor,
  getAuthorsByNumberOfReviews,
  getAverageRatingByAuthor,
  getAuthorsByAverageRating,
  getBooksReviewedByUsersInCity,
  getBooksReviewedByUsersInState,
  getBooksReviewedByUsersInCountry,
  getAverageAgeByBookTitle,
} from "./queries"
export type { RankedEntry } from "./queries"

export { buildReport, formatReport, formatRanking, formatTitles } from "./report"
export type { BookReviewsReport, ReportOptions, OutputFormat } from "./report"

export { BookReviewsCsvParser, decodeLatin1, bookRowSchema, bookRatingRowSchema, userRowSchema } from "./csv"
export type { Book, BookRating, User, ParseResult, CsvParserOptions, CsvFiles } from "./csv"

export { loadConfig, dataFiles, configSchema } from "./config"
export type { BookReviewsConfig, BookReviewsConfigInput } from "./config"
export { Logger, createLogger } from "./logger"
export type { LogLevel, LoggerOptions } from "./logger"
export { BookReviewsError, CsvParseError, ConfigError } from "./errors"
export { createProgram, main } from "./cli"
