/**
 * Report
 *
 * Runs the standard set of queries and renders the results as text or JSON.
 */

import type { BookReviewsGraph } from "./graph"
import {
  getAuthorsByNumberOfReviews,
  getAuthorsByAverageRating,
  getAverageRatingByAuthor,
  getBooksReviewedByUsersInState,
  getBooksReviewedByUsersInCountry,
  getAverageAgeByBookTitle,
  type RankedEntry,
} from "./queries"

export interface ReportOptions {
  /** Length of every ranked list */
  top: number
  state: string
  country: string
  title: string
}

export interface BookReviewsReport {
  authorsByReviews: RankedEntry[]
  averageRatingsOfTopAuthors: RankedEntry[]
  authorsByAverageRating: RankedEntry[]
  booksInState: { state: string; titles: string[] }
  booksInCountry: { country: string; titles: string[] }
  averageAge: { title: string; age: number }
}

export type OutputFormat = "table" | "json"

const sorted = (titles: Set<string>) => Array.from(titles).sort()

export function buildReport(graph: BookReviewsGraph, options: ReportOptions): BookReviewsReport {
  const authorsByReviews = getAuthorsByNumberOfReviews(graph).slice(0, options.top)

  return {
    authorsByReviews,
    averageRatingsOfTopAuthors: authorsByReviews.map(({ name }) => ({
      name,
      value: getAverageRatingByAuthor(graph, name),
    })),
    authorsByAverageRating: getAuthorsByAverageRating(graph).slice(0, options.top),
    booksInState: {
      state: options.state,
      titles: sorted(getBooksReviewedByUsersInState(graph, options.state)),
    },
    booksInCountry: {
      country: options.country,
      titles: sorted(getBooksReviewedByUsersInCountry(graph, options.country)).slice(0, options.top),
    },
    averageAge: {
      title: options.title,
      age: getAverageAgeByBookTitle(graph, options.title),
    },
  }
}

// =============================================================================
// RENDERING
// =============================================================================

/**
 * One "name value" line per entry under a heading.
 * Values are printed with `decimals` digits when given.
 */
export function formatRanking(heading: string, entries: RankedEntry[], decimals?: number): string {
  const lines = entries.map(({ name, value }) => `${name} ${decimals === undefined ? value : value.toFixed(decimals)}`)
  return [`${heading}:`, ...lines].join("\n")
}

export function formatTitles(heading: string, titles: string[]): string {
  return [`${heading}:`, ...(titles.length === 0 ? ["(none)"] : titles)].join("\n")
}

export function formatReport(report: BookReviewsReport, format: OutputFormat = "table"): string {
  if (format === "json") {
    return JSON.stringify(report, null, 2)
  }

  const top = report.authorsByReviews.length
  return [
    formatRanking(`Top ${top} authors by number of reviews`, report.authorsByReviews),
    formatRanking(`Average ratings for top ${top} authors`, report.averageRatingsOfTopAuthors, 2),
    formatRanking(`Top ${report.authorsByAverageRating.length} authors by average rating`, report.authorsByAverageRating, 2),
    formatTitles(`Books reviewed by users in ${report.booksInState.state}`, report.booksInState.titles),
    formatTitles(`Books reviewed by users in ${report.booksInCountry.country}`, report.booksInCountry.titles),
    `Average age of reviewers of "${report.averageAge.title}": ${report.averageAge.age.toFixed(2)}`,
  ].join("\n\n")
}
