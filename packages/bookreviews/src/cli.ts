/**
 * bookreviews CLI
 *
 * Commands:
 *   bookreviews report          - Print the standard report (default)
 *   bookreviews authors         - Rank authors by review count or average rating
 *   bookreviews rating <author> - Average rating of one author
 *   bookreviews region <name>   - Titles reviewed by users in a city, state or country
 *   bookreviews age <title>     - Average reviewer age for a title
 *   bookreviews stats           - Graph and ingestion statistics
 *
 * Global options:
 *   --data-dir <dir>          - Directory with the BX-*.csv files
 *   --top <n>                 - Length of ranked lists
 *   --on-invalid-row <mode>   - fail | skip
 *   --no-index-titles         - Scan books instead of indexing titles
 *   --format <format>         - table | json
 *   --debug                   - Verbose logging
 */

import { Command, CommanderError, InvalidArgumentError } from "commander"
import { GraphError } from "@bookgraph/graph"
import { loadConfig } from "./config"
import { BookReviewsError } from "./errors"
import type { BookReviewsGraph, BuildReport } from "./graph"
import { loadBookReviewsGraph } from "./load"
import { createLogger, type Logger } from "./logger"
import {
  getAuthorsByNumberOfReviews,
  getAuthorsByAverageRating,
  getAverageRatingByAuthor,
  getBooksReviewedByUsersInCity,
  getBooksReviewedByUsersInState,
  getBooksReviewedByUsersInCountry,
  getAverageAgeByBookTitle,
} from "./queries"
import { buildReport, formatReport, formatRanking, formatTitles, type OutputFormat } from "./report"

const pkg = {
  name: "bookreviews",
  version: "0.1.0",
  description: "Query the book-review dataset as a property graph",
}

type GlobalOptions = {
  dataDir?: string
  top?: number
  onInvalidRow?: "fail" | "skip"
  indexTitles: boolean
  format: OutputFormat
  debug?: boolean
}

interface CommandContext {
  graph: BookReviewsGraph
  build: BuildReport
  top: number
  format: OutputFormat
  logger: Logger
}

// ============================================================================
// Option parsers
// ============================================================================

function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10)
  if (Number.isNaN(parsed) || parsed <= 0 || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError("Expected a positive integer.")
  }
  return parsed
}

function parseInvalidRowMode(value: string): "fail" | "skip" {
  if (value === "fail" || value === "skip") return value
  throw new InvalidArgumentError("Expected fail or skip.")
}

function parseFormat(value: string): OutputFormat {
  if (value === "table" || value === "json") return value
  throw new InvalidArgumentError("Expected table or json.")
}

// ============================================================================
// Context
// ============================================================================

async function withGraph(command: Command, action: (ctx: CommandContext) => void): Promise<void> {
  const options = command.optsWithGlobals<GlobalOptions>()
  const config = loadConfig({
    dataDir: options.dataDir,
    top: options.top,
    onInvalidRow: options.onInvalidRow,
    indexTitles: options.indexTitles ? undefined : false,
    debug: options.debug,
  })

  // Logs stay quiet by default so table and JSON output can be piped
  const logger = createLogger("bookreviews", { level: config.debug ? "debug" : "warn" })
  const { graph, report } = await loadBookReviewsGraph(config, logger)

  action({ graph, build: report, top: config.top, format: options.format, logger })
}

function printTitles(ctx: CommandContext, heading: string, titles: Set<string>): void {
  const list = Array.from(titles).sort()
  ctx.logger.log(ctx.format === "json" ? JSON.stringify(list, null, 2) : formatTitles(heading, list))
}

// ============================================================================
// Program
// ============================================================================

export function createProgram(): Command {
  const program = new Command()
    .exitOverride()
    .name(pkg.name)
    .description(pkg.description)
    .version(pkg.version, "-v, --version", "Show version number")
    .option("-d, --data-dir <dir>", "Directory with the BX-*.csv files")
    .option("-t, --top <n>", "Length of ranked lists", parsePositiveInt)
    .option("--on-invalid-row <mode>", "What to do with invalid CSV rows (fail/skip)", parseInvalidRowMode)
    .option("--no-index-titles", "Scan books instead of indexing titles")
    .option("-f, --format <format>", "Output format (table/json)", parseFormat, "table")
    .option("--debug", "Enable debug output")

  program
    .command("report", { isDefault: true })
    .description("Print the standard report")
    .option("--state <state>", "State for the regional title list", "california")
    .option("--country <country>", "Country for the regional title list", "italy")
    .option("--title <title>", "Title for the reviewer age average", "Dracula")
    .action(async (options: { state: string; country: string; title: string }, command: Command) => {
      await withGraph(command, (ctx) => {
        const report = buildReport(ctx.graph, { top: ctx.top, ...options })
        ctx.logger.log(formatReport(report, ctx.format))
      })
    })

  program
    .command("authors")
    .description("Rank authors by review count or average rating")
    .option("--by <metric>", "Ranking metric (reviews/rating)", "reviews")
    .action(async (options: { by: string }, command: Command) => {
      if (options.by !== "reviews" && options.by !== "rating") {
        command.error(`error: unknown metric '${options.by}'`)
      }
      const byRating = options.by === "rating"

      await withGraph(command, (ctx) => {
        const ranking = (byRating ? getAuthorsByAverageRating(ctx.graph) : getAuthorsByNumberOfReviews(ctx.graph)).slice(
          0,
          ctx.top,
        )
        const heading = `Top ${ranking.length} authors by ${byRating ? "average rating" : "number of reviews"}`
        ctx.logger.log(
          ctx.format === "json" ? JSON.stringify(ranking, null, 2) : formatRanking(heading, ranking, byRating ? 2 : undefined),
        )
      })
    })

  program
    .command("rating")
    .description("Average rating of one author")
    .argument("<author>", "Author name")
    .action(async (author: string, _options: unknown, command: Command) => {
      await withGraph(command, (ctx) => {
        const average = getAverageRatingByAuthor(ctx.graph, author)
        ctx.logger.log(
          ctx.format === "json" ? JSON.stringify({ author, average }) : `Average rating for ${author}: ${average.toFixed(2)}`,
        )
      })
    })

  program
    .command("region")
    .description("Titles reviewed by users in a region")
    .argument("<name>", "Region name")
    .option("--level <level>", "Region level (city/state/country)", "state")
    .action(async (name: string, options: { level: string }, command: Command) => {
      const query = {
        city: getBooksReviewedByUsersInCity,
        state: getBooksReviewedByUsersInState,
        country: getBooksReviewedByUsersInCountry,
      }
      if (options.level !== "city" && options.level !== "state" && options.level !== "country") {
        command.error(`error: unknown region level '${options.level}'`)
      }
      const run = query[options.level]

      await withGraph(command, (ctx) => {
        printTitles(ctx, `Books reviewed by users in ${name}`, run(ctx.graph, name))
      })
    })

  program
    .command("age")
    .description("Average age of the reviewers of a title")
    .argument("<title>", "Book title")
    .action(async (title: string, _options: unknown, command: Command) => {
      await withGraph(command, (ctx) => {
        const age = getAverageAgeByBookTitle(ctx.graph, title)
        ctx.logger.log(
          ctx.format === "json" ? JSON.stringify({ title, age }) : `Average age of reviewers of "${title}": ${age.toFixed(2)}`,
        )
      })
    })

  program
    .command("stats")
    .description("Graph and ingestion statistics")
    .action(async (_options: unknown, command: Command) => {
      await withGraph(command, (ctx) => {
        const stats = { ...ctx.graph.stats(), ...ctx.build }
        ctx.logger.log(
          ctx.format === "json"
            ? JSON.stringify(stats, null, 2)
            : Object.entries(stats)
                .map(([key, value]) => `${key}: ${value}`)
                .join("\n"),
        )
      })
    })

  return program
}

/**
 * Run the CLI and resolve to a process exit code.
 * Usage errors are printed by commander; graph and ingestion failures are
 * logged here. Anything else propagates.
 */
export async function main(argv: string[] = process.argv): Promise<number> {
  const logger = createLogger("bookreviews")
  try {
    await createProgram().parseAsync(argv)
    return 0
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode
    }
    if (error instanceof BookReviewsError || error instanceof GraphError) {
      logger.error(error.message)
      return 1
    }
    throw error
  }
}
