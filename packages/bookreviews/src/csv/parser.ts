/**
 * Book Reviews CSV Parser
 *
 * Reads the semicolon-separated, quoted, ISO-8859-1 encoded dataset files.
 * Inside a quoted field, `\"` is a literal quote.
 */

import { readFile } from "fs/promises"
import Papa from "papaparse"
import type { z } from "zod"
import { CsvParseError } from "../errors"
import { createLogger, type Logger } from "../logger"
import { bookRowSchema, bookRatingRowSchema, userRowSchema } from "./records"
import type { Book, BookRating, User, ParseResult } from "./records"

export interface CsvParserOptions {
  /** `fail` throws on the first invalid row, `skip` drops it with a warning */
  onInvalidRow?: "fail" | "skip"
  logger?: Logger
}

/**
 * Paths of the three dataset files.
 */
export interface CsvFiles {
  books: string
  ratings: string
  users: string
}

const PAPA_CONFIG = {
  delimiter: ";",
  quoteChar: '"',
  escapeChar: "\\",
  skipEmptyLines: true,
} as const

/**
 * Decode ISO-8859-1 bytes.
 */
export function decodeLatin1(bytes: Buffer): string {
  return bytes.toString("latin1")
}

export class BookReviewsCsvParser {
  private readonly onInvalidRow: "fail" | "skip"
  private readonly logger: Logger

  constructor(options: CsvParserOptions = {}) {
    this.onInvalidRow = options.onInvalidRow ?? "fail"
    this.logger = options.logger ?? createLogger("csv", { level: "warn" })
  }

  /**
   * Read and parse all three files.
   * @throws CsvParseError if a file is unreadable, or a row is invalid in `fail` mode
   */
  async parse(files: CsvFiles): Promise<ParseResult> {
    const [booksText, ratingsText, usersText] = await Promise.all([
      this.read(files.books),
      this.read(files.ratings),
      this.read(files.users),
    ])

    return {
      books: this.parseBooks(booksText, files.books),
      bookRatings: this.parseBookRatings(ratingsText, files.ratings),
      users: this.parseUsers(usersText, files.users),
    }
  }

  parseBooks(text: string, file = "books"): Book[] {
    return this.parseRows(text, file, bookRowSchema)
  }

  parseBookRatings(text: string, file = "ratings"): BookRating[] {
    return this.parseRows(text, file, bookRatingRowSchema)
  }

  parseUsers(text: string, file = "users"): User[] {
    return this.parseRows(text, file, userRowSchema)
  }

  private async read(file: string): Promise<string> {
    try {
      return decodeLatin1(await readFile(file))
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error))
      throw new CsvParseError(file, undefined, cause.message, cause)
    }
  }

  /**
   * Split text into rows, drop the header and validate the rest.
   * Reported row numbers are 1-based and count the header.
   */
  private parseRows<T>(text: string, file: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T[] {
    const parsed = Papa.parse<string[]>(text, PAPA_CONFIG)

    const malformed = new Map<number, string>()
    for (const issue of parsed.errors) {
      if (issue.row !== undefined) malformed.set(issue.row, issue.message)
    }

    const records: T[] = []
    let skipped = 0

    parsed.data.forEach((fields, index) => {
      if (index === 0) return
      const row = index + 1

      let reason = malformed.get(index)
      let cause: Error | undefined

      if (reason === undefined) {
        const result = schema.safeParse(fields)
        if (result.success) {
          records.push(result.data)
          return
        }
        reason = result.error.errors[0]?.message ?? "invalid row"
        cause = result.error
      }

      if (this.onInvalidRow === "fail") {
        throw new CsvParseError(file, row, reason, cause)
      }
      skipped++
      this.logger.debug("Skipping invalid row", { file, row, reason })
    })

    if (skipped > 0) {
      this.logger.warn(`Skipped ${skipped} invalid row(s)`, { file })
    }
    this.logger.debug("Parsed file", { file, records: records.length })
    return records
  }
}
