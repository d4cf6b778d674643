/**
 * Book Review Error Types
 */

/**
 * Base error for ingestion, configuration and reporting failures.
 */
export class BookReviewsError extends Error {
  public override readonly cause?: Error

  constructor(message: string, cause?: Error) {
    super(message)
    this.name = "BookReviewsError"
    this.cause = cause
  }
}

/**
 * Error when a CSV file cannot be read or one of its rows is invalid.
 */
export class CsvParseError extends BookReviewsError {
  constructor(
    public readonly file: string,
    public readonly row: number | undefined,
    message: string,
    cause?: Error,
  ) {
    super(row === undefined ? `Error parsing ${file}: ${message}` : `Error parsing ${file} row ${row}: ${message}`, cause)
    this.name = "CsvParseError"
  }
}

/**
 * Error when configuration values are invalid.
 */
export class ConfigError extends BookReviewsError {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`)
    this.name = "ConfigError"
  }
}
