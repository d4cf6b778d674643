/**
 * Configuration
 *
 * Loads settings from, in increasing precedence:
 * - built-in defaults
 * - environment variables (BOOKREVIEWS_*)
 * - explicit overrides (CLI options)
 */

import * as path from "path"
import { z } from "zod"
import { ConfigError } from "./errors"

// =============================================================================
// SCHEMA
// =============================================================================

export const configSchema = z.object({
  /** Directory holding the three CSV files */
  dataDir: z.string().min(1).default("data"),
  booksFile: z.string().min(1).default("BX-Books.csv"),
  ratingsFile: z.string().min(1).default("BX-Book-Ratings.csv"),
  usersFile: z.string().min(1).default("BX-Users.csv"),
  /** Length of ranked lists in reports */
  top: z.coerce.number().int().positive().default(10),
  /** What to do with a row that fails validation */
  onInvalidRow: z.enum(["fail", "skip"]).default("fail"),
  /** Declare a property index on book titles */
  indexTitles: z.boolean().default(true),
  debug: z.boolean().default(false),
})

export type BookReviewsConfig = z.infer<typeof configSchema>
export type BookReviewsConfigInput = z.input<typeof configSchema>

/**
 * Environment variable for each setting.
 */
const ENV_KEYS = {
  dataDir: "BOOKREVIEWS_DATA_DIR",
  top: "BOOKREVIEWS_TOP",
  onInvalidRow: "BOOKREVIEWS_ON_INVALID_ROW",
  indexTitles: "BOOKREVIEWS_INDEX_TITLES",
  debug: "BOOKREVIEWS_DEBUG",
} as const

const FLAG_KEYS = new Set<string>(["indexTitles", "debug"])

// =============================================================================
// LOADING
// =============================================================================

/**
 * Read a boolean flag. Unrecognized text is passed through for the schema to reject.
 */
function parseFlag(value: string): boolean | string {
  const normalized = value.trim().toLowerCase()
  if (["1", "true", "yes", "on"].includes(normalized)) return true
  if (["0", "false", "no", "off"].includes(normalized)) return false
  return value
}

function fromEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const values: Record<string, unknown> = {}
  for (const [key, variable] of Object.entries(ENV_KEYS)) {
    const raw = env[variable]
    if (raw === undefined || raw === "") continue
    values[key] = FLAG_KEYS.has(key) ? parseFlag(raw) : raw
  }
  return values
}

function defined(overrides: BookReviewsConfigInput): Record<string, unknown> {
  return Object.fromEntries(Object.entries(overrides).filter(([, value]) => value !== undefined))
}

/**
 * Build the effective configuration.
 * @throws ConfigError listing every invalid setting
 */
export function loadConfig(
  overrides: BookReviewsConfigInput = {},
  env: NodeJS.ProcessEnv = process.env,
): BookReviewsConfig {
  const result = configSchema.safeParse({ ...fromEnv(env), ...defined(overrides) })
  if (!result.success) {
    throw new ConfigError(result.error.errors.map((issue) => `${issue.path.join(".")}: ${issue.message}`))
  }
  return result.data
}

/**
 * Absolute paths of the three input files.
 */
export function dataFiles(config: BookReviewsConfig): { books: string; ratings: string; users: string } {
  const dir = path.resolve(config.dataDir)
  return {
    books: path.join(dir, config.booksFile),
    ratings: path.join(dir, config.ratingsFile),
    users: path.join(dir, config.usersFile),
  }
}
