/**
 * CSV Record Schemas
 *
 * Each schema turns one raw row (an array of field strings) into a record.
 * Extra trailing columns (cover image URLs in the books file) are ignored.
 */

import { z } from "zod"

const integerText = z
  .string()
  .trim()
  .regex(/^-?\d+$/, "Expected an integer")
  .transform((value) => Number.parseInt(value, 10))
  .refine(Number.isSafeInteger, "Integer out of range")

/** `NULL` marks an unknown age */
const optionalIntegerText = z.union([z.literal("NULL").transform(() => undefined), integerText])

export const bookRowSchema = z
  .tuple([z.string(), z.string(), z.string(), integerText, z.string()])
  .rest(z.string())
  .transform(([isbn, title, author, yearOfPublication, publisher]) => ({
    isbn,
    title,
    author,
    yearOfPublication,
    publisher,
  }))

export const bookRatingRowSchema = z
  .tuple([z.string(), z.string(), integerText])
  .rest(z.string())
  .transform(([userId, isbn, rating]) => ({ userId, isbn, rating }))

export const userRowSchema = z
  .tuple([z.string(), z.string(), optionalIntegerText])
  .rest(z.string())
  .transform(([userId, location, age]) => ({ userId, location, age }))

export type Book = z.infer<typeof bookRowSchema>
export type BookRating = z.infer<typeof bookRatingRowSchema>
export type User = z.infer<typeof userRowSchema>

/**
 * Records of the three input files.
 */
export interface ParseResult {
  books: Book[]
  bookRatings: BookRating[]
  users: User[]
}
