export { BookReviewsCsvParser, decodeLatin1 } from "./parser"
export type { CsvParserOptions, CsvFiles } from "./parser"
export { bookRowSchema, bookRatingRowSchema, userRowSchema } from "./records"
export type { Book, BookRating, User, ParseResult } from "./records"
