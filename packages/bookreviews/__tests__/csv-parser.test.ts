import { describe, it, expect, vi, afterEach } from "vitest"
import { join } from "path"
import { fileURLToPath } from "url"
import { BookReviewsCsvParser, BookReviewsGraph, CsvParseError, createLogger, decodeLatin1, userNodeId } from "../src"

const fixtures = fileURLToPath(new URL("./fixtures", import.meta.url))
const silent = createLogger("test", { silent: true })

const files = {
  books: join(fixtures, "BX-Books.csv"),
  ratings: join(fixtures, "BX-Book-Ratings.csv"),
  users: join(fixtures, "BX-Users.csv"),
}

describe("BookReviewsCsvParser", () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  describe("row parsing", () => {
    const parser = new BookReviewsCsvParser({ logger: silent })

    it("should skip the header and read book columns", () => {
      const text = '"ISBN";"Title";"Author";"Year";"Publisher"\n"0001";"Dracula";"Bram Stoker";"1897";"Archibald Constable"\n'

      expect(parser.parseBooks(text)).toEqual([
        { isbn: "0001", title: "Dracula", author: "Bram Stoker", yearOfPublication: 1897, publisher: "Archibald Constable" },
      ])
    })

    it("should keep separators inside quotes and unescape quotes", () => {
      const text = 'h\n"0003";"Emma; A Novel";"Jane Austen";"1815";"John Murray"\n"0004";"The \\"Lair\\"";"Bram Stoker";"1911";"Penguin"\n'

      const books = parser.parseBooks(text)
      expect(books.map((b) => b.title)).toEqual(["Emma; A Novel", 'The "Lair"'])
    })

    it("should accept CRLF line endings and a missing final newline", () => {
      const text = 'h\r\n"1";"0001";"7"\r\n"2";"0002";"8"'

      expect(parser.parseBookRatings(text)).toEqual([
        { userId: "1", isbn: "0001", rating: 7 },
        { userId: "2", isbn: "0002", rating: 8 },
      ])
    })

    it("should read NULL as a missing age", () => {
      const text = 'h\n"1";"berkeley, california, usa";"20"\n"3";"london, n/a, united kingdom";NULL\n'

      expect(parser.parseUsers(text)).toEqual([
        { userId: "1", location: "berkeley, california, usa", age: 20 },
        { userId: "3", location: "london, n/a, united kingdom", age: undefined },
      ])
    })

    it("should ignore blank lines", () => {
      const text = 'h\n\n"1";"0001";"7"\n\n'

      expect(parser.parseBookRatings(text)).toHaveLength(1)
    })
  })

  describe("invalid rows", () => {
    const text = 'h\n"1";"0001";"7"\n"2";"0002";"x"\n"3";"0003"\n"4";"0004";"9"\n'

    it("should fail on the first invalid row by default", () => {
      const parser = new BookReviewsCsvParser({ logger: silent })

      expect(() => parser.parseBookRatings(text, "ratings.csv")).toThrow(CsvParseError)
      expect(() => parser.parseBookRatings(text, "ratings.csv")).toThrow(
        "Error parsing ratings.csv row 3: Expected an integer",
      )
    })

    it("should report the row of a short record", () => {
      const parser = new BookReviewsCsvParser({ logger: silent })
      const short = 'h\n"3";"0003"\n'

      try {
        parser.parseBookRatings(short, "ratings.csv")
        expect.unreachable()
      } catch (error) {
        expect(error).toBeInstanceOf(CsvParseError)
        expect(error).toMatchObject({ file: "ratings.csv", row: 2 })
      }
    })

    it("should drop invalid rows and warn in skip mode", () => {
      const logger = createLogger("test")
      const warn = vi.spyOn(console, "warn").mockImplementation(() => {})
      const parser = new BookReviewsCsvParser({ onInvalidRow: "skip", logger })

      const ratings = parser.parseBookRatings(text, "ratings.csv")

      expect(ratings.map((r) => r.userId)).toEqual(["1", "4"])
      expect(warn).toHaveBeenCalledWith('[warn] (test) Skipped 2 invalid row(s) {"file":"ratings.csv"}')
    })
  })

  describe("integer range", () => {
    const users = 'h\n"1";"berkeley, california, usa";"99999999999999999999"\n"2";"roma, lazio, italy";"30"\n'
    const books = 'h\n"0001";"Dracula";"Bram Stoker";"18970000000000000000";"Constable"\n'

    it("should reject an age beyond the safe integer range", () => {
      const parser = new BookReviewsCsvParser({ logger: silent })

      expect(() => parser.parseUsers(users, "users.csv")).toThrow("Error parsing users.csv row 2: Integer out of range")
    })

    it("should reject a year beyond the safe integer range", () => {
      const parser = new BookReviewsCsvParser({ logger: silent })

      expect(() => parser.parseBooks(books, "books.csv")).toThrow("Error parsing books.csv row 2: Integer out of range")
    })

    it("should skip out-of-range rows so the graph still loads", () => {
      const parser = new BookReviewsCsvParser({ onInvalidRow: "skip", logger: silent })

      const parsedUsers = parser.parseUsers(users, "users.csv")
      expect(parsedUsers).toEqual([{ userId: "2", location: "roma, lazio, italy", age: 30 }])
      expect(parser.parseBooks(books, "books.csv")).toEqual([])

      const graph = new BookReviewsGraph({ logger: silent })
      const report = graph.load({ books: [], bookRatings: [], users: parsedUsers })

      expect(report.users).toBe(1)
      expect(graph.hasNode(userNodeId("1"))).toBe(false)
      expect(graph.getNodeOrFail(userNodeId("2")).getInteger("age")).toBe(30)
    })
  })

  describe("files", () => {
    it("should decode ISO-8859-1 bytes", () => {
      expect(decodeLatin1(Buffer.from([0x43, 0x61, 0x66, 0xe9]))).toBe("Café")
    })

    it("should parse the three dataset files", async () => {
      const parser = new BookReviewsCsvParser({ logger: silent })
      const result = await parser.parse(files)

      expect(result.books).toHaveLength(5)
      expect(result.bookRatings).toHaveLength(7)
      expect(result.users).toHaveLength(5)

      expect(result.books[3]?.title).toBe('The "Lair" of the White Worm')
      expect(result.books[4]).toEqual({
        isbn: "0005",
        title: "Café Stories",
        author: "Lucía Ortega",
        yearOfPublication: 2000,
        publisher: "Penguin",
      })
      expect(result.users[4]).toEqual({ userId: "5", location: "nowhere", age: undefined })
    })

    it("should wrap an unreadable file", async () => {
      const parser = new BookReviewsCsvParser({ logger: silent })
      const missing = join(fixtures, "missing.csv")

      await expect(parser.parse({ ...files, users: missing })).rejects.toThrow(CsvParseError)
      await expect(parser.parse({ ...files, users: missing })).rejects.toThrow(`Error parsing ${missing}:`)
    })
  })
})
