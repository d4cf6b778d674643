import { describe, it, expect } from "vitest"
import * as path from "path"
import { ConfigError, dataFiles, loadConfig } from "../src"

describe("loadConfig", () => {
  it("should apply defaults", () => {
    expect(loadConfig({}, {})).toEqual({
      dataDir: "data",
      booksFile: "BX-Books.csv",
      ratingsFile: "BX-Book-Ratings.csv",
      usersFile: "BX-Users.csv",
      top: 10,
      onInvalidRow: "fail",
      indexTitles: true,
      debug: false,
    })
  })

  it("should read environment variables", () => {
    const config = loadConfig(
      {},
      {
        BOOKREVIEWS_DATA_DIR: "/srv/books",
        BOOKREVIEWS_TOP: "3",
        BOOKREVIEWS_ON_INVALID_ROW: "skip",
        BOOKREVIEWS_INDEX_TITLES: "off",
        BOOKREVIEWS_DEBUG: "yes",
      },
    )

    expect(config).toMatchObject({
      dataDir: "/srv/books",
      top: 3,
      onInvalidRow: "skip",
      indexTitles: false,
      debug: true,
    })
  })

  it("should prefer overrides to the environment", () => {
    const config = loadConfig({ top: 5, dataDir: undefined }, { BOOKREVIEWS_TOP: "3", BOOKREVIEWS_DATA_DIR: "env" })

    expect(config.top).toBe(5)
    expect(config.dataDir).toBe("env")
  })

  it("should ignore empty environment variables", () => {
    expect(loadConfig({}, { BOOKREVIEWS_TOP: "" }).top).toBe(10)
  })

  it("should list every invalid setting", () => {
    try {
      loadConfig({}, { BOOKREVIEWS_TOP: "0", BOOKREVIEWS_ON_INVALID_ROW: "ignore" })
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError)
      if (!(error instanceof ConfigError)) return
      expect(error.issues).toHaveLength(2)
      expect(error.issues[0]).toMatch(/^top: /)
      expect(error.issues[1]).toMatch(/^onInvalidRow: /)
      expect(error.message).toMatch(/^Invalid configuration: top: .+; onInvalidRow: /)
    }
  })

  it("should reject an unrecognized flag value", () => {
    expect(() => loadConfig({}, { BOOKREVIEWS_DEBUG: "maybe" })).toThrow(ConfigError)
  })
})

describe("dataFiles", () => {
  it("should resolve the three files in the data directory", () => {
    const config = loadConfig({ dataDir: "/srv/books", usersFile: "users.csv" }, {})

    expect(dataFiles(config)).toEqual({
      books: path.join("/srv/books", "BX-Books.csv"),
      ratings: path.join("/srv/books", "BX-Book-Ratings.csv"),
      users: path.join("/srv/books", "users.csv"),
    })
  })

  it("should resolve a relative directory against the working directory", () => {
    const config = loadConfig({ dataDir: "data" }, {})

    expect(dataFiles(config).books).toBe(path.join(process.cwd(), "data", "BX-Books.csv"))
  })
})
