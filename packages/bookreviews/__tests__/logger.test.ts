import { describe, it, expect, vi, afterEach } from "vitest"
import { createLogger } from "../src"

describe("Logger", () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it("should prefix level and context and append data", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {})

    createLogger("graph").warn("Skipped records", { books: 1 })

    expect(warn).toHaveBeenCalledWith('[warn] (graph) Skipped records {"books":1}')
  })

  it("should drop messages below the level", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {})
    const logger = createLogger("csv", { level: "warn" })

    logger.debug("Parsed file")
    logger.info("Graph built")

    expect(log).not.toHaveBeenCalled()
  })

  it("should nest child contexts and keep the level", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {})
    const log = vi.spyOn(console, "log").mockImplementation(() => {})
    const child = createLogger("bookreviews", { level: "error" }).child("csv")

    child.info("hidden")
    child.error("Broken row")

    expect(log).not.toHaveBeenCalled()
    expect(error).toHaveBeenCalledWith("[error] (bookreviews:csv) Broken row")
  })

  it("should print plain report text unless silent", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {})

    createLogger(undefined, { level: "error" }).log("Top 1 authors")
    createLogger("quiet", { silent: true }).log("never")

    expect(log).toHaveBeenCalledTimes(1)
    expect(log).toHaveBeenCalledWith("Top 1 authors")
  })
})
