import { describe, it, expect } from "vitest"
import {
  Graph,
  Property,
  PropertyMissingError,
  PropertyTypeMismatchError,
  InvalidPropertyValueError,
  type PropertyValue,
} from "../src"

describe("Property", () => {
  it("should build tagged values", () => {
    expect(Property.string("Dracula")).toEqual({ kind: "string", value: "Dracula" })
    expect(Property.integer(7)).toEqual({ kind: "integer", value: 7 })
    expect(Property.float(7.5)).toEqual({ kind: "float", value: 7.5 })
  })

  it("should reject non-integers as integers", () => {
    expect(() => Property.integer(1.5)).toThrow(InvalidPropertyValueError)
  })

  it("should reject non-finite floats", () => {
    expect(() => Property.float(Number.NaN)).toThrow(InvalidPropertyValueError)
    expect(() => Property.float(Number.POSITIVE_INFINITY)).toThrow(InvalidPropertyValueError)
  })
})

describe("GraphElement property bag", () => {
  const build = () => {
    const graph = new Graph()
    const book = graph.addNode("0001", "book")
    book.setProperty("title", Property.string("Dracula"))
    book.setProperty("year", Property.integer(1897))
    book.setProperty("score", Property.float(8.25))
    return book
  }

  it("should return stored values through typed accessors", () => {
    const book = build()

    expect(book.getString("title")).toBe("Dracula")
    expect(book.getInteger("year")).toBe(1897)
    expect(book.getFloat("score")).toBe(8.25)
    expect(book.getNumber("year")).toBe(1897)
    expect(book.getNumber("score")).toBe(8.25)
  })

  it("should replace a value under an existing key", () => {
    const book = build()
    book.setProperty("title", Property.string("Carmilla"))

    expect(book.getString("title")).toBe("Carmilla")
    expect(book.propertyKeys()).toEqual(["title", "year", "score"])
  })

  it("should fail on a missing key", () => {
    const book = build()

    expect(() => book.getString("isbn")).toThrow(PropertyMissingError)
    expect(() => book.getNumber("age")).toThrow("Property 'age' is missing on book '0001'")
  })

  it("should fail on a wrong kind", () => {
    const book = build()

    expect(() => book.getInteger("title")).toThrow(PropertyTypeMismatchError)
    expect(() => book.getFloat("year")).toThrow("Property 'year' is integer, expected float")
    expect(() => book.getNumber("title")).toThrow("Property 'title' is string, expected number")
  })

  it("should return undefined from find accessors for missing keys only", () => {
    const book = build()

    expect(book.findString("isbn")).toBeUndefined()
    expect(book.findNumber("age")).toBeUndefined()
    expect(book.findString("title")).toBe("Dracula")
    expect(() => book.findNumber("title")).toThrow(PropertyTypeMismatchError)
    expect(() => book.findString("year")).toThrow(PropertyTypeMismatchError)
  })

  it("should reject hand-built malformed values", () => {
    const book = build()
    const malformed: PropertyValue = { kind: "integer", value: 2.5 }

    expect(() => book.setProperty("year", malformed)).toThrow(InvalidPropertyValueError)
    expect(book.getInteger("year")).toBe(1897)
  })

  it("should expose a plain record", () => {
    const book = build()

    expect(book.toRecord()).toEqual({ title: "Dracula", year: 1897, score: 8.25 })
    expect(book.hasProperty("title")).toBe(true)
    expect(book.getProperty("missing")).toBeUndefined()
  })

  it("should type edge properties the same way", () => {
    const graph = new Graph()
    graph.addNode("u1", "user")
    graph.addNode("b1", "book")
    const edge = graph.addEdge("reviewed", "u1", "b1").setProperty("rating", Property.integer(9))

    expect(edge.getInteger("rating")).toBe(9)
    expect(() => edge.getString("rating")).toThrow(PropertyTypeMismatchError)
    expect(() => edge.getInteger("comment")).toThrow("Property 'comment' is missing on edge u1-[reviewed]->b1")
  })
})
