import { describe, it, expect } from "vitest"
import { parseLocation } from "../src"

describe("parseLocation", () => {
  it("should derive city, state and country from three tokens", () => {
    expect(parseLocation("berkeley, california, usa")).toEqual({
      tokens: ["berkeley", "california", "usa"],
      city: { id: "city:berkeley:california:usa", name: "berkeley" },
      state: { id: "state:california:usa", name: "california" },
      country: { id: "country:usa", name: "usa" },
    })
  })

  it("should omit an n/a state but keep the country", () => {
    const location = parseLocation("london, n/a, united kingdom")

    expect(location.city).toEqual({ id: "city:london:n/a:united kingdom", name: "london" })
    expect(location.state).toBeUndefined()
    expect(location.country).toEqual({ id: "country:united kingdom", name: "united kingdom" })
  })

  it("should only derive a city from fewer than three tokens", () => {
    const location = parseLocation("paris, france")

    expect(location.city).toEqual({ id: "city:paris:france", name: "paris" })
    expect(location.state).toBeUndefined()
    expect(location.country).toBeUndefined()
  })

  it("should only derive a city from more than three tokens", () => {
    const location = parseLocation("soho, london, england, united kingdom")

    expect(location.city?.id).toBe("city:soho:london:england:united kingdom")
    expect(location.state).toBeUndefined()
    expect(location.country).toBeUndefined()
  })

  it("should trim tokens", () => {
    expect(parseLocation("  roma ,lazio,  italy ").tokens).toEqual(["roma", "lazio", "italy"])
  })

  it("should keep a one-token city apart from a country of the same name", () => {
    const city = parseLocation("usa").city
    const country = parseLocation("berkeley, california, usa").country

    expect(city?.id).toBe("city:usa")
    expect(country?.id).toBe("country:usa")
  })

  it("should derive nothing from a blank location", () => {
    expect(parseLocation("   ")).toEqual({ tokens: [] })
  })
})
