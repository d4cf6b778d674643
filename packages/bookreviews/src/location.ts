/**
 * User Locations
 *
 * A location is free text such as "berkeley, california, usa". It is split on
 * commas into trimmed tokens that map onto a city / state / country chain.
 */

/** State token used in the dataset for "no state" */
const NO_STATE = "n/a"

/** Region ids are prefixed so a city can never take a country's id */
export function cityNodeId(tokens: string[]): string {
  return `city:${tokens.join(":")}`
}

export function stateNodeId(state: string, country: string): string {
  return `state:${state}:${country}`
}

export function countryNodeId(country: string): string {
  return `country:${country}`
}

/**
 * Node ids and display names derived from one location string.
 * A level is absent when the tokens cannot identify it.
 */
export interface ParsedLocation {
  tokens: string[]
  city?: { id: string; name: string }
  state?: { id: string; name: string }
  country?: { id: string; name: string }
}

export function parseLocation(location: string): ParsedLocation {
  if (location.trim() === "") return { tokens: [] }

  const tokens = location.split(",").map((token) => token.trim())
  const parsed: ParsedLocation = { tokens }

  const [city, state, country] = tokens
  if (city !== undefined) {
    parsed.city = { id: cityNodeId(tokens), name: city }
  }

  if (tokens.length === 3 && state !== undefined && country !== undefined) {
    parsed.country = { id: countryNodeId(country), name: country }
    if (state !== NO_STATE) {
      parsed.state = { id: stateNodeId(state, country), name: state }
    }
  }

  return parsed
}
