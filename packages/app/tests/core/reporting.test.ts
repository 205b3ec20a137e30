import { describe, expect, it } from "@effect/vitest"

import { dashboard, systemStats, top3, votesByCategory, zeroVoteEntrants } from "../../src/core/reporting.js"
import { entrant } from "./property-helpers.js"

const ana = entrant("a", "Ana", "Dance")
const bruno = entrant("b", "Bruno", "Song")
const caro = entrant("c", "Caro", "Dance")
const dani = entrant("d", "Dani", "Song")

describe("reporting", () => {
  it("defaults missing counters to zero", () => {
    const rows = dashboard([ana, bruno], { a: 2 })

    expect(rows).toEqual([
      { ...ana, totalVotes: 2 },
      { ...bruno, totalVotes: 0 }
    ])
  })

  it("top3 breaks ties by catalog order", () => {
    const rows = dashboard([ana, bruno, caro, dani], { a: 1, b: 3, c: 1, d: 1 })

    expect(top3(rows).map((row) => row.id)).toEqual(["b", "a", "c"])
  })

  it("top3 of a short catalog returns everyone", () => {
    expect(top3(dashboard([ana], {})).map((row) => row.id)).toEqual(["a"])
    expect(top3([])).toEqual([])
  })

  it("zero-vote entrants keep catalog order", () => {
    const rows = dashboard([ana, bruno, caro], { b: 1 })

    expect(zeroVoteEntrants(rows).map((row) => row.id)).toEqual(["a", "c"])
  })

  it("groups totals by category", () => {
    const rows = dashboard([ana, bruno, caro, dani], { a: 1, b: 2, c: 4 })

    expect(votesByCategory(rows)).toEqual({ Dance: 5, Song: 2 })
    expect(systemStats(rows, 7)).toEqual({ systemTotal: 7, votesByCategory: { Dance: 5, Song: 2 } })
  })
})
