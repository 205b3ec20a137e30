import { describe, expect, it } from "@effect/vitest"
import { Effect, pipe } from "effect"

import * as Admin from "../../src/app/admin.js"
import { castVote } from "../../src/app/admission.js"
import type { VoteOutcome } from "../../src/core/domain.js"
import { addEntrants, draft, failingIncrement, makeHarness } from "./test-utils.js"

const descriptors: ReadonlyArray<unknown> = [
  { nombre: "Ana", categoria: "Dance" },
  { name: " Bruno ", category: "Song", photo_url: "bruno.png" },
  { name: "", category: "Song" },
  { name: "No category" },
  "not an object"
]

describe("reinitialize", () => {
  it.effect("loads valid descriptors with zero votes and drops the rest", () =>
    Effect.gen(function*(_) {
      const harness = yield* _(makeHarness())

      const loaded = yield* _(Effect.provide(Admin.reinitialize(descriptors), harness.context))
      const rows = yield* _(Effect.provide(Admin.dashboard, harness.context))

      expect(loaded).toBe(2)
      expect(rows.map(({ category, name, photo, totalVotes }) => ({ name, category, photo, totalVotes }))).toEqual([
        { name: "Ana", category: "Dance", photo: "default.png", totalVotes: 0 },
        { name: "Bruno", category: "Song", photo: "bruno.png", totalVotes: 0 }
      ])
    }))

  it.effect("clears the ledger, the counters and the previous catalog", () =>
    Effect.gen(function*(_) {
      const harness = yield* _(makeHarness())
      const { catalog, counters, ledger } = harness.runtime.stores
      const [old] = yield* _(addEntrants(catalog, [draft("Old", "Dance")]))
      if (!old) {
        return yield* _(Effect.die("entrant was not created"))
      }
      yield* _(Effect.provide(castVote("u1", old), harness.context))

      yield* _(Effect.provide(Admin.reinitialize(descriptors), harness.context))

      expect(yield* _(ledger.countByEntrant)).toEqual({})
      expect(yield* _(counters.systemTotal)).toBe(0)
      expect(yield* _(catalog.byId(old))).toBeNull()
      const again = yield* _(Effect.provide(castVote("u1", old), harness.context))
      expect(again).toEqual({ kind: "rejected", reason: "UnknownEntrant" })
    }))

  it.effect("a vote arriving right after the catalog is cleared leaves counters equal to the ledger", () =>
    Effect.gen(function*(_) {
      const lateOutcomes: Array<VoteOutcome> = []
      let lateVote: Effect.Effect<VoteOutcome> = Effect.die("late vote is not wired")
      const harness = yield* _(
        makeHarness((stores) => ({
          ...stores,
          catalog: {
            ...stores.catalog,
            clearAll: pipe(
              stores.catalog.clearAll,
              Effect.zipRight(Effect.suspend(() => lateVote)),
              Effect.tap((outcome) => Effect.sync(() => lateOutcomes.push(outcome))),
              Effect.asVoid
            )
          }
        }))
      )
      const { catalog, counters, ledger } = harness.runtime.stores
      const [old] = yield* _(addEntrants(catalog, [draft("Old", "Dance")]))
      if (!old) {
        return yield* _(Effect.die("entrant was not created"))
      }
      yield* _(Effect.provide(castVote("u1", old), harness.context))
      lateVote = Effect.provide(castVote("late", old), harness.context)

      yield* _(Effect.provide(Admin.reinitialize([{ name: "Ana", category: "Dance" }]), harness.context))

      expect(lateOutcomes).toEqual([{ kind: "rejected", reason: "UnknownEntrant" }])
      expect(yield* _(ledger.countByEntrant)).toEqual({})
      expect(yield* _(counters.allTotals)).toEqual({})
      expect(yield* _(counters.systemTotal)).toBe(0)
    }))

  it.effect("a vote whose entrant is cleared between lookup and insert is not recorded", () =>
    Effect.gen(function*(_) {
      const harness = yield* _(
        makeHarness((stores) => ({
          ...stores,
          catalog: {
            ...stores.catalog,
            byId: (id) => Effect.tap(stores.catalog.byId(id), () => stores.catalog.clearAll)
          }
        }))
      )
      const { catalog, counters, ledger } = harness.runtime.stores
      const [old] = yield* _(addEntrants(catalog, [draft("Old", "Dance")]))
      if (!old) {
        return yield* _(Effect.die("entrant was not created"))
      }

      const outcome = yield* _(Effect.provide(castVote("u1", old), harness.context))

      expect(outcome).toEqual({ kind: "failed", reason: "StorageError" })
      expect(yield* _(ledger.countByEntrant)).toEqual({})
      expect(yield* _(counters.systemTotal)).toBe(0)
    }))
})

describe("addEntrant", () => {
  it.effect("stores trimmed fields", () =>
    Effect.gen(function*(_) {
      const harness = yield* _(makeHarness())

      const id = yield* _(
        Effect.provide(Admin.addEntrant({ name: "  Ana ", category: " Dance", photo: "ana.png" }), harness.context)
      )

      expect(yield* _(harness.runtime.stores.catalog.byId(id))).toEqual({
        id,
        name: "Ana",
        category: "Dance",
        photo: "ana.png"
      })
    }))

  it.effect("refuses a blank name", () =>
    Effect.gen(function*(_) {
      const harness = yield* _(makeHarness())

      const error = yield* _(
        Effect.flip(Effect.provide(Admin.addEntrant({ name: " ", category: "Dance", photo: "x.png" }), harness.context))
      )

      expect(error._tag).toBe("InvalidEntrant")
      expect(error.message).toBe("name and category are required")
      expect(yield* _(harness.runtime.stores.catalog.all)).toEqual([])
    }))
})

describe("reports", () => {
  it.effect("list zero-vote entrants and category totals", () =>
    Effect.gen(function*(_) {
      const harness = yield* _(makeHarness())
      const [a, b, c] = yield* _(
        addEntrants(harness.runtime.stores.catalog, [
          draft("Ana", "Dance"),
          draft("Bruno", "Song"),
          draft("Caro", "Dance")
        ])
      )
      if (!a || !b || !c) {
        return yield* _(Effect.die("entrants were not created"))
      }
      for (const [voter, entrant] of [["u1", a], ["u2", a], ["u1", b]] as const) {
        yield* _(Effect.provide(castVote(voter, entrant), harness.context))
      }

      const zeros = yield* _(Effect.provide(Admin.zeroVoteEntrants, harness.context))
      const stats = yield* _(Effect.provide(Admin.systemStats, harness.context))
      const podium = yield* _(Effect.provide(Admin.top3, harness.context))

      expect(zeros.map((row) => row.id)).toEqual([c])
      expect(stats).toEqual({ systemTotal: 3, votesByCategory: { Dance: 2, Song: 1 } })
      expect(podium.map((row) => row.name)).toEqual(["Ana", "Bruno", "Caro"])
    }))

  it.effect("public listing carries only entrant fields", () =>
    Effect.gen(function*(_) {
      const harness = yield* _(makeHarness())
      const [a] = yield* _(addEntrants(harness.runtime.stores.catalog, [draft("Ana", "Dance")]))

      const listing = yield* _(Effect.provide(Admin.publicEntrantList, harness.context))

      expect(listing).toEqual([{ id: a, name: "Ana", category: "Dance", photo: "default.png" }])
    }))
})

describe("reconcile", () => {
  it.effect("rebuilds counters from the ledger after a failed increment", () =>
    Effect.gen(function*(_) {
      const flakyFor = new Set<string>()
      const harness = yield* _(
        makeHarness((stores) => ({
          ...stores,
          counters: failingIncrement(stores.counters, (entrantId) => flakyFor.has(entrantId))
        }))
      )
      const [a, b] = yield* _(addEntrants(harness.runtime.stores.catalog, [draft("Ana", "Dance"), draft("Bruno", "Song")]))
      if (!a || !b) {
        return yield* _(Effect.die("entrants were not created"))
      }
      flakyFor.add(a)

      const drifted = yield* _(Effect.provide(castVote("u1", a), harness.context))
      yield* _(Effect.provide(castVote("u1", b), harness.context))
      expect(drifted).toEqual({ kind: "accepted", entrantId: a, tally: { kind: "drift" } })
      expect(yield* _(harness.runtime.stores.counters.totalFor(a))).toBe(0)

      const report = yield* _(Effect.provide(Admin.reconcile, harness.context))

      expect(report).toEqual({
        changed: [{ entrantId: a, before: 0, after: 1 }],
        flagged: [a],
        systemTotal: 2
      })
      expect(yield* _(harness.runtime.stores.counters.totalFor(a))).toBe(1)
      expect(yield* _(harness.runtime.stores.counters.systemTotal)).toBe(2)
      expect(yield* _(harness.runtime.drift.flagged)).toEqual([])
    }))

  it.effect("leaves entrants flagged during the run in the registry", () =>
    Effect.gen(function*(_) {
      let duringRead: Effect.Effect<void> = Effect.void
      const harness = yield* _(
        makeHarness((stores) => ({
          ...stores,
          ledger: {
            ...stores.ledger,
            countByEntrant: Effect.zipLeft(stores.ledger.countByEntrant, Effect.suspend(() => duringRead))
          }
        }))
      )
      const [a, b] = yield* _(addEntrants(harness.runtime.stores.catalog, [draft("Ana", "Dance"), draft("Bruno", "Song")]))
      if (!a || !b) {
        return yield* _(Effect.die("entrants were not created"))
      }
      yield* _(harness.runtime.drift.flag(a))
      duringRead = harness.runtime.drift.flag(b)

      const report = yield* _(Effect.provide(Admin.reconcile, harness.context))

      expect(report.flagged).toEqual([a])
      expect(yield* _(harness.runtime.drift.flagged)).toEqual([b])
    }))
})
