import { randomUUID } from "node:crypto"

import * as S from "@effect/schema/Schema"
import { asc, eq } from "drizzle-orm"
import { Context, Data, Effect, Either, pipe, Ref } from "effect"

import { EntrantId } from "../core/brand.js"
import type { Entrant, EntrantDraft, VoteRecord } from "../core/domain.js"
import { logCorruptEntrant } from "../core/text.js"
import { entrantsTable, votesTable } from "./db/schema.js"
import { formatErrorMessage, makeDbRunner } from "./db-runner.js"
import type { ContestDatabase } from "./drizzle.js"

export class CatalogError extends Data.TaggedError("CatalogError")<{
  readonly message: string
}> {}

export type EntrantCatalogShape = {
  readonly add: (draft: EntrantDraft) => Effect.Effect<EntrantId, CatalogError>
  readonly all: Effect.Effect<ReadonlyArray<Entrant>, CatalogError>
  readonly byId: (id: EntrantId) => Effect.Effect<Entrant | null, CatalogError>
  /** Removes every entrant together with the votes that reference them. */
  readonly clearAll: Effect.Effect<void, CatalogError>
}

export class EntrantCatalog extends Context.Tag("EntrantCatalog")<
  EntrantCatalog,
  EntrantCatalogShape
>() {}

const entrantRowSchema = S.Struct({
  id: S.String,
  name: S.Trim.pipe(S.nonEmptyString()),
  category: S.Trim.pipe(S.nonEmptyString()),
  photo: S.String
})

export type CorruptEntrant = {
  readonly id: string
  readonly detail: string
}

export type DecodedEntrants = {
  readonly entrants: ReadonlyArray<Entrant>
  readonly corrupt: ReadonlyArray<CorruptEntrant>
}

const decodeRow = S.decodeUnknownEither(entrantRowSchema)

const rowIdOf = (row: unknown): string => {
  if (typeof row === "object" && row !== null && "id" in row) {
    return String(row.id)
  }
  return "unknown"
}

// CHANGE: decode persisted entrant rows one at a time
// WHY: rows written under an older schema must not take the whole listing down
// QUOTE(TZ): "Malformed persisted records ... are skipped with a warning rather than aborting the whole read"
// REF: contest-tally-catalog
// SOURCE: n/a
// FORMAT THEOREM: forall rows: |entrants| + |corrupt| = |rows|
// PURITY: SHELL
// INVARIANT: decoded entrants keep row order
// COMPLEXITY: O(n)/O(n)
export const decodeEntrantRows = (rows: ReadonlyArray<unknown>): DecodedEntrants => {
  const entrants: Array<Entrant> = []
  const corrupt: Array<CorruptEntrant> = []
  for (const row of rows) {
    Either.match(decodeRow(row), {
      onLeft: (error) => {
        corrupt.push({ id: rowIdOf(row), detail: error.message })
      },
      onRight: (decoded) => {
        entrants.push({
          id: EntrantId(decoded.id),
          name: decoded.name,
          category: decoded.category,
          photo: decoded.photo
        })
      }
    })
  }
  return { entrants, corrupt }
}

const logCorrupt = (corrupt: ReadonlyArray<CorruptEntrant>): Effect.Effect<void> =>
  Effect.forEach(corrupt, (entry) => Effect.logWarning(logCorruptEntrant(entry.id, entry.detail)), {
    discard: true
  })

const uuidPattern = /^[\da-f]{8}-[\da-f]{4}-[\da-f]{4}-[\da-f]{4}-[\da-f]{12}$/i

export const isEntrantKey = (id: string): boolean => uuidPattern.test(id)

const toCatalogError = (error: Error | string): CatalogError =>
  new CatalogError({ message: formatErrorMessage(error) })

const runDb = makeDbRunner(toCatalogError)

// CHANGE: keep the entrant catalog in Postgres
// WHY: entrants outlive the process; ids are assigned by the database
// QUOTE(TZ): "add(entrant) -> entrantID (identity assigned by the store)"
// REF: contest-tally-catalog
// SOURCE: n/a
// FORMAT THEOREM: forall d: byId(add(d)) = d ∪ {id}
// PURITY: SHELL
// EFFECT: Effect<EntrantCatalogShape, never, never>
// INVARIANT: a malformed id is an unknown entrant, not a query error; clearAll deletes votes and entrants in one transaction
// COMPLEXITY: O(n)/O(n)
export const makeDrizzleEntrantCatalog = (db: ContestDatabase): EntrantCatalogShape => ({
  add: (draft) =>
    pipe(
      runDb(() =>
        db
          .insert(entrantsTable)
          .values({ name: draft.name, category: draft.category, photo: draft.photo })
          .returning({ id: entrantsTable.id })
      ),
      Effect.flatMap((rows) => {
        const row = rows[0]
        return row
          ? Effect.succeed(EntrantId(row.id))
          : Effect.fail(new CatalogError({ message: "Entrant insert returned no id" }))
      })
    ),
  all: pipe(
    runDb(() => db.select().from(entrantsTable).orderBy(asc(entrantsTable.seq))),
    Effect.map(decodeEntrantRows),
    Effect.tap((decoded) => logCorrupt(decoded.corrupt)),
    Effect.map((decoded) => decoded.entrants)
  ),
  byId: (id) =>
    isEntrantKey(id)
      ? pipe(
        runDb(() => db.select().from(entrantsTable).where(eq(entrantsTable.id, id)).limit(1)),
        Effect.map(decodeEntrantRows),
        Effect.tap((decoded) => logCorrupt(decoded.corrupt)),
        Effect.map((decoded) => decoded.entrants[0] ?? null)
      )
      : Effect.succeed(null),
  clearAll: runDb(() =>
    db.transaction(async (tx) => {
      await tx.delete(votesTable)
      await tx.delete(entrantsTable)
    })
  )
})

// Entrants and the votes that reference them, held in one Ref.
export type MemoryContest = {
  readonly entrants: ReadonlyArray<Entrant>
  readonly votes: ReadonlyMap<string, VoteRecord>
}

export const emptyContest: MemoryContest = { entrants: [], votes: new Map() }

// CHANGE: provide an in-memory catalog
// WHY: tests need the capability without Postgres
// QUOTE(TZ): "durable-store-backed vs. in-memory test double"
// REF: contest-tally-catalog
// SOURCE: n/a
// FORMAT THEOREM: forall d: all(add(d)) ends with d
// PURITY: SHELL
// EFFECT: EntrantCatalogShape
// INVARIANT: iteration order is insertion order; clearAll empties entrants and votes together
// COMPLEXITY: O(1) add / O(n) lookup
export const makeMemoryEntrantCatalog = (ref: Ref.Ref<MemoryContest>): EntrantCatalogShape => ({
  add: (draft) =>
    Ref.modify(ref, (contest): [EntrantId, MemoryContest] => {
      const id = EntrantId(randomUUID())
      const entrant = { id, name: draft.name, category: draft.category, photo: draft.photo }
      return [id, { ...contest, entrants: [...contest.entrants, entrant] }]
    }),
  all: Effect.map(Ref.get(ref), (contest) => contest.entrants),
  byId: (id) =>
    Effect.map(Ref.get(ref), (contest) => contest.entrants.find((entrant) => entrant.id === id) ?? null),
  clearAll: Ref.set(ref, emptyContest)
})
