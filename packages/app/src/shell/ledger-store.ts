import { and, count, eq } from "drizzle-orm"
import { Context, Data, Effect, pipe, Ref } from "effect"

import type { EntrantId, VoterId } from "../core/brand.js"
import type { InsertResult, VoteRecord, VoteTotals } from "../core/domain.js"
import { votesTable } from "./db/schema.js"
import { formatErrorMessage, makeDbRunner } from "./db-runner.js"
import type { ContestDatabase } from "./drizzle.js"
import type { MemoryContest } from "./entrant-catalog.js"

export class LedgerStoreError extends Data.TaggedError("LedgerStoreError")<{
  readonly message: string
}> {}

export type LedgerStoreShape = {
  readonly tryInsert: (record: VoteRecord) => Effect.Effect<InsertResult, LedgerStoreError>
  readonly hasVoted: (voterId: VoterId, entrantId: EntrantId) => Effect.Effect<boolean, LedgerStoreError>
  readonly countByEntrant: Effect.Effect<VoteTotals, LedgerStoreError>
  readonly clearAll: Effect.Effect<void, LedgerStoreError>
}

export class LedgerStore extends Context.Tag("LedgerStore")<
  LedgerStore,
  LedgerStoreShape
>() {}

const toLedgerError = (error: Error | string): LedgerStoreError =>
  new LedgerStoreError({ message: formatErrorMessage(error) })

const runDb = makeDbRunner(toLedgerError)

// CHANGE: record votes in Postgres behind the (voter, entrant) unique index
// WHY: the insert itself is the admission gate; a read-then-write check races
// QUOTE(TZ): "implemented as a uniqueness constraint enforced by the store itself"
// REF: contest-tally-ledger
// SOURCE: n/a
// FORMAT THEOREM: forall r: tryInsert(r) = inserted -> |{v in ledger | key(v) = key(r)}| = 1
// PURITY: SHELL
// EFFECT: Effect<LedgerStoreShape, never, never>
// INVARIANT: ON CONFLICT DO NOTHING reports a duplicate as zero returned rows, never as an error
// COMPLEXITY: O(log n)/O(1)
export const makeDrizzleLedgerStore = (db: ContestDatabase): LedgerStoreShape => ({
  tryInsert: (record) =>
    pipe(
      runDb(() =>
        db
          .insert(votesTable)
          .values({
            voterId: record.voterId,
            entrantId: record.entrantId,
            castAt: record.castAt
          })
          .onConflictDoNothing({ target: [votesTable.voterId, votesTable.entrantId] })
          .returning({ id: votesTable.id })
      ),
      Effect.map((rows): InsertResult => rows.length > 0 ? "inserted" : "duplicate")
    ),
  hasVoted: (voterId, entrantId) =>
    pipe(
      runDb(() =>
        db
          .select({ id: votesTable.id })
          .from(votesTable)
          .where(and(eq(votesTable.voterId, voterId), eq(votesTable.entrantId, entrantId)))
          .limit(1)
      ),
      Effect.map((rows) => rows.length > 0)
    ),
  countByEntrant: pipe(
    runDb(() =>
      db
        .select({ entrantId: votesTable.entrantId, votes: count() })
        .from(votesTable)
        .groupBy(votesTable.entrantId)
    ),
    Effect.map((rows) => {
      const totals: Record<string, number> = {}
      for (const row of rows) {
        totals[row.entrantId] = Number(row.votes)
      }
      return totals
    })
  ),
  clearAll: pipe(
    runDb(() => db.delete(votesTable)),
    Effect.asVoid
  )
})

const ledgerKey = (voterId: VoterId, entrantId: EntrantId): string => `${voterId}\u0000${entrantId}`

type MemoryInsert = InsertResult | "missing-entrant"

// CHANGE: provide an in-memory ledger with the same insert-if-absent contract
// WHY: tests need the capability without Postgres
// QUOTE(TZ): "entrant identity (must reference an existing Entrant)"
// REF: contest-tally-ledger
// SOURCE: n/a
// FORMAT THEOREM: forall r: tryInsert(r) twice -> [inserted, duplicate]
// PURITY: SHELL
// EFFECT: LedgerStoreShape
// INVARIANT: Ref.modify makes the entrant check and the insert one atomic step
// COMPLEXITY: O(n)/O(n)
export const makeMemoryLedgerStore = (ref: Ref.Ref<MemoryContest>): LedgerStoreShape => ({
  tryInsert: (record) =>
    pipe(
      Ref.modify(ref, (contest): [MemoryInsert, MemoryContest] => {
        if (!contest.entrants.some((entrant) => entrant.id === record.entrantId)) {
          return ["missing-entrant", contest]
        }
        const key = ledgerKey(record.voterId, record.entrantId)
        if (contest.votes.has(key)) {
          return ["duplicate", contest]
        }
        return ["inserted", { ...contest, votes: new Map(contest.votes).set(key, record) }]
      }),
      Effect.flatMap((result) =>
        result === "missing-entrant"
          ? Effect.fail(new LedgerStoreError({ message: `Entrant ${record.entrantId} is not in the catalog` }))
          : Effect.succeed(result)
      )
    ),
  hasVoted: (voterId, entrantId) =>
    Effect.map(Ref.get(ref), (contest) => contest.votes.has(ledgerKey(voterId, entrantId))),
  countByEntrant: Effect.map(Ref.get(ref), (contest) => {
    const totals: Record<string, number> = {}
    for (const record of contest.votes.values()) {
      totals[record.entrantId] = (totals[record.entrantId] ?? 0) + 1
    }
    return totals
  }),
  clearAll: Ref.update(ref, (contest) => ({ ...contest, votes: new Map() }))
})
