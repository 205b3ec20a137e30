import type { EntrantId, Username, VoterId } from "./brand.js"

export type Role = "admin" | "public"

export type User = {
  readonly username: Username
  readonly role: Role
}

export type EntrantDraft = {
  readonly name: string
  readonly category: string
  readonly photo: string
}

export type Entrant = EntrantDraft & {
  readonly id: EntrantId
}

export type VoteRecord = {
  readonly voterId: VoterId
  readonly entrantId: EntrantId
  readonly castAt: Date
}

export type VoteTotals = Readonly<Record<string, number>>

export type DashboardRow = Entrant & {
  readonly totalVotes: number
}

export type CategoryTotals = Readonly<Record<string, number>>

export type SystemStats = {
  readonly systemTotal: number
  readonly votesByCategory: CategoryTotals
}

export type VoteUpdate = {
  readonly entrantId: EntrantId
  readonly entrantTotal: number
  readonly systemTotal: number
}

export type CounterSnapshot = {
  readonly entrantTotal: number
  readonly systemTotal: number
}

export type InsertResult = "inserted" | "duplicate"

export type RejectReason = "InvalidVoter" | "UnknownEntrant" | "DuplicateVote"

export type Tally =
  | {
    readonly kind: "counted"
    readonly entrantTotal: number
    readonly systemTotal: number
  }
  | {
    readonly kind: "drift"
  }

export type VoteOutcome =
  | {
    readonly kind: "accepted"
    readonly entrantId: EntrantId
    readonly tally: Tally
  }
  | {
    readonly kind: "rejected"
    readonly reason: RejectReason
  }
  | {
    readonly kind: "failed"
    readonly reason: "StorageError"
  }

// CHANGE: provide pure constructors for vote outcomes
// WHY: every exit of the admission state machine is a value, never a thrown error
// QUOTE(TZ): "Accepted(newEntrantTotal, newGlobalTotal) | Rejected(reason) | Failed(reason)"
// REF: contest-tally-admission
// SOURCE: n/a
// FORMAT THEOREM: forall o: kind(o) in {accepted, rejected, failed}
// PURITY: CORE
// INVARIANT: a drift tally never carries totals
// COMPLEXITY: O(1)/O(1)
export const accepted = (entrantId: EntrantId, counters: CounterSnapshot): VoteOutcome => ({
  kind: "accepted",
  entrantId,
  tally: {
    kind: "counted",
    entrantTotal: counters.entrantTotal,
    systemTotal: counters.systemTotal
  }
})

export const acceptedWithDrift = (entrantId: EntrantId): VoteOutcome => ({
  kind: "accepted",
  entrantId,
  tally: { kind: "drift" }
})

export const rejected = (reason: RejectReason): VoteOutcome => ({
  kind: "rejected",
  reason
})

export const storageFailed: VoteOutcome = {
  kind: "failed",
  reason: "StorageError"
}

export const toPublicEntrant = (entrant: Entrant): Entrant => ({
  id: entrant.id,
  name: entrant.name,
  category: entrant.category,
  photo: entrant.photo
})
