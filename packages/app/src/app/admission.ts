import { Clock, Effect, Either, pipe } from "effect"

import { EntrantId, VoterId } from "../core/brand.js"
import type { CounterSnapshot, VoteOutcome } from "../core/domain.js"
import { accepted, acceptedWithDrift, rejected, storageFailed } from "../core/domain.js"
import {
  logCounterDrift,
  logNotificationFailed,
  logVoteAccepted,
  logVoteFailed,
  logVoteRejected
} from "../core/text.js"
import { CounterStore } from "../shell/counter-store.js"
import { DriftRegistry } from "../shell/drift-registry.js"
import { EntrantCatalog } from "../shell/entrant-catalog.js"
import { LedgerStore } from "../shell/ledger-store.js"
import { LiveChannel, type LiveChannelShape } from "../shell/live-channel.js"
import { formatError } from "./diagnostics.js"

export type AdmissionServices = EntrantCatalog | LedgerStore | CounterStore | LiveChannel | DriftRegistry

const reject = (
  reason: "InvalidVoter" | "UnknownEntrant" | "DuplicateVote",
  entrantId: string,
  voterId: string
): Effect.Effect<VoteOutcome> =>
  pipe(
    Effect.logInfo(logVoteRejected(reason, entrantId, voterId)),
    Effect.as(rejected(reason))
  )

// Runs on a daemon fiber: the caller's outcome is already decided.
const notify = (
  live: LiveChannelShape,
  entrantId: EntrantId,
  counters: CounterSnapshot
): Effect.Effect<void> =>
  pipe(
    live.publish({
      entrantId,
      entrantTotal: counters.entrantTotal,
      systemTotal: counters.systemTotal
    }),
    Effect.catchAllDefect((defect) => Effect.logWarning(logNotificationFailed(entrantId, String(defect))))
  )

const tallyCommittedVote = (
  entrantId: EntrantId,
  voterId: VoterId
): Effect.Effect<VoteOutcome, never, CounterStore | LiveChannel | DriftRegistry> =>
  Effect.gen(function*(_) {
    const counters = yield* _(CounterStore)
    const counted = yield* _(Effect.either(counters.increment(entrantId)))
    if (Either.isLeft(counted)) {
      const drift = yield* _(DriftRegistry)
      yield* _(drift.flag(entrantId))
      yield* _(Effect.logWarning(logCounterDrift(entrantId, formatError(counted.left))))
      return acceptedWithDrift(entrantId)
    }
    const live = yield* _(LiveChannel)
    yield* _(Effect.forkDaemon(notify(live, entrantId, counted.right)))
    yield* _(
      Effect.logInfo(logVoteAccepted(entrantId, voterId, counted.right.entrantTotal, counted.right.systemTotal))
    )
    return accepted(entrantId, counted.right)
  })

// CHANGE: admit one vote through catalog, ledger, counters and the live channel
// WHY: the ledger is the source of truth and the counters are a cache derived from it
// QUOTE(TZ): "counter increment happens only after ledger commit succeeds"
// REF: contest-tally-admission
// SOURCE: n/a
// FORMAT THEOREM: forall v, e: castVote(v, e) = accepted -> ledger ∋ (v, e) ∧ ¬∃ earlier accepted castVote(v, e)
// PURITY: SHELL
// EFFECT: Effect<VoteOutcome, never, AdmissionServices>
// INVARIANT: a catalog or ledger fault never touches counters or observers; a counter fault never un-accepts a committed vote
// COMPLEXITY: O(1) store calls/O(1)
export const castVote = (
  rawVoterId: string,
  rawEntrantId: string
): Effect.Effect<VoteOutcome, never, AdmissionServices> =>
  pipe(
    Effect.gen(function*(_) {
      if (rawVoterId.trim().length === 0) {
        return yield* _(reject("InvalidVoter", rawEntrantId, rawVoterId))
      }
      const voterId = VoterId(rawVoterId)
      const entrantId = EntrantId(rawEntrantId)

      const catalog = yield* _(EntrantCatalog)
      const entrant = yield* _(catalog.byId(entrantId))
      if (!entrant) {
        return yield* _(reject("UnknownEntrant", rawEntrantId, rawVoterId))
      }

      const ledger = yield* _(LedgerStore)
      const castAt = new Date(yield* _(Clock.currentTimeMillis))
      const inserted = yield* _(ledger.tryInsert({ voterId, entrantId, castAt }))
      if (inserted === "duplicate") {
        return yield* _(reject("DuplicateVote", rawEntrantId, rawVoterId))
      }

      return yield* _(tallyCommittedVote(entrantId, voterId))
    }),
    Effect.catchTags({
      CatalogError: (error) =>
        pipe(
          Effect.logError(logVoteFailed("catalog lookup", formatError(error))),
          Effect.as(storageFailed)
        ),
      LedgerStoreError: (error) =>
        pipe(
          Effect.logError(logVoteFailed("ledger commit", formatError(error))),
          Effect.as(storageFailed)
        )
    }),
    Effect.annotateLogs({ voter: rawVoterId, entrant: rawEntrantId })
  )
