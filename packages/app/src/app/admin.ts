import { Data, Effect, pipe } from "effect"

import type { EntrantId } from "../core/brand.js"
import { isValidDraft, toEntrantDrafts } from "../core/descriptors.js"
import type { DashboardRow, Entrant, EntrantDraft, SystemStats } from "../core/domain.js"
import { toPublicEntrant } from "../core/domain.js"
import * as Reports from "../core/reporting.js"
import { logCatalogReinitialized, logEntrantAdded, logReconciled } from "../core/text.js"
import { CounterStore, type CounterStoreError } from "../shell/counter-store.js"
import { DriftRegistry } from "../shell/drift-registry.js"
import { type CatalogError, EntrantCatalog } from "../shell/entrant-catalog.js"
import { LedgerStore, type LedgerStoreError } from "../shell/ledger-store.js"

export class InvalidEntrant extends Data.TaggedError("InvalidEntrant")<{
  readonly message: string
}> {}

export type StoreError = CatalogError | LedgerStoreError | CounterStoreError

export type ReconcileReport = {
  readonly changed: ReadonlyArray<{
    readonly entrantId: string
    readonly before: number
    readonly after: number
  }>
  readonly flagged: ReadonlyArray<EntrantId>
  readonly systemTotal: number
}

export const publicEntrantList: Effect.Effect<ReadonlyArray<Entrant>, CatalogError, EntrantCatalog> = Effect.gen(
  function*(_) {
    const catalog = yield* _(EntrantCatalog)
    const entrants = yield* _(catalog.all)
    return entrants.map(toPublicEntrant)
  }
)

export const addEntrant = (
  draft: EntrantDraft
): Effect.Effect<EntrantId, InvalidEntrant | CatalogError, EntrantCatalog> =>
  Effect.gen(function*(_) {
    if (!isValidDraft(draft)) {
      return yield* _(Effect.fail(new InvalidEntrant({ message: "name and category are required" })))
    }
    const catalog = yield* _(EntrantCatalog)
    const id = yield* _(
      catalog.add({ name: draft.name.trim(), category: draft.category.trim(), photo: draft.photo })
    )
    yield* _(Effect.logInfo(logEntrantAdded(id, draft.category.trim())))
    return id
  })

// CHANGE: replace the catalog from a bulk load and zero every tally
// WHY: a new contest starts from an empty ledger and zeroed counters
// QUOTE(TZ): "converts to Entrant records before replacing the catalog and resetting counters/ledger"
// REF: contest-tally-bulk-load
// SOURCE: n/a
// FORMAT THEOREM: forall ds: dashboard(reinitialize(ds)) = [(d, 0) | d <- valid(ds)]
// PURITY: SHELL
// EFFECT: Effect<number, StoreError, EntrantCatalog | CounterStore | DriftRegistry>
// INVARIANT: votes and entrants are cleared in one step, and counters are zeroed only after it
// COMPLEXITY: O(n)/O(n)
export const reinitialize = (
  rawDescriptors: ReadonlyArray<unknown>
): Effect.Effect<number, StoreError, EntrantCatalog | CounterStore | DriftRegistry> =>
  Effect.gen(function*(_) {
    const drafts = toEntrantDrafts(rawDescriptors)
    const catalog = yield* _(EntrantCatalog)
    const counters = yield* _(CounterStore)
    const drift = yield* _(DriftRegistry)

    // An empty catalog admits no votes, so counters are zeroed after it.
    yield* _(catalog.clearAll)
    yield* _(counters.reset)
    yield* _(drift.clear)
    yield* _(Effect.forEach(drafts, (draft) => catalog.add(draft), { discard: true }))

    yield* _(Effect.logInfo(logCatalogReinitialized(drafts.length, rawDescriptors.length - drafts.length)))
    return drafts.length
  })

// CHANGE: rebuild counters from the ledger on request
// WHY: a counter increment that failed after a ledger commit leaves the cache behind the ledger
// QUOTE(TZ): "reconciliation (recomputing counters from the ledger) is an explicit out-of-band operation"
// REF: contest-tally-reconcile
// SOURCE: n/a
// FORMAT THEOREM: forall e: after reconcile, totalFor(e) = |{v in ledger | v.entrant = e}|
// PURITY: SHELL
// EFFECT: Effect<ReconcileReport, StoreError, LedgerStore | CounterStore | DriftRegistry>
// INVARIANT: the system counter equals the ledger size afterwards when no vote is admitted while it runs
// COMPLEXITY: O(n)/O(n)
//
// Run it while voting is paused: a vote counted between the ledger read and replaceAll is overwritten.
// Only entrants flagged before the read are unflagged, so drift raised during the run stays visible.
export const reconcile: Effect.Effect<
  ReconcileReport,
  StoreError,
  LedgerStore | CounterStore | DriftRegistry
> = Effect.gen(function*(_) {
  const ledger = yield* _(LedgerStore)
  const counters = yield* _(CounterStore)
  const drift = yield* _(DriftRegistry)
  const flagged = yield* _(drift.flagged)
  const before = yield* _(counters.allTotals)
  const after = yield* _(ledger.countByEntrant)

  yield* _(counters.replaceAll(after))
  yield* _(drift.unflag(flagged))

  const entrantIds = new Set([...Object.keys(before), ...Object.keys(after)])
  const changed = [...entrantIds]
    .map((entrantId) => ({ entrantId, before: before[entrantId] ?? 0, after: after[entrantId] ?? 0 }))
    .filter((entry) => entry.before !== entry.after)
  const systemTotal = Reports.sumTotals(after)
  yield* _(Effect.logInfo(logReconciled(changed.length, systemTotal)))
  return { changed, flagged, systemTotal }
})

const dashboardRows: Effect.Effect<
  ReadonlyArray<DashboardRow>,
  CatalogError | CounterStoreError,
  EntrantCatalog | CounterStore
> = Effect.gen(function*(_) {
  const catalog = yield* _(EntrantCatalog)
  const counters = yield* _(CounterStore)
  const entrants = yield* _(catalog.all)
  const totals = yield* _(counters.allTotals)
  return Reports.dashboard(entrants, totals)
})

export const dashboard = dashboardRows

export const top3 = pipe(dashboardRows, Effect.map(Reports.top3))

export const zeroVoteEntrants = pipe(dashboardRows, Effect.map(Reports.zeroVoteEntrants))

export const votesByCategory = pipe(dashboardRows, Effect.map(Reports.votesByCategory))

export const systemStats: Effect.Effect<
  SystemStats,
  CatalogError | CounterStoreError,
  EntrantCatalog | CounterStore
> = Effect.gen(function*(_) {
  const counters = yield* _(CounterStore)
  const rows = yield* _(dashboardRows)
  const systemTotal = yield* _(counters.systemTotal)
  return Reports.systemStats(rows, systemTotal)
})
