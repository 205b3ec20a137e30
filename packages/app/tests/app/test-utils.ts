import { type Context, Effect, Queue } from "effect"

import type { ContestServices } from "../../src/app/api.js"
import { type ContestRuntime, contextOf, makeRuntime } from "../../src/app/context.js"
import type { EntrantId } from "../../src/core/brand.js"
import type { EntrantDraft, VoteUpdate } from "../../src/core/domain.js"
import { CounterStoreError, type CounterStoreShape } from "../../src/shell/counter-store.js"
import { CatalogError, type EntrantCatalogShape } from "../../src/shell/entrant-catalog.js"
import { LedgerStoreError, type LedgerStoreShape } from "../../src/shell/ledger-store.js"
import type { LiveChannelShape } from "../../src/shell/live-channel.js"
import { makeMemoryStores, type Stores } from "../../src/shell/stores.js"

export const adminName = "admin"

export type Harness = {
  readonly runtime: ContestRuntime
  readonly context: Context.Context<ContestServices>
}

export const makeHarness = (wrap: (stores: Stores) => Stores = (stores) => stores): Effect.Effect<Harness> =>
  Effect.gen(function*(_) {
    const memory = yield* _(makeMemoryStores)
    const runtime = yield* _(makeRuntime(wrap(memory), { adminName, liveBuffer: 16 }))
    return { runtime, context: contextOf(runtime) }
  })

export const withLive = (harness: Harness, live: LiveChannelShape): Harness => {
  const runtime = { ...harness.runtime, live }
  return { runtime, context: contextOf(runtime) }
}

// Records every published update; awaiting `take` waits for the daemon notification fiber.
export const makeRecordingLive: Effect.Effect<{
  readonly live: LiveChannelShape
  readonly published: Queue.Queue<VoteUpdate>
}> = Effect.map(Queue.unbounded<VoteUpdate>(), (published) => {
  const live: LiveChannelShape = {
    publish: (event) => Effect.asVoid(Queue.offer(published, event)),
    subscribe: Effect.die("subscribe is not recorded"),
    observers: Effect.succeed(0)
  }
  return { live, published }
})

export const addEntrants = (
  catalog: EntrantCatalogShape,
  drafts: ReadonlyArray<EntrantDraft>
): Effect.Effect<ReadonlyArray<EntrantId>, CatalogError> => Effect.forEach(drafts, (item) => catalog.add(item))

export const draft = (name: string, category: string): EntrantDraft => ({
  name,
  category,
  photo: "default.png"
})

export const failingIncrement = (
  counters: CounterStoreShape,
  failFor: (entrantId: EntrantId) => boolean = () => true
): CounterStoreShape => ({
  ...counters,
  increment: (entrantId) =>
    failFor(entrantId)
      ? Effect.fail(new CounterStoreError({ message: "connection refused" }))
      : counters.increment(entrantId)
})

export const failingInsert = (ledger: LedgerStoreShape): LedgerStoreShape => ({
  ...ledger,
  tryInsert: () => Effect.fail(new LedgerStoreError({ message: "disk full" }))
})

export const failingLookup = (catalog: EntrantCatalogShape): EntrantCatalogShape => ({
  ...catalog,
  byId: () => Effect.fail(new CatalogError({ message: "statement timeout" }))
})
