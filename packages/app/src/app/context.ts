import { Context, Effect, pipe } from "effect"

import { CounterStore } from "../shell/counter-store.js"
import { DriftRegistry, type DriftRegistryShape, makeDriftRegistry } from "../shell/drift-registry.js"
import { EntrantCatalog } from "../shell/entrant-catalog.js"
import { LedgerStore } from "../shell/ledger-store.js"
import { LiveChannel, type LiveChannelShape, makeLiveChannel } from "../shell/live-channel.js"
import type { Stores } from "../shell/stores.js"
import { UserStore } from "../shell/user-store.js"
import type { ContestServices } from "./api.js"
import { AuthSettings, type AuthSettingsShape } from "./auth.js"

export type ContestRuntime = {
  readonly stores: Stores
  readonly live: LiveChannelShape
  readonly drift: DriftRegistryShape
  readonly settings: AuthSettingsShape
}

// CHANGE: assemble every contest service into one context
// WHY: the program and the tests provide the same set of tags from different store variants
// QUOTE(TZ): "pass handles explicitly to components rather than relying on ambient globals"
// REF: contest-tally-stores
// SOURCE: n/a
// FORMAT THEOREM: forall rt: provide(contextOf(rt)) eliminates ContestServices
// PURITY: CORE
// INVARIANT: one live channel and one drift registry per runtime
// COMPLEXITY: O(1)/O(1)
export const contextOf = (runtime: ContestRuntime): Context.Context<ContestServices> =>
  pipe(
    Context.make(EntrantCatalog, runtime.stores.catalog),
    Context.add(LedgerStore, runtime.stores.ledger),
    Context.add(CounterStore, runtime.stores.counters),
    Context.add(UserStore, runtime.stores.users),
    Context.add(LiveChannel, runtime.live),
    Context.add(DriftRegistry, runtime.drift),
    Context.add(AuthSettings, runtime.settings)
  )

export const makeRuntime = (
  stores: Stores,
  settings: AuthSettingsShape & { readonly liveBuffer: number }
): Effect.Effect<ContestRuntime> =>
  Effect.all({
    stores: Effect.succeed(stores),
    live: makeLiveChannel(settings.liveBuffer),
    drift: makeDriftRegistry,
    settings: Effect.succeed({ adminName: settings.adminName })
  })
