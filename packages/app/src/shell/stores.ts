import type * as FileSystem from "@effect/platform/FileSystem"
import type * as Path from "@effect/platform/Path"
import { Effect, pipe, Ref } from "effect"
import type { Scope } from "effect/Scope"

import { logStoresReady } from "../core/text.js"
import { type Config, type ConfigError, requireDatabaseUrl } from "./config.js"
import { type CounterStoreShape, makeMemoryCounterStore, makeRedisCounterStore } from "./counter-store.js"
import { type DatabaseError, makeDatabaseService } from "./drizzle.js"
import {
  emptyContest,
  type EntrantCatalogShape,
  makeDrizzleEntrantCatalog,
  makeMemoryEntrantCatalog,
  type MemoryContest
} from "./entrant-catalog.js"
import { type LedgerStoreShape, makeDrizzleLedgerStore, makeMemoryLedgerStore } from "./ledger-store.js"
import { runMigrations } from "./migrations.js"
import { makeRedisService, type RedisError } from "./redis.js"
import { makeDrizzleUserStore, makeMemoryUserStore, type UserStoreShape } from "./user-store.js"

export type Stores = {
  readonly catalog: EntrantCatalogShape
  readonly ledger: LedgerStoreShape
  readonly counters: CounterStoreShape
  readonly users: UserStoreShape
}

// CHANGE: open Postgres and Redis for the lifetime of the program scope
// WHY: stores receive their handles explicitly instead of reaching for globals
// QUOTE(TZ): "pass handles explicitly to components rather than relying on ambient globals"
// REF: contest-tally-stores
// SOURCE: n/a
// FORMAT THEOREM: forall cfg: scope closed -> pool ended ∧ redis quit
// PURITY: SHELL
// EFFECT: Effect<Stores, ConfigError | DatabaseError | RedisError, Scope | FileSystem | Path>
// INVARIANT: migrations have run before any store is returned
// COMPLEXITY: O(1)/O(1)
export const makeDurableStores = (
  config: Config
): Effect.Effect<
  Stores,
  ConfigError | DatabaseError | RedisError,
  Scope | FileSystem.FileSystem | Path.Path
> =>
  Effect.gen(function*(_) {
    const databaseUrl = yield* _(requireDatabaseUrl(config))
    const { db } = yield* _(makeDatabaseService(databaseUrl))
    yield* _(runMigrations(db, config.migrationsSchema))
    const { client } = yield* _(makeRedisService(config.redisUrl))
    yield* _(Effect.logInfo(logStoresReady("durable")))
    return {
      catalog: makeDrizzleEntrantCatalog(db),
      ledger: makeDrizzleLedgerStore(db),
      counters: makeRedisCounterStore(client),
      users: makeDrizzleUserStore(db)
    }
  })

export const makeMemoryStores: Effect.Effect<Stores> = pipe(
  Ref.make<MemoryContest>(emptyContest),
  Effect.flatMap((contest) =>
    Effect.all({
      catalog: Effect.succeed(makeMemoryEntrantCatalog(contest)),
      ledger: Effect.succeed(makeMemoryLedgerStore(contest)),
      counters: makeMemoryCounterStore,
      users: makeMemoryUserStore
    })
  ),
  Effect.tap(() => Effect.logInfo(logStoresReady("memory")))
)
