import { drizzle } from "drizzle-orm/node-postgres"
import { Data, Effect, pipe } from "effect"
import type { Scope } from "effect/Scope"
import { Pool } from "pg"

import * as schema from "./db/schema.js"

export class DatabaseError extends Data.TaggedError("DatabaseError")<{
  readonly message: string
}> {}

const makeDatabase = (pool: Pool) => drizzle({ client: pool, schema })

export type ContestDatabase = ReturnType<typeof makeDatabase>

export type DatabaseServiceShape = {
  readonly db: ContestDatabase
}

export const toDatabaseError = (
  error: DatabaseError | Error | string
): DatabaseError =>
  error instanceof DatabaseError
    ? error
    : new DatabaseError({
      message: error instanceof Error ? error.message : error
    })

const checkConnection = (pool: Pool): Effect.Effect<void, DatabaseError> =>
  pipe(
    Effect.tryPromise({
      try: () => pool.query("select 1"),
      catch: (error) => toDatabaseError(error instanceof Error ? error : String(error))
    }),
    Effect.asVoid
  )

const makePool = (databaseUrl: string) =>
  Effect.acquireRelease(
    Effect.try({
      try: () => new Pool({ connectionString: databaseUrl }),
      catch: (error) => toDatabaseError(error instanceof Error ? error : String(error))
    }),
    (pool) =>
      pipe(
        Effect.tryPromise({
          try: () => pool.end(),
          catch: (error) => toDatabaseError(error instanceof Error ? error : String(error))
        }),
        Effect.matchEffect({
          onFailure: (error) => Effect.logWarning(`Postgres pool close failed: ${error.message}`),
          onSuccess: () => Effect.void
        })
      )
  )

// CHANGE: expose the contest database in a scoped Effect service
// WHY: the pool is process-scoped state, opened at startup and closed on shutdown
// QUOTE(TZ): "explicit process-scoped state with defined initialization at startup and graceful shutdown"
// REF: contest-tally-stores
// SOURCE: n/a
// FORMAT THEOREM: forall q: run(q) -> errors are typed as DatabaseError
// PURITY: SHELL
// EFFECT: Effect<DatabaseServiceShape, DatabaseError, Scope>
// INVARIANT: pool is closed when scope ends
// COMPLEXITY: O(1)/O(1)
export const makeDatabaseService = (
  databaseUrl: string
): Effect.Effect<DatabaseServiceShape, DatabaseError, Scope> =>
  pipe(
    makePool(databaseUrl),
    Effect.tap(checkConnection),
    Effect.map((pool) => ({
      db: makeDatabase(pool)
    }))
  )
