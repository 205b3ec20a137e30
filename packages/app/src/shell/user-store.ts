import { eq } from "drizzle-orm"
import { Context, Data, Effect, pipe, Ref } from "effect"

import { Username } from "../core/brand.js"
import type { Role, User } from "../core/domain.js"
import { usersTable } from "./db/schema.js"
import { formatErrorMessage, makeDbRunner } from "./db-runner.js"
import type { ContestDatabase } from "./drizzle.js"

export class UserStoreError extends Data.TaggedError("UserStoreError")<{
  readonly message: string
}> {}

export type UserStoreShape = {
  readonly byUsername: (username: Username) => Effect.Effect<User | null, UserStoreError>
  readonly upsert: (user: User) => Effect.Effect<void, UserStoreError>
}

export class UserStore extends Context.Tag("UserStore")<
  UserStore,
  UserStoreShape
>() {}

const toRole = (value: string): Role | null => value === "admin" || value === "public" ? value : null

const toUserStoreError = (error: Error | string): UserStoreError =>
  new UserStoreError({ message: formatErrorMessage(error) })

const runDb = makeDbRunner(toUserStoreError)

export const makeDrizzleUserStore = (db: ContestDatabase): UserStoreShape => ({
  byUsername: (username) =>
    pipe(
      runDb(() => db.select().from(usersTable).where(eq(usersTable.username, username)).limit(1)),
      Effect.flatMap((rows) => {
        const row = rows[0]
        if (!row) {
          return Effect.succeed(null)
        }
        const role = toRole(row.role)
        return role
          ? Effect.succeed({ username: Username(row.username), role })
          : Effect.fail(toUserStoreError(`Invalid role for ${row.username}: ${row.role}`))
      })
    ),
  upsert: (user) =>
    pipe(
      runDb(() =>
        db
          .insert(usersTable)
          .values({ username: user.username, role: user.role })
          .onConflictDoUpdate({ target: usersTable.username, set: { role: user.role } })
      ),
      Effect.asVoid
    )
})

export const makeMemoryUserStore: Effect.Effect<UserStoreShape> = Effect.map(
  Ref.make<ReadonlyMap<string, User>>(new Map()),
  (ref): UserStoreShape => ({
    byUsername: (username) => Effect.map(Ref.get(ref), (users) => users.get(username) ?? null),
    upsert: (user) => Ref.update(ref, (users) => new Map(users).set(user.username, user))
  })
)
