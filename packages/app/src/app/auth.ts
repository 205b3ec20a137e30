import { Context, Data, Effect } from "effect"

import { Username } from "../core/brand.js"
import type { User } from "../core/domain.js"
import { isAdmin, toUser } from "../core/roles.js"
import { logUserLoggedIn } from "../core/text.js"
import { UserStore, type UserStoreError } from "../shell/user-store.js"

export class Unauthorized extends Data.TaggedError("Unauthorized")<{
  readonly message: string
}> {}

export class Forbidden extends Data.TaggedError("Forbidden")<{
  readonly message: string
}> {}

export type AuthSettingsShape = {
  readonly adminName: string
}

export class AuthSettings extends Context.Tag("AuthSettings")<
  AuthSettings,
  AuthSettingsShape
>() {}

// CHANGE: log a user in by name and remember the derived role
// WHY: the admin gate later looks the caller up by the same name
// QUOTE(TZ): "derived deterministically from username ... and persisted on first login"
// REF: contest-tally-auth
// SOURCE: n/a
// FORMAT THEOREM: forall u: login(u).role = roleFor(u)
// PURITY: SHELL
// EFFECT: Effect<User, Unauthorized | UserStoreError, UserStore | AuthSettings>
// INVARIANT: blank usernames are refused before touching the store
// COMPLEXITY: O(1)/O(1)
export const login = (
  username: string
): Effect.Effect<User, Unauthorized | UserStoreError, UserStore | AuthSettings> =>
  Effect.gen(function*(_) {
    if (username.trim().length === 0) {
      return yield* _(Effect.fail(new Unauthorized({ message: "username is required" })))
    }
    const settings = yield* _(AuthSettings)
    const users = yield* _(UserStore)
    const user = toUser(username, settings.adminName)
    yield* _(users.upsert(user))
    yield* _(Effect.logInfo(logUserLoggedIn(user.username, user.role)))
    return user
  })

export const requireAdmin = (
  username: string
): Effect.Effect<User, Unauthorized | Forbidden | UserStoreError, UserStore> =>
  Effect.gen(function*(_) {
    if (username.trim().length === 0) {
      return yield* _(Effect.fail(new Unauthorized({ message: "missing caller identity" })))
    }
    const users = yield* _(UserStore)
    const user = yield* _(users.byUsername(Username(username.trim())))
    if (!user) {
      return yield* _(Effect.fail(new Unauthorized({ message: "unknown user" })))
    }
    if (!isAdmin(user)) {
      return yield* _(Effect.fail(new Forbidden({ message: "admin role required" })))
    }
    return user
  })
