import { Username } from "./brand.js"
import type { Role, User } from "./domain.js"

// CHANGE: derive the role from the entered username
// WHY: the contest has a single reserved admin name; everyone else is public
// QUOTE(TZ): "case-insensitive match against a reserved admin name"
// REF: contest-tally-auth
// SOURCE: n/a
// FORMAT THEOREM: forall u: roleFor(u, a) = admin <-> lower(trim(u)) = lower(a)
// PURITY: CORE
// INVARIANT: the role is a pure function of the username
// COMPLEXITY: O(n)/O(1)
export const roleFor = (username: string, adminName: string): Role =>
  username.trim().toLowerCase() === adminName.trim().toLowerCase() ? "admin" : "public"

export const toUser = (username: string, adminName: string): User => ({
  username: Username(username.trim()),
  role: roleFor(username, adminName)
})

export const isAdmin = (user: User): boolean => user.role === "admin"
