// CHANGE: introduce branded identifiers for entrants, voters and usernames
// WHY: a voter id passed where an entrant id is expected must not type-check
// QUOTE(TZ): "cast one vote per contest entrant"
// REF: contest-tally-admission
// SOURCE: n/a
// FORMAT THEOREM: forall x in IdDomain: brand(x) -> preserves(value(x))
// PURITY: CORE
// INVARIANT: brands are only created in this axiomatic module
// COMPLEXITY: O(1)/O(1)
export type Brand<T, Name extends string> = T & { readonly __brand: Name }

export type EntrantId = Brand<string, "EntrantId">
export type VoterId = Brand<string, "VoterId">
export type Username = Brand<string, "Username">

// CHANGE: provide constructors for branded identifiers at the boundary
// WHY: entrant ids are opaque store-assigned strings
// QUOTE(TZ): "identity is immutable once assigned"
// REF: contest-tally-admission
// SOURCE: n/a
// FORMAT THEOREM: forall s in String: EntrantId(s) = s
// PURITY: CORE
// INVARIANT: entrant id string stays unchanged
// COMPLEXITY: O(1)/O(1)
export const EntrantId = (value: string): EntrantId => value as EntrantId

// Voter ids are supplied by callers and only checked for being non-blank.
export const VoterId = (value: string): VoterId => value as VoterId

export const Username = (value: string): Username => value as Username
