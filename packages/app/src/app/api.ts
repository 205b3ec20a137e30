import { Effect, Match, pipe, type Stream } from "effect"
import type { Scope } from "effect/Scope"

import type { EntrantId } from "../core/brand.js"
import type {
  CategoryTotals,
  DashboardRow,
  Entrant,
  EntrantDraft,
  SystemStats,
  User,
  VoteOutcome,
  VoteUpdate
} from "../core/domain.js"
import { storageFailed } from "../core/domain.js"
import { LiveChannel } from "../shell/live-channel.js"
import type { UserStore, UserStoreError } from "../shell/user-store.js"
import * as Admin from "./admin.js"
import { type AdmissionServices, castVote as admitVote } from "./admission.js"
import { type AuthSettings, type Forbidden, login as loginUser, requireAdmin, type Unauthorized } from "./auth.js"
import { formatError, logAndFallback } from "./diagnostics.js"

export type ContestServices = AdmissionServices | UserStore | AuthSettings

export type ApiResult<A> =
  | { readonly kind: "ok"; readonly value: A }
  | { readonly kind: "invalid"; readonly message: string }
  | { readonly kind: "unauthorized" }
  | { readonly kind: "forbidden" }
  | { readonly kind: "failed"; readonly reason: "internal" }

type ApiError = Admin.StoreError | Admin.InvalidEntrant | Unauthorized | Forbidden | UserStoreError

const internalFailure = { kind: "failed", reason: "internal" } as const

const classify = <A>(error: ApiError): Effect.Effect<ApiResult<A>> =>
  Match.value(error).pipe(
    Match.tag("Unauthorized", (): Effect.Effect<ApiResult<A>> => Effect.succeed({ kind: "unauthorized" })),
    Match.tag("Forbidden", (): Effect.Effect<ApiResult<A>> => Effect.succeed({ kind: "forbidden" })),
    Match.tag(
      "InvalidEntrant",
      (invalid): Effect.Effect<ApiResult<A>> => Effect.succeed({ kind: "invalid", message: invalid.message })
    ),
    Match.orElse((fault): Effect.Effect<ApiResult<A>> =>
      pipe(
        Effect.logError(formatError(fault)),
        Effect.as(internalFailure)
      )
    )
  )

// CHANGE: fold every boundary call into an ApiResult
// WHY: collaborators see rejections and an opaque failure, never internal messages
// QUOTE(TZ): "All unhandled faults at the boundary are caught and turned into a generic opaque failure response"
// REF: contest-tally-errors
// SOURCE: n/a
// FORMAT THEOREM: forall eff: respond(eff) never fails
// PURITY: SHELL
// EFFECT: Effect<ApiResult<A>, never, R>
// INVARIANT: store and defect details are logged, not returned
// COMPLEXITY: O(1)/O(1)
const respond = <A, R>(effect: Effect.Effect<A, ApiError, R>): Effect.Effect<ApiResult<A>, never, R> =>
  logAndFallback(
    pipe(
      effect,
      Effect.map((value): ApiResult<A> => ({ kind: "ok", value })),
      Effect.catchAll((error) => classify<A>(error))
    ),
    internalFailure
  )

const asAdmin = <A, E extends ApiError, R>(
  caller: string,
  effect: Effect.Effect<A, E, R>
): Effect.Effect<ApiResult<A>, never, R | UserStore> =>
  respond(
    pipe(
      requireAdmin(caller),
      Effect.zipRight(effect)
    )
  )

export const login = (username: string): Effect.Effect<ApiResult<User>, never, UserStore | AuthSettings> =>
  respond(loginUser(username))

export const publicEntrantList = (): Effect.Effect<ApiResult<ReadonlyArray<Entrant>>, never, ContestServices> =>
  respond(Admin.publicEntrantList)

export const castVote = (voterId: string, entrantId: string): Effect.Effect<VoteOutcome, never, ContestServices> =>
  logAndFallback(admitVote(voterId, entrantId), storageFailed)

export const dashboard = (
  caller: string
): Effect.Effect<ApiResult<ReadonlyArray<DashboardRow>>, never, ContestServices> => asAdmin(caller, Admin.dashboard)

export const top3 = (
  caller: string
): Effect.Effect<ApiResult<ReadonlyArray<DashboardRow>>, never, ContestServices> => asAdmin(caller, Admin.top3)

export const zeroVoteEntrants = (
  caller: string
): Effect.Effect<ApiResult<ReadonlyArray<DashboardRow>>, never, ContestServices> =>
  asAdmin(caller, Admin.zeroVoteEntrants)

export const votesByCategory = (caller: string): Effect.Effect<ApiResult<CategoryTotals>, never, ContestServices> =>
  asAdmin(caller, Admin.votesByCategory)

export const systemStats = (caller: string): Effect.Effect<ApiResult<SystemStats>, never, ContestServices> =>
  asAdmin(caller, Admin.systemStats)

export const addEntrant = (
  caller: string,
  draft: EntrantDraft
): Effect.Effect<ApiResult<EntrantId>, never, ContestServices> => asAdmin(caller, Admin.addEntrant(draft))

export const reinitialize = (
  caller: string,
  rawDescriptors: ReadonlyArray<unknown>
): Effect.Effect<ApiResult<number>, never, ContestServices> => asAdmin(caller, Admin.reinitialize(rawDescriptors))

export const reconcile = (caller: string): Effect.Effect<ApiResult<Admin.ReconcileReport>, never, ContestServices> =>
  asAdmin(caller, Admin.reconcile)

export const liveUpdates: Effect.Effect<Stream.Stream<VoteUpdate>, never, LiveChannel | Scope> = Effect.flatMap(
  LiveChannel,
  (live) => live.subscribe
)
