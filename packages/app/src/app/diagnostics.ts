import { Effect, pipe } from "effect"

type TaggedError = {
  readonly _tag: string
  readonly message?: string | undefined
}

export type LoggableError = TaggedError | Error | string

const hasTag = (error: LoggableError): error is TaggedError => typeof error !== "string" && "_tag" in error

const formatTaggedError = (error: TaggedError): string =>
  error.message ? `${error._tag}: ${error.message}` : error._tag

export const formatError = (error: LoggableError): string => {
  if (typeof error === "string") {
    return error
  }
  if (hasTag(error)) {
    return formatTaggedError(error)
  }
  return `${error.name}: ${error.message}`
}

// CHANGE: log a failure and continue with a fallback value
// WHY: boundary callers get an opaque answer while the full detail stays in the server log
// QUOTE(TZ): "full diagnostic detail is logged server-side only"
// REF: contest-tally-errors
// SOURCE: n/a
// FORMAT THEOREM: forall e: logAndFallback(fail(e), a) = succeed(a)
// PURITY: SHELL
// EFFECT: Effect<A, never, R>
// INVARIANT: defects are logged with their cause and also fall back
// COMPLEXITY: O(1)/O(1)
export const logAndFallback = <A, E extends LoggableError, R>(
  effect: Effect.Effect<A, E, R>,
  fallback: A
): Effect.Effect<A, never, R> =>
  effect.pipe(
    Effect.catchAll((error) =>
      pipe(
        Effect.logError(formatError(error)),
        Effect.as(fallback)
      )
    ),
    Effect.catchAllDefect((defect) =>
      pipe(
        Effect.logError("Unhandled defect", defect),
        Effect.as(fallback)
      )
    )
  )
