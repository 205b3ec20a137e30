import { Effect } from "effect"

export type ErrorHandler<E> = (error: Error | string) => E

export type DbRunner<E> = <A>(
  run: () => PromiseLike<A>
) => Effect.Effect<A, E>

// CHANGE: lift Promise-returning DB calls into typed Effects
// WHY: keep database IO explicit and typed at the shell boundary
// QUOTE(TZ): "any storage-layer fault surfaces as StoreFailure"
// REF: contest-tally-stores
// SOURCE: n/a
// FORMAT THEOREM: ∀run: Effect(run) either succeeds or returns typed E
// PURITY: SHELL
// EFFECT: Effect<A, E>
// INVARIANT: thrown errors are mapped to the provided error type; each call is tried once
// COMPLEXITY: O(1)/O(1)
export const makeDbRunner = <E>(
  onError: ErrorHandler<E>
): DbRunner<E> =>
<A>(run: () => PromiseLike<A>) =>
  Effect.tryPromise({
    try: run,
    catch: (error) => onError(error instanceof Error ? error : String(error))
  })

const formatCause = (cause: Error["cause"]): string | null => {
  if (cause instanceof Error) {
    return cause.message
  }
  if (typeof cause === "string") {
    return cause
  }
  if (cause === null || cause === undefined) {
    return null
  }
  return "unknown"
}

// Drizzle wraps driver errors; the driver message sits in `cause`.
export const formatErrorMessage = (error: Error | string): string => {
  if (typeof error === "string") {
    return error
  }
  const causeMessage = formatCause(error.cause)
  return causeMessage ? `${error.message}; cause: ${causeMessage}` : error.message
}
