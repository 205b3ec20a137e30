import { Context, Effect, Ref } from "effect"

import type { EntrantId } from "../core/brand.js"

export type DriftRegistryShape = {
  readonly flag: (entrantId: EntrantId) => Effect.Effect<void>
  readonly flagged: Effect.Effect<ReadonlyArray<EntrantId>>
  readonly unflag: (entrantIds: ReadonlyArray<EntrantId>) => Effect.Effect<void>
  readonly clear: Effect.Effect<void>
}

// Entrants whose counter lags the ledger since the last reconcile.
export class DriftRegistry extends Context.Tag("DriftRegistry")<
  DriftRegistry,
  DriftRegistryShape
>() {}

export const makeDriftRegistry: Effect.Effect<DriftRegistryShape> = Effect.map(
  Ref.make<ReadonlySet<EntrantId>>(new Set()),
  (ref): DriftRegistryShape => ({
    flag: (entrantId) => Ref.update(ref, (current) => new Set(current).add(entrantId)),
    flagged: Effect.map(Ref.get(ref), (current) => [...current]),
    unflag: (entrantIds) =>
      Ref.update(ref, (current) => {
        const next = new Set(current)
        for (const entrantId of entrantIds) {
          next.delete(entrantId)
        }
        return next
      }),
    clear: Ref.set(ref, new Set())
  })
)
