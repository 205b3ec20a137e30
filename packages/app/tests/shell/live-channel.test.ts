import { describe, expect, it } from "@effect/vitest"
import { Chunk, Effect, Stream } from "effect"

import { EntrantId } from "../../src/core/brand.js"
import type { VoteUpdate } from "../../src/core/domain.js"
import { makeLiveChannel } from "../../src/shell/live-channel.js"

const update = (systemTotal: number): VoteUpdate => ({
  entrantId: EntrantId("entrant-a"),
  entrantTotal: systemTotal,
  systemTotal
})

const takeN = (stream: Stream.Stream<VoteUpdate>, count: number) =>
  Effect.map(Stream.runCollect(Stream.take(stream, count)), Chunk.toReadonlyArray)

describe("live channel", () => {
  it.scoped("delivers each event to every observer", () =>
    Effect.gen(function*(_) {
      const live = yield* _(makeLiveChannel(4))
      const first = yield* _(live.subscribe)
      const second = yield* _(live.subscribe)

      yield* _(live.publish(update(1)))

      expect(yield* _(live.observers)).toBe(2)
      expect(yield* _(takeN(first, 1))).toEqual([update(1)])
      expect(yield* _(takeN(second, 1))).toEqual([update(1)])
    }))

  it.scoped("drops a lagging observer and keeps serving the rest", () =>
    Effect.gen(function*(_) {
      const live = yield* _(makeLiveChannel(2))
      yield* _(live.subscribe)
      const healthy = yield* _(live.subscribe)

      yield* _(live.publish(update(1)))
      yield* _(live.publish(update(2)))
      expect(yield* _(takeN(healthy, 2))).toEqual([update(1), update(2)])

      yield* _(live.publish(update(3)))

      expect(yield* _(live.observers)).toBe(1)
      expect(yield* _(takeN(healthy, 1))).toEqual([update(3)])
    }))

  it.scoped("disconnects an observer when its scope closes", () =>
    Effect.gen(function*(_) {
      const live = yield* _(makeLiveChannel(4))
      yield* _(live.subscribe)
      yield* _(Effect.scoped(live.subscribe))

      expect(yield* _(live.observers)).toBe(1)
    }))

  it.effect("publishing without observers succeeds", () =>
    Effect.gen(function*(_) {
      const live = yield* _(makeLiveChannel(1))

      yield* _(live.publish(update(1)))

      expect(yield* _(live.observers)).toBe(0)
    }))
})
