import { Context, Effect, Exit, pipe, Queue, Ref, Stream } from "effect"
import type { Scope } from "effect/Scope"

import type { VoteUpdate } from "../core/domain.js"
import { logObserverConnected, logObserverDisconnected } from "../core/text.js"

export type LiveChannelShape = {
  readonly publish: (event: VoteUpdate) => Effect.Effect<void>
  readonly subscribe: Effect.Effect<Stream.Stream<VoteUpdate>, never, Scope>
  readonly observers: Effect.Effect<number>
}

export class LiveChannel extends Context.Tag("LiveChannel")<
  LiveChannel,
  LiveChannelShape
>() {}

type Observers = ReadonlyMap<number, Queue.Queue<VoteUpdate>>

type Registry = {
  readonly nextId: number
  readonly observers: Observers
}

const withoutObserver = (observers: Observers, id: number): Observers => {
  const next = new Map(observers)
  next.delete(id)
  return next
}

const detach = (
  registry: Ref.Ref<Registry>,
  id: number
): Effect.Effect<Queue.Queue<VoteUpdate> | null> =>
  Ref.modify(registry, (current): [Queue.Queue<VoteUpdate> | null, Registry] => {
    const queue = current.observers.get(id)
    return queue
      ? [queue, { nextId: current.nextId, observers: withoutObserver(current.observers, id) }]
      : [null, current]
  })

const disconnect = (
  registry: Ref.Ref<Registry>,
  id: number,
  cause: "closed" | "lagging"
): Effect.Effect<void> =>
  Effect.flatMap(detach(registry, id), (queue) =>
    queue
      ? pipe(
        Queue.shutdown(queue),
        Effect.zipRight(Effect.logInfo(logObserverDisconnected(id, cause)))
      )
      : Effect.void)

// A shut-down queue interrupts `offer`; Effect.exit turns that into a plain failed delivery.
const deliver = (queue: Queue.Queue<VoteUpdate>, event: VoteUpdate): Effect.Effect<boolean> =>
  Effect.map(Effect.exit(Queue.offer(queue, event)), (exit) => Exit.isSuccess(exit) && exit.value)

const connect = (
  registry: Ref.Ref<Registry>,
  capacity: number
): Effect.Effect<readonly [number, Queue.Queue<VoteUpdate>]> =>
  Effect.gen(function*(_) {
    const queue = yield* _(Queue.dropping<VoteUpdate>(capacity))
    const [id, count] = yield* _(
      Ref.modify(registry, (current): [readonly [number, number], Registry] => {
        const observers = new Map(current.observers).set(current.nextId, queue)
        return [[current.nextId, observers.size], { nextId: current.nextId + 1, observers }]
      })
    )
    yield* _(Effect.logInfo(logObserverConnected(id, count)))
    return [id, queue] as const
  })

// CHANGE: fan out accepted votes to every connected observer
// WHY: live dashboards follow the tally without polling, and a stuck dashboard must not stall the rest
// QUOTE(TZ): "a full or closed subscriber queue drops or disconnects that subscriber without affecting others or the sender"
// REF: contest-tally-live
// SOURCE: n/a
// FORMAT THEOREM: forall e, o in observers: publish(e) -> (e ∈ queue(o) ∨ o disconnected)
// PURITY: SHELL
// EFFECT: Effect<LiveChannelShape, never, never>
// INVARIANT: publish never suspends on an observer; each observer queue is bounded by capacity
// COMPLEXITY: O(n)/O(n·capacity)
export const makeLiveChannel = (capacity: number): Effect.Effect<LiveChannelShape> =>
  Effect.map(
    Ref.make<Registry>({ nextId: 1, observers: new Map() }),
    (registry): LiveChannelShape => ({
      publish: (event) =>
        Effect.gen(function*(_) {
          const { observers } = yield* _(Ref.get(registry))
          for (const [id, queue] of observers) {
            const delivered = yield* _(deliver(queue, event))
            if (!delivered) {
              yield* _(disconnect(registry, id, "lagging"))
            }
          }
        }),
      subscribe: Effect.map(
        Effect.acquireRelease(
          connect(registry, capacity),
          ([id]) => disconnect(registry, id, "closed")
        ),
        ([, queue]) => Stream.fromQueue(queue)
      ),
      observers: Effect.map(Ref.get(registry), (current) => current.observers.size)
    })
  )
