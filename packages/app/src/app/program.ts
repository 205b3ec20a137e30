import * as FileSystem from "@effect/platform/FileSystem"
import * as NodeStream from "@effect/platform-node/NodeStream"
import { Console, Effect, Match, pipe, Stream } from "effect"
import type { Scope } from "effect/Scope"

import { defaultPhoto } from "../core/descriptors.js"
import { CliError, type Command, decodeDescriptorFile, parseLine, readCommand, type ReportName } from "../shell/cli.js"
import { loadConfig } from "../shell/config.js"
import { makeDurableStores } from "../shell/stores.js"
import * as Api from "./api.js"
import { contextOf, makeRuntime } from "./context.js"

const printJson = (value: unknown): Effect.Effect<void> => Console.log(JSON.stringify(value))

const reports: Readonly<
  Record<ReportName, (caller: string) => Effect.Effect<unknown, never, Api.ContestServices>>
> = {
  dashboard: Api.dashboard,
  top3: Api.top3,
  zeros: Api.zeroVoteEntrants,
  categories: Api.votesByCategory,
  stats: Api.systemStats,
  reconcile: Api.reconcile
}

const readDescriptors = (
  file: string
): Effect.Effect<ReadonlyArray<unknown>, CliError, FileSystem.FileSystem> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem.FileSystem)
    const content = yield* _(
      pipe(
        fs.readFileString(file),
        Effect.mapError((error) => new CliError({ message: `Cannot read ${file}: ${error.message}` }))
      )
    )
    return yield* _(decodeDescriptorFile(content))
  })

const execute = (
  command: Command
): Effect.Effect<unknown, CliError, Api.ContestServices | FileSystem.FileSystem> =>
  Match.value(command).pipe(
    Match.when({ kind: "login" }, (value) => Api.login(value.username)),
    Match.when({ kind: "entrants" }, () => Api.publicEntrantList()),
    Match.when({ kind: "vote" }, (value) => Api.castVote(value.voterId, value.entrantId)),
    Match.when({ kind: "add" }, (value) =>
      Api.addEntrant(value.caller, {
        name: value.name,
        category: value.category,
        photo: value.photo ?? defaultPhoto
      })),
    Match.when({ kind: "load" }, (value) =>
      pipe(
        readDescriptors(value.file),
        Effect.flatMap((raw) => Api.reinitialize(value.caller, raw))
      )),
    Match.when({ kind: "report" }, (value) => reports[value.report](value.caller)),
    Match.when({ kind: "session" }, () => Effect.fail(new CliError({ message: "session cannot be nested" }))),
    Match.exhaustive
  )

const runLine = (line: string): Effect.Effect<void, never, Api.ContestServices | FileSystem.FileSystem> =>
  pipe(
    parseLine(line),
    Effect.flatMap(execute),
    Effect.flatMap(printJson),
    Effect.catchAll((error) => printJson({ error: error.message }))
  )

const stdinLines = pipe(
  NodeStream.fromReadable(() => process.stdin, (error) => new CliError({ message: String(error) })),
  Stream.decodeText(),
  Stream.splitLines
)

// CHANGE: run commands from stdin against one set of stores and print live updates between them
// WHY: the live channel only has observers while a process stays up
// QUOTE(TZ): n/a
// REF: contest-tally-live
// SOURCE: n/a
// FORMAT THEOREM: forall lines: every accepted vote is printed once per session
// PURITY: SHELL
// EFFECT: Effect<void, CliError, ContestServices | FileSystem | Scope>
// INVARIANT: a bad line prints an error and the session continues
// COMPLEXITY: O(n)/O(1)
const session: Effect.Effect<void, CliError, Api.ContestServices | FileSystem.FileSystem | Scope> = Effect.gen(
  function*(_) {
    const updates = yield* _(Api.liveUpdates)
    yield* _(Effect.forkScoped(Stream.runForEach(updates, (update) => printJson({ live: update }))))
    yield* _(
      Stream.runForEach(stdinLines, (line) => line.trim().length === 0 ? Effect.void : runLine(line))
    )
  }
)

const reportCliError = (error: CliError): Effect.Effect<void> =>
  pipe(
    Console.error(error.message),
    Effect.zipRight(Effect.sync(() => {
      process.exitCode = 2
    }))
  )

// CHANGE: compose the contest program from config, stores and one command
// WHY: every command runs against the same typed services the tests use
// QUOTE(TZ): n/a
// REF: contest-tally-cli
// SOURCE: n/a
// FORMAT THEOREM: forall argv: program(argv) -> effects only through services
// PURITY: SHELL
// EFFECT: Effect<void, ConfigError | DatabaseError | RedisError, FileSystem | Path>
// INVARIANT: the Postgres pool and Redis client are released when the command finishes
// COMPLEXITY: O(1)/O(1)
export const program = pipe(
  readCommand,
  Effect.flatMap((command) =>
    pipe(
      loadConfig,
      Effect.flatMap((config) =>
        Effect.scoped(
          Effect.gen(function*(_) {
            const stores = yield* _(makeDurableStores(config))
            const runtime = yield* _(makeRuntime(stores, config))
            const run: Effect.Effect<void, CliError, Api.ContestServices | FileSystem.FileSystem | Scope> =
              command.kind === "session"
                ? session
                : pipe(execute(command), Effect.flatMap(printJson))
            yield* _(Effect.provide(run, contextOf(runtime)))
          })
        )
      )
    )
  ),
  Effect.catchTag("CliError", reportCliError)
)
