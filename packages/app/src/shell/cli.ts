import * as S from "@effect/schema/Schema"
import { Data, Effect, pipe } from "effect"

export class CliError extends Data.TaggedError("CliError")<{
  readonly message: string
}> {}

export type ReportName = "dashboard" | "top3" | "zeros" | "categories" | "stats" | "reconcile"

export type Command =
  | { readonly kind: "login"; readonly username: string }
  | { readonly kind: "entrants" }
  | { readonly kind: "vote"; readonly voterId: string; readonly entrantId: string }
  | {
    readonly kind: "add"
    readonly caller: string
    readonly name: string
    readonly category: string
    readonly photo: string | null
  }
  | { readonly kind: "load"; readonly caller: string; readonly file: string }
  | { readonly kind: "report"; readonly report: ReportName; readonly caller: string }
  | { readonly kind: "session" }

const argsSchema = S.Union(
  S.Tuple(S.Literal("login"), S.NonEmptyString),
  S.Tuple(S.Literal("entrants")),
  S.Tuple(S.Literal("vote"), S.NonEmptyString, S.NonEmptyString),
  S.Tuple(S.Literal("add"), S.NonEmptyString, S.NonEmptyString, S.NonEmptyString),
  S.Tuple(S.Literal("add"), S.NonEmptyString, S.NonEmptyString, S.NonEmptyString, S.NonEmptyString),
  S.Tuple(S.Literal("load"), S.NonEmptyString, S.NonEmptyString),
  S.Tuple(S.Literal("dashboard", "top3", "zeros", "categories", "stats", "reconcile"), S.NonEmptyString),
  S.Tuple(S.Literal("session"))
)

type Args = S.Schema.Type<typeof argsSchema>

export const usage = [
  "usage: contest-tally <command>",
  "  login <username>",
  "  entrants",
  "  vote <voter> <entrant-id>",
  "  add <admin> <name> <category> [photo]",
  "  load <admin> <file.json>",
  "  dashboard|top3|zeros|categories|stats|reconcile <admin>",
  "  session    (read commands from stdin, print live vote updates)"
].join("\n")

const toCommand = (args: Args): Command => {
  switch (args[0]) {
    case "login": {
      return { kind: "login", username: args[1] }
    }
    case "entrants": {
      return { kind: "entrants" }
    }
    case "vote": {
      return { kind: "vote", voterId: args[1], entrantId: args[2] }
    }
    case "add": {
      return {
        kind: "add",
        caller: args[1],
        name: args[2],
        category: args[3],
        photo: args.length === 5 ? args[4] : null
      }
    }
    case "load": {
      return { kind: "load", caller: args[1], file: args[2] }
    }
    case "session": {
      return { kind: "session" }
    }
    default: {
      return { kind: "report", report: args[0], caller: args[1] }
    }
  }
}

// CHANGE: decode command-line arguments into a typed command
// WHY: keep boundary data validated before entering the application layer
// QUOTE(TZ): n/a
// REF: contest-tally-cli
// SOURCE: n/a
// FORMAT THEOREM: forall argv: parseCommand(argv) = c -> c.kind ∈ Command
// PURITY: SHELL
// EFFECT: Effect<Command, CliError>
// INVARIANT: unknown commands and missing arguments fail with the usage text
// COMPLEXITY: O(n)/O(n)
export const parseCommand = (argv: ReadonlyArray<string>): Effect.Effect<Command, CliError> =>
  pipe(
    S.decodeUnknown(argsSchema)(argv),
    Effect.map(toCommand),
    Effect.mapError(() => new CliError({ message: usage }))
  )

// Session lines are split on whitespace; quoting is not supported.
export const parseLine = (line: string): Effect.Effect<Command, CliError> =>
  parseCommand(line.trim().split(/\s+/).filter((part) => part.length > 0))

export const readCommand = pipe(
  Effect.sync(() => process.argv.slice(2)),
  Effect.flatMap(parseCommand)
)

const descriptorsSchema = S.parseJson(S.Array(S.Unknown))

export const decodeDescriptorFile = (content: string): Effect.Effect<ReadonlyArray<unknown>, CliError> =>
  pipe(
    S.decodeUnknown(descriptorsSchema)(content),
    Effect.mapError((error) => new CliError({ message: `Descriptor file must hold a JSON array: ${error.message}` }))
  )
