import * as FileSystem from "@effect/platform/FileSystem"
import * as Path from "@effect/platform/Path"
import * as S from "@effect/schema/Schema"
import dotenv from "dotenv"
import { Data, Effect, pipe } from "effect"

export class ConfigError extends Data.TaggedError("ConfigError")<{
  readonly message: string
}> {}

const envSchema = S.Struct({
  CONTEST_DATABASE_URL: S.optional(S.NonEmptyString),
  CONTEST_REDIS_URL: S.optionalWith(S.NonEmptyString, { default: () => "redis://localhost:6379" }),
  CONTEST_ADMIN_NAME: S.optionalWith(S.NonEmptyString, { default: () => "admin" }),
  CONTEST_LIVE_BUFFER: S.optionalWith(S.NumberFromString.pipe(S.int(), S.positive()), { default: () => 64 }),
  CONTEST_MIGRATIONS_SCHEMA: S.optional(S.NonEmptyString)
})

type Env = S.Schema.Type<typeof envSchema>

export type Config = {
  readonly databaseUrl: string | null
  readonly redisUrl: string
  readonly adminName: string
  readonly liveBuffer: number
  readonly migrationsSchema: string | null
}

const toConfigError = (
  error: ConfigError | Error | string
): ConfigError =>
  error instanceof ConfigError
    ? error
    : new ConfigError({
      message: error instanceof Error ? error.message : error
    })

// CHANGE: load the nearest .env before decoding the environment
// WHY: the service is started from the repo root, the package dir or the build output
// QUOTE(TZ): n/a
// REF: contest-tally-config
// SOURCE: n/a
// FORMAT THEOREM: forall dirs: first existing .env wins
// PURITY: SHELL
// EFFECT: Effect<void, ConfigError, FileSystem | Path>
// INVARIANT: variables already set in the process environment are not overridden
// COMPLEXITY: O(1)/O(1)
const loadEnv = pipe(
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem.FileSystem)
    const path = yield* _(Path.Path)
    const modulePath = yield* _(path.fromFileUrl(new URL(import.meta.url)))
    const moduleDir = path.dirname(modulePath)
    const cwd = process.cwd()
    const candidateEnvPaths = [
      path.resolve(cwd, ".env"),
      path.resolve(cwd, "../.env"),
      path.resolve(cwd, "../../.env"),
      path.resolve(moduleDir, "../../.env"),
      path.resolve(moduleDir, "../../../.env")
    ]

    let resolvedEnvPath: string | null = null
    for (const envPath of candidateEnvPaths) {
      const exists = yield* _(fs.exists(envPath))
      if (exists) {
        resolvedEnvPath = envPath
        break
      }
    }

    if (resolvedEnvPath) {
      dotenv.config({ path: resolvedEnvPath })
    } else {
      dotenv.config()
    }
  }),
  Effect.mapError((error) => toConfigError(error instanceof Error ? error : String(error))),
  Effect.asVoid
)

export const toConfig = (env: Env): Config => ({
  databaseUrl: env.CONTEST_DATABASE_URL ?? null,
  redisUrl: env.CONTEST_REDIS_URL,
  adminName: env.CONTEST_ADMIN_NAME,
  liveBuffer: env.CONTEST_LIVE_BUFFER,
  migrationsSchema: env.CONTEST_MIGRATIONS_SCHEMA ?? null
})

export const decodeConfig = (
  env: Readonly<Record<string, string | undefined>>
): Effect.Effect<Config, ConfigError> =>
  pipe(
    S.decodeUnknown(envSchema)(env),
    Effect.map(toConfig),
    Effect.mapError((error) => toConfigError(error.message))
  )

export const loadConfig = pipe(
  loadEnv,
  Effect.flatMap(() => Effect.sync(() => process.env)),
  Effect.flatMap(decodeConfig)
)

export const requireDatabaseUrl = (config: Config): Effect.Effect<string, ConfigError> =>
  config.databaseUrl
    ? Effect.succeed(config.databaseUrl)
    : Effect.fail(new ConfigError({ message: "CONTEST_DATABASE_URL is required" }))
