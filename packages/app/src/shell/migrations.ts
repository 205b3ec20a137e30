import * as FileSystem from "@effect/platform/FileSystem"
import * as Path from "@effect/platform/Path"
import { migrate } from "drizzle-orm/node-postgres/migrator"
import { Effect, pipe } from "effect"

import type { ContestDatabase } from "./drizzle.js"
import { DatabaseError, toDatabaseError } from "./drizzle.js"

const journalOf = (path: Path.Path, folder: string): string => path.join(folder, "meta", "_journal.json")

const resolveMigrationsFolder = Effect.gen(function*(_) {
  const fs = yield* _(FileSystem.FileSystem)
  const path = yield* _(Path.Path)
  const modulePath = yield* _(path.fromFileUrl(new URL(import.meta.url)))
  const moduleDir = path.dirname(modulePath)
  const cwd = process.cwd()
  const candidates = [
    path.resolve(cwd, "drizzle"),
    path.resolve(cwd, "packages/app/drizzle"),
    path.resolve(moduleDir, "../../drizzle"),
    path.resolve(moduleDir, "../../../drizzle")
  ]
  for (const candidate of candidates) {
    const exists = yield* _(fs.exists(journalOf(path, candidate)))
    if (exists) {
      return candidate
    }
  }
  return yield* _(Effect.fail(new DatabaseError({ message: `Migrations not found in ${candidates.join(", ")}` })))
})

// CHANGE: build migration config with optional schema override
// WHY: allow running migrations without CREATE SCHEMA privileges
// QUOTE(TZ): n/a
// REF: contest-tally-stores
// SOURCE: n/a
// FORMAT THEOREM: ∀f: cfg(f).migrationsFolder = f
// PURITY: SHELL
// INVARIANT: schema override is applied only when provided
// COMPLEXITY: O(1)/O(1)
const buildMigrationConfig = (
  migrationsFolder: string,
  migrationsSchema: string | null
): Parameters<typeof migrate>[1] =>
  migrationsSchema
    ? { migrationsFolder, migrationsSchema }
    : { migrationsFolder }

export const runMigrations = (
  db: ContestDatabase,
  migrationsSchema: string | null
): Effect.Effect<void, DatabaseError, FileSystem.FileSystem | Path.Path> =>
  pipe(
    resolveMigrationsFolder,
    Effect.mapError((error) => toDatabaseError(error instanceof Error ? error : String(error))),
    Effect.flatMap((migrationsFolder) =>
      Effect.tryPromise({
        try: () => migrate(db, buildMigrationConfig(migrationsFolder, migrationsSchema)),
        catch: (error) => toDatabaseError(error instanceof Error ? error : String(error))
      })
    ),
    Effect.asVoid
  )
