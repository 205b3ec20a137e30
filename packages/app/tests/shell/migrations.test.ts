import * as FileSystem from "@effect/platform/FileSystem"
import * as Path from "@effect/platform/Path"
import { NodeContext } from "@effect/platform-node"
import * as S from "@effect/schema/Schema"
import { describe, expect, it } from "@effect/vitest"
import { getTableConfig } from "drizzle-orm/pg-core"
import { Effect, pipe } from "effect"

import { entrantsTable, usersTable, votesTable } from "../../src/shell/db/schema.js"

const Journal = S.parseJson(
  S.Struct({
    entries: S.Array(S.Struct({ tag: S.String }))
  })
)

const migrationsDir = Effect.flatMap(Path.Path, (path) => path.fromFileUrl(new URL("../../drizzle/", import.meta.url)))

const readMigration = (tag: string) =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem.FileSystem)
    const path = yield* _(Path.Path)
    const dir = yield* _(migrationsDir)
    return yield* _(fs.readFileString(path.join(dir, `${tag}.sql`)))
  })

const columnsOf = (sql: string, table: string): ReadonlyArray<string> => {
  const statement = sql
    .split("--> statement-breakpoint")
    .find((part) => part.trim().startsWith(`CREATE TABLE IF NOT EXISTS "${table}"`))
  if (statement === undefined) {
    return []
  }
  return statement
    .split("\n")
    .flatMap((line) => {
      const match = /^\s+"(\w+)"/.exec(line)
      return match?.[1] === undefined ? [] : [match[1]]
    })
}

describe("initial migration", () => {
  it.effect("creates every table and column the schema declares, in order", () =>
    pipe(
      Effect.gen(function*(_) {
        const sql = yield* _(readMigration("0000_contest_init"))

        for (const table of [entrantsTable, votesTable, usersTable]) {
          const config = getTableConfig(table)
          expect(columnsOf(sql, config.name)).toEqual(config.columns.map((column) => column.name))
        }
      }),
      Effect.provide(NodeContext.layer)
    ))

  it.effect("declares the vote uniqueness index and the entrant foreign key", () =>
    pipe(
      Effect.gen(function*(_) {
        const sql = yield* _(readMigration("0000_contest_init"))
        const votes = getTableConfig(votesTable)

        expect(votes.indexes.map((index) => index.config.name)).toEqual(["votes_voter_entrant_unique"])
        expect(sql).toContain(
          `CREATE UNIQUE INDEX IF NOT EXISTS "votes_voter_entrant_unique" ON "votes" USING btree ("voter_id","entrant_id");`
        )
        expect(votes.foreignKeys.map((foreignKey) => foreignKey.getName())).toEqual(["votes_entrant_id_entrants_id_fk"])
        expect(sql).toContain(`ADD CONSTRAINT "votes_entrant_id_entrants_id_fk"`)
      }),
      Effect.provide(NodeContext.layer)
    ))

  it.effect("lists only migrations that exist on disk", () =>
    pipe(
      Effect.gen(function*(_) {
        const fs = yield* _(FileSystem.FileSystem)
        const path = yield* _(Path.Path)
        const dir = yield* _(migrationsDir)
        const journal = yield* _(
          Effect.flatMap(fs.readFileString(path.join(dir, "meta", "_journal.json")), S.decodeUnknown(Journal))
        )

        expect(journal.entries.map((entry) => entry.tag)).toEqual(["0000_contest_init"])
        for (const entry of journal.entries) {
          expect(yield* _(fs.exists(path.join(dir, `${entry.tag}.sql`)))).toBe(true)
        }
      }),
      Effect.provide(NodeContext.layer)
    ))
})
