import { bigserial, pgTable, text, timestamp, uniqueIndex, uuid } from "drizzle-orm/pg-core"

export const entrantsTable = pgTable("entrants", {
  id: uuid("id").primaryKey().defaultRandom(),
  seq: bigserial("seq", { mode: "number" }).notNull(),
  name: text("name"),
  category: text("category"),
  photo: text("photo"),
  createdAt: timestamp("created_at", { withTimezone: true })
    .notNull()
    .defaultNow()
})

export const votesTable = pgTable(
  "votes",
  {
    id: bigserial("id", { mode: "number" }).primaryKey(),
    voterId: text("voter_id").notNull(),
    entrantId: uuid("entrant_id").notNull().references(() => entrantsTable.id),
    castAt: timestamp("cast_at", { withTimezone: true }).notNull()
  },
  (table) => [
    uniqueIndex("votes_voter_entrant_unique").on(table.voterId, table.entrantId)
  ]
)

export const usersTable = pgTable("users", {
  username: text("username").primaryKey(),
  role: text("role").notNull()
})
