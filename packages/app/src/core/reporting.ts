import type { CategoryTotals, DashboardRow, Entrant, SystemStats, VoteTotals } from "./domain.js"

const podiumSize = 3

const totalOf = (totals: VoteTotals, entrant: Entrant): number => totals[entrant.id] ?? 0

// CHANGE: join the catalog with the counter snapshot
// WHY: every report is derived on demand, never cached
// QUOTE(TZ): "counter defaulting to 0 when absent"
// REF: contest-tally-reports
// SOURCE: n/a
// FORMAT THEOREM: forall es, ts: length(dashboard(es, ts)) = length(es)
// PURITY: CORE
// INVARIANT: rows follow catalog iteration order
// COMPLEXITY: O(n)/O(n)
export const dashboard = (
  entrants: ReadonlyArray<Entrant>,
  totals: VoteTotals
): ReadonlyArray<DashboardRow> =>
  entrants.map((entrant) => ({
    id: entrant.id,
    name: entrant.name,
    category: entrant.category,
    photo: entrant.photo,
    totalVotes: totalOf(totals, entrant)
  }))

// CHANGE: pick the three most voted entrants
// WHY: admins watch the podium live
// QUOTE(TZ): "ties broken by catalog iteration order (stable sort)"
// REF: contest-tally-reports
// SOURCE: n/a
// FORMAT THEOREM: forall rows: top3(rows) is a prefix of stableSortDesc(rows)
// PURITY: CORE
// INVARIANT: length(top3(rows)) = min(3, length(rows))
// COMPLEXITY: O(n log n)/O(n)
export const top3 = (rows: ReadonlyArray<DashboardRow>): ReadonlyArray<DashboardRow> =>
  [...rows]
    .sort((left, right) => right.totalVotes - left.totalVotes)
    .slice(0, podiumSize)

export const zeroVoteEntrants = (rows: ReadonlyArray<DashboardRow>): ReadonlyArray<DashboardRow> =>
  rows.filter((row) => row.totalVotes === 0)

export const votesByCategory = (rows: ReadonlyArray<DashboardRow>): CategoryTotals => {
  const totals: Record<string, number> = {}
  for (const row of rows) {
    totals[row.category] = (totals[row.category] ?? 0) + row.totalVotes
  }
  return totals
}

export const systemStats = (
  rows: ReadonlyArray<DashboardRow>,
  systemTotal: number
): SystemStats => ({
  systemTotal,
  votesByCategory: votesByCategory(rows)
})

// Sum of per-entrant counters; equals the global counter at quiescent points.
export const sumTotals = (totals: VoteTotals): number =>
  Object.values(totals).reduce((sum, value) => sum + value, 0)
