import type { EntrantId, VoterId } from "./brand.js"
import type { RejectReason } from "./domain.js"

// CHANGE: format the accepted-vote log line
// WHY: centralize log text
// QUOTE(TZ): n/a
// REF: contest-tally-admission
// SOURCE: n/a
// FORMAT THEOREM: forall args: log(args) is single-line
// PURITY: CORE
// INVARIANT: output contains the entrant id
// COMPLEXITY: O(1)/O(1)
export const logVoteAccepted = (
  entrantId: EntrantId,
  voterId: VoterId,
  entrantTotal: number,
  systemTotal: number
): string => `Vote accepted: entrant=${entrantId} voter=${voterId} total=${entrantTotal} system=${systemTotal}`

export const logVoteRejected = (
  reason: RejectReason,
  entrantId: string,
  voterId: string
): string => `Vote rejected: reason=${reason} entrant=${entrantId} voter=${voterId}`

export const logVoteFailed = (stage: string, detail: string): string => `Vote failed at ${stage}: ${detail}`

// CHANGE: format the counter drift warning
// WHY: a committed vote whose counter increment failed must be visible to operators
// QUOTE(TZ): "the engine logs/flags the resulting counter-ledger divergence"
// REF: contest-tally-reconcile
// SOURCE: n/a
// FORMAT THEOREM: forall e: log(e) mentions reconcile
// PURITY: CORE
// INVARIANT: output names the entrant whose counter lags the ledger
// COMPLEXITY: O(1)/O(1)
export const logCounterDrift = (entrantId: EntrantId, detail: string): string =>
  `Counter drift: entrant=${entrantId} ledger committed but counter not updated (${detail}); run reconcile`

export const logNotificationFailed = (entrantId: EntrantId, detail: string): string =>
  `Live notification failed: entrant=${entrantId} ${detail}`

export const logObserverConnected = (observerId: number, observers: number): string =>
  `Live observer connected: id=${observerId} observers=${observers}`

export const logObserverDisconnected = (observerId: number, cause: "closed" | "lagging"): string =>
  `Live observer disconnected: id=${observerId} cause=${cause}`

export const logCorruptEntrant = (rowId: string, detail: string): string =>
  `Skipped unreadable entrant record: id=${rowId} ${detail}`

export const logCatalogReinitialized = (loaded: number, skipped: number): string =>
  `Catalog reinitialized: loaded=${loaded} skipped=${skipped}`

export const logEntrantAdded = (entrantId: EntrantId, category: string): string =>
  `Entrant added: id=${entrantId} category=${category}`

export const logReconciled = (changed: number, systemTotal: number): string =>
  `Counters reconciled from ledger: changed=${changed} system=${systemTotal}`

export const logUserLoggedIn = (username: string, role: string): string => `Login: user=${username} role=${role}`

export const logStoresReady = (backend: "durable" | "memory"): string => `Stores ready: backend=${backend}`

export const logRedisError = (detail: string): string => `Redis client error: ${detail}`
