import { Predicate } from "effect"

import type { EntrantDraft } from "./domain.js"

export const defaultPhoto = "default.png"

const nameFields = ["name", "nombre"] as const
const categoryFields = ["category", "categoria"] as const
const photoFields = ["photo", "photo_url", "foto"] as const

const pickText = (
  raw: Readonly<Record<string, unknown>>,
  fields: ReadonlyArray<string>
): string | null => {
  for (const field of fields) {
    const value = raw[field]
    if (typeof value === "string" && value.trim().length > 0) {
      return value.trim()
    }
  }
  return null
}

// CHANGE: turn one raw bulk-load item into an entrant draft
// WHY: uploaded files name their fields inconsistently and may contain incomplete rows
// QUOTE(TZ): "missing-name-or-category entries silently skipped"
// REF: contest-tally-bulk-load
// SOURCE: n/a
// FORMAT THEOREM: forall r: toEntrantDraft(r) = d -> d.name != "" ∧ d.category != ""
// PURITY: CORE
// INVARIANT: photo falls back to the default reference
// COMPLEXITY: O(1)/O(1)
export const toEntrantDraft = (raw: unknown): EntrantDraft | null => {
  if (!Predicate.isRecord(raw)) {
    return null
  }
  const name = pickText(raw, nameFields)
  const category = pickText(raw, categoryFields)
  if (name === null || category === null) {
    return null
  }
  return {
    name,
    category,
    photo: pickText(raw, photoFields) ?? defaultPhoto
  }
}

export const toEntrantDrafts = (
  items: ReadonlyArray<unknown>
): ReadonlyArray<EntrantDraft> =>
  items.flatMap((item) => {
    const draft = toEntrantDraft(item)
    return draft === null ? [] : [draft]
  })

// Single-entrant creation rejects what a bulk load would silently drop.
export const isValidDraft = (draft: EntrantDraft): boolean =>
  draft.name.trim().length > 0 && draft.category.trim().length > 0
