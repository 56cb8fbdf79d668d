import { joinItems, unionItems } from "./items"
import { appendNoteEntry } from "./notes"
import {
  NOTES_FIELD,
  isListField,
  isProtectedField,
  type FieldUpdates,
  type ListField,
  type MergeTarget,
  type MergeableField,
  type ProposedUpdate,
  type ProposedValue,
} from "./record"

export type ChangeKind = "initial" | "added" | "unchanged" | "note_appended"

export interface ChangeEntry {
  field: MergeableField
  kind: ChangeKind
  message: string
  addedItems?: string[]
}

export type ChangeSummary = ChangeEntry[]

export type IgnoredReason = "protected" | "unknown_field"

export interface IgnoredField {
  field: string
  reason: IgnoredReason
}

export interface MergeResult {
  /** Columns to persist. Empty means the caller must not write. */
  updates: FieldUpdates
  summary: ChangeSummary
  /** Fields that carried a value but are never merged. */
  ignored: IgnoredField[]
}

export interface MergeOptions {
  /** Clock for note timestamps. */
  now?: () => Date
}

const UNSET_MARKER = "None"

function toText(value: ProposedValue): string | null {
  return value === null || value === undefined ? null : String(value)
}

function isUnset(value: string | null | undefined): boolean {
  return value === null || value === undefined || value === "" || value === UNSET_MARKER
}

function mergeListField(field: ListField, current: string | null | undefined, proposed: string): {
  value?: string
  entry: ChangeEntry
} {
  if (isUnset(current)) {
    return {
      value: proposed,
      entry: { field, kind: "initial", message: "set initial value" },
    }
  }

  const { added, merged } = unionItems(current ?? "", proposed)
  if (added.length === 0) {
    return { entry: { field, kind: "unchanged", message: "no new items to add" } }
  }

  return {
    value: joinItems(merged),
    entry: {
      field,
      kind: "added",
      message: `added new items: ${joinItems(added)}`,
      addedItems: added,
    },
  }
}

/**
 * Decides, field by field, what to persist when applying a proposed update to
 * an existing record.
 *
 * List-like fields take the union of their comma-separated items, notes are
 * appended as timestamped entries, protected fields are never written. The
 * function never throws; values of any primitive type are treated as text.
 */
export function mergeRecord(current: MergeTarget, proposed: ProposedUpdate, options: MergeOptions = {}): MergeResult {
  const now = options.now ?? (() => new Date())
  const updates: FieldUpdates = {}
  const summary: ChangeSummary = []
  const ignored: IgnoredField[] = []

  for (const [field, rawValue] of Object.entries(proposed)) {
    const value = toText(rawValue)
    if (value === null) continue

    if (isProtectedField(field)) {
      ignored.push({ field, reason: "protected" })
      continue
    }

    if (field === NOTES_FIELD) {
      updates.notes = appendNoteEntry(current.notes, value, now())
      summary.push({ field, kind: "note_appended", message: "appended note entry" })
      continue
    }

    if (!isListField(field)) {
      ignored.push({ field, reason: "unknown_field" })
      continue
    }

    const outcome = mergeListField(field, current[field], value)
    if (outcome.value !== undefined) {
      updates[field] = outcome.value
    }
    summary.push(outcome.entry)
  }

  return { updates, summary, ignored }
}

export function hasUpdates(result: MergeResult): boolean {
  return Object.keys(result.updates).length > 0
}

/** Returns `current` with the merge result's updates applied. */
export function applyUpdates<T extends MergeTarget>(current: T, updates: FieldUpdates): T {
  return { ...current, ...updates }
}
