import { z } from "zod"
import type { prompts } from "@llm"

export type ExtractableField = prompts.patientFields.ExtractableField
export type ExtractedValue = string | number | null

/** Proposed update for one session, keyed by record column. */
export type ExtractedFields = Partial<Record<ExtractableField, ExtractedValue>>

function normalizeText(value: string): string | null {
  const trimmed = value.trim()
  return trimmed.length > 0 ? trimmed : null
}

function joinListItems(items: readonly (string | number)[]): string | null {
  const parts = items.map((item) => String(item).trim()).filter((item) => item.length > 0)
  return parts.length > 0 ? parts.join(", ") : null
}

/**
 * Models sometimes answer a list field with an array or a field with a boolean;
 * everything collapses to the column representation here.
 */
export const extractedValueSchema = z
  .union([z.string(), z.number(), z.boolean(), z.array(z.union([z.string(), z.number()])), z.null()])
  .optional()
  .transform((value): ExtractedValue => {
    if (value === undefined || value === null) return null
    if (typeof value === "string") return normalizeText(value)
    if (typeof value === "boolean") return String(value)
    if (Array.isArray(value)) return joinListItems(value)
    return Number.isFinite(value) ? value : null
  })

export const modelOutputSchema = z.record(z.unknown())
