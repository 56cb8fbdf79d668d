import { parseArgs } from "node:util"
import { PipelineStageError } from "@pipeline-errors"
import { isEditableField, type AuditEventType, type PatientEdits } from "@storage"

export interface CommandLine {
  command: string | undefined
  positionals: string[]
  values: Record<string, string | boolean | undefined>
}

const KNOWN_OPTIONS = {
  help: { type: "boolean", short: "h" },
  "first-name": { type: "string" },
  "last-name": { type: "string" },
  age: { type: "string" },
  gender: { type: "string" },
  dob: { type: "string" },
  limit: { type: "string" },
  event: { type: "string" },
} as const

function invalidInput(message: string): PipelineStageError {
  return new PipelineStageError("validation_error", message, true)
}

/**
 * Parses `visit-assistant <command> [args]`. Unknown `--field=value` options
 * are kept so `edit` can take any record column.
 */
export function parseCommandLine(argv: readonly string[]): CommandLine {
  const { values, positionals } = parseArgs({
    args: [...argv],
    options: KNOWN_OPTIONS,
    allowPositionals: true,
    strict: false,
  })

  const flat: Record<string, string | boolean | undefined> = {}
  for (const [key, value] of Object.entries(values)) {
    flat[key] = typeof value === "string" || typeof value === "boolean" ? value : undefined
  }

  const [command, ...rest] = positionals
  return { command, positionals: rest, values: flat }
}

export function parsePatientId(raw: string | undefined): number {
  if (!raw || !/^\d+$/.test(raw)) {
    throw invalidInput(`Expected a numeric patient ID, got "${raw ?? ""}"`)
  }
  return Number(raw)
}

export function parseAge(raw: string): number {
  const age = Number(raw.trim())
  if (!Number.isInteger(age) || age < 0 || age > 150) {
    throw invalidInput(`Age must be a whole number of years, got "${raw}"`)
  }
  return age
}

export function parseLimit(raw: string | boolean | undefined, fallback: number): number {
  if (typeof raw !== "string") return fallback
  const limit = Number(raw)
  if (!Number.isInteger(limit) || limit <= 0) {
    throw invalidInput(`--limit must be a positive integer, got "${raw}"`)
  }
  return limit
}

const AUDIT_EVENT_TYPES: readonly AuditEventType[] = [
  "patient.created",
  "record.edited",
  "session.started",
  "session.completed",
  "session.cancelled",
  "session.failed",
  "transcription.completed",
  "transcription.failed",
  "extraction.completed",
  "extraction.failed",
  "record.merged",
  "record.unchanged",
]

export function parseAuditEventType(raw: string | boolean | undefined): AuditEventType | undefined {
  if (typeof raw !== "string") return undefined
  const match = AUDIT_EVENT_TYPES.find((type) => type === raw)
  if (!match) {
    throw invalidInput(`Unknown audit event "${raw}". Expected one of: ${AUDIT_EVENT_TYPES.join(", ")}`)
  }
  return match
}

/** `--symptoms="Cough, Fever"` or `--date-of-birth=1980-04-02` become column edits. */
export function parseEdits(values: CommandLine["values"]): PatientEdits {
  const edits: PatientEdits = {}
  for (const [key, value] of Object.entries(values)) {
    if (key === "help") continue
    const field = key === "dob" ? "date_of_birth" : key.replace(/-/g, "_")
    if (!isEditableField(field)) {
      throw invalidInput(`Unknown field "${key}"`)
    }
    if (typeof value !== "string") {
      throw invalidInput(`Field "${key}" needs a value: --${key}=<value>`)
    }
    edits[field] = field === "age" && value.trim().length > 0 ? parseAge(value) : value
  }
  return edits
}
