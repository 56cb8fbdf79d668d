import { z } from "zod"
import type { SqliteDatabase } from "./database"
import type { AuditEntryInput, AuditEventType, AuditLogEntry, AuditLogFilter, AuditSink } from "./types"

const CREATE_AUDIT_TABLE = `
  CREATE TABLE IF NOT EXISTS audit_log (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    event_type TEXT NOT NULL,
    resource_id TEXT,
    success INTEGER NOT NULL,
    error_message TEXT,
    metadata TEXT NOT NULL DEFAULT '{}',
    created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
  )
`

const DEFAULT_LIST_LIMIT = 100

const auditEventTypeSchema = z.enum([
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
]) satisfies z.ZodType<AuditEventType>

const metadataSchema = z.record(z.unknown())

const auditRowSchema = z.object({
  id: z.number().int(),
  event_type: auditEventTypeSchema,
  resource_id: z.string().nullable(),
  success: z.number().transform((value) => value === 1),
  error_message: z.string().nullable(),
  metadata: z.string().transform((value): Record<string, unknown> => {
    try {
      const parsed = metadataSchema.safeParse(JSON.parse(value))
      return parsed.success ? parsed.data : {}
    } catch {
      return {}
    }
  }),
  created_at: z.string(),
})

/**
 * Append-only audit trail of pipeline events, stored beside patient records.
 * Metadata holds counts, field names and provider names, never transcript text.
 */
export class AuditLog implements AuditSink {
  constructor(private readonly db: SqliteDatabase) {}

  initialize(): void {
    this.db.exec(CREATE_AUDIT_TABLE)
  }

  write(entry: AuditEntryInput): void {
    this.db.run(
      `INSERT INTO audit_log (event_type, resource_id, success, error_message, metadata)
       VALUES (@event_type, @resource_id, @success, @error_message, @metadata)`,
      {
        event_type: entry.event_type,
        resource_id: entry.resource_id ?? null,
        success: entry.success ? 1 : 0,
        error_message: entry.error_message ?? null,
        metadata: JSON.stringify(entry.metadata ?? {}),
      },
    )
  }

  /** Most recent entries first. */
  list(filter: AuditLogFilter = {}): AuditLogEntry[] {
    const conditions: string[] = []
    const params: Record<string, string | number> = { limit: filter.limit ?? DEFAULT_LIST_LIMIT }
    if (filter.event_type) {
      conditions.push("event_type = @event_type")
      params.event_type = filter.event_type
    }
    if (filter.resource_id) {
      conditions.push("resource_id = @resource_id")
      params.resource_id = filter.resource_id
    }
    const where = conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : ""
    const rows = this.db.all(`SELECT * FROM audit_log ${where} ORDER BY id DESC LIMIT @limit`, params)
    return rows.map((row) => auditRowSchema.parse(row))
  }
}
