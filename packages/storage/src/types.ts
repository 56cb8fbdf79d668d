import type { ClinicalFields, PatientDemographics } from "@record-merge"

export interface PatientIntake {
  first_name: string
  last_name: string
  age?: number | null
  gender?: string | null
  date_of_birth?: string | null
}

export type PatientSummary = Pick<PatientDemographics, "first_name" | "last_name" | "age" | "gender"> & {
  id: number
}

export type EditableField = keyof PatientDemographics | keyof ClinicalFields

/** Clinician edits from the manual entry form. Blank values are dropped. */
export type PatientEdits = Partial<Record<EditableField, string | number | null>>

export type AuditEventType =
  | "patient.created"
  | "record.edited"
  | "session.started"
  | "session.completed"
  | "session.cancelled"
  | "session.failed"
  | "transcription.completed"
  | "transcription.failed"
  | "extraction.completed"
  | "extraction.failed"
  | "record.merged"
  | "record.unchanged"

export interface AuditEntryInput {
  event_type: AuditEventType
  resource_id?: string
  success: boolean
  error_message?: string
  metadata?: Record<string, unknown>
}

export interface AuditLogEntry {
  id: number
  event_type: AuditEventType
  resource_id: string | null
  success: boolean
  error_message: string | null
  metadata: Record<string, unknown>
  created_at: string
}

export interface AuditLogFilter {
  event_type?: AuditEventType
  resource_id?: string
  limit?: number
}

export interface AuditSink {
  write(entry: AuditEntryInput): void
}
