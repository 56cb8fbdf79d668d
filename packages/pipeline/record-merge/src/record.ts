/**
 * Patient record model.
 *
 * Column names match the `patient_records` table so records and proposed
 * updates flow between the store, the extractor and the merge engine unchanged.
 */

export const PROTECTED_FIELDS = [
  "id",
  "first_name",
  "last_name",
  "age",
  "gender",
  "date_of_birth",
  "created_at",
  "updated_at",
] as const

export const LIST_FIELDS = [
  "symptoms",
  "vital_signs",
  "medications",
  "allergies",
  "medical_history",
  "family_history",
  "diagnosis",
  "treatment_plan",
  "follow_up_date",
] as const

export const NOTES_FIELD = "notes"

export const MERGEABLE_FIELDS = [...LIST_FIELDS, NOTES_FIELD] as const

export type ProtectedField = (typeof PROTECTED_FIELDS)[number]
export type ListField = (typeof LIST_FIELDS)[number]
export type NotesField = typeof NOTES_FIELD
export type MergeableField = (typeof MERGEABLE_FIELDS)[number]
export type RecordField = ProtectedField | MergeableField

export interface PatientDemographics {
  first_name: string | null
  last_name: string | null
  age: number | null
  gender: string | null
  date_of_birth: string | null
}

export type ClinicalFields = Record<MergeableField, string | null>

export interface PatientRecord extends PatientDemographics, ClinicalFields {
  id: number
  created_at: string
  updated_at: string
}

/** Mergeable columns of a record; anything else on the object is ignored. */
export type MergeTarget = Partial<ClinicalFields>

export type ProposedValue = string | number | boolean | null | undefined

/** Partial field map produced per recording session, keyed by column name. */
export type ProposedUpdate = Readonly<Record<string, ProposedValue>>

export type FieldUpdates = Partial<Record<MergeableField, string>>

const protectedFieldSet: ReadonlySet<string> = new Set(PROTECTED_FIELDS)
const listFieldSet: ReadonlySet<string> = new Set(LIST_FIELDS)
const mergeableFieldSet: ReadonlySet<string> = new Set(MERGEABLE_FIELDS)

export function isProtectedField(field: string): field is ProtectedField {
  return protectedFieldSet.has(field)
}

export function isListField(field: string): field is ListField {
  return listFieldSet.has(field)
}

export function isMergeableField(field: string): field is MergeableField {
  return mergeableFieldSet.has(field)
}

export const FIELD_LABELS: Record<RecordField, string> = {
  id: "Patient ID",
  first_name: "First Name",
  last_name: "Last Name",
  age: "Age",
  gender: "Gender",
  date_of_birth: "Date of Birth",
  created_at: "Created",
  updated_at: "Last Updated",
  symptoms: "Symptoms",
  vital_signs: "Vital Signs",
  medications: "Medications",
  allergies: "Allergies",
  medical_history: "Medical History",
  family_history: "Family History",
  diagnosis: "Diagnosis",
  treatment_plan: "Treatment Plan",
  follow_up_date: "Follow-up Date",
  notes: "Notes",
}

export function formatPatientName(record: Pick<PatientDemographics, "first_name" | "last_name">): string {
  return [record.first_name, record.last_name]
    .filter((part): part is string => typeof part === "string" && part.trim().length > 0)
    .join(" ")
}
