import { z } from "zod"
import { recordNotFoundError } from "@pipeline-errors"
import { isMergeableField, type FieldUpdates, type PatientRecord } from "@record-merge"
import type { SqliteDatabase } from "./database"
import type { EditableField, PatientEdits, PatientIntake, PatientSummary } from "./types"

const CREATE_PATIENT_TABLE = `
  CREATE TABLE IF NOT EXISTS patient_records (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    first_name TEXT,
    last_name TEXT,
    age INTEGER,
    gender TEXT,
    date_of_birth DATE,
    symptoms TEXT,
    vital_signs TEXT,
    medications TEXT,
    allergies TEXT,
    medical_history TEXT,
    family_history TEXT,
    diagnosis TEXT,
    treatment_plan TEXT,
    follow_up_date DATE,
    notes TEXT,
    created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
    updated_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
  )
`

export const EDITABLE_FIELDS: readonly EditableField[] = [
  "first_name",
  "last_name",
  "age",
  "gender",
  "date_of_birth",
  "symptoms",
  "vital_signs",
  "medications",
  "allergies",
  "medical_history",
  "family_history",
  "diagnosis",
  "treatment_plan",
  "follow_up_date",
  "notes",
]

const editableFieldSet: ReadonlySet<string> = new Set(EDITABLE_FIELDS)

export function isEditableField(field: string): field is EditableField {
  return editableFieldSet.has(field)
}

const DEMO_PATIENT = {
  first_name: "John",
  last_name: "Doe",
  age: 45,
  gender: "Male",
  date_of_birth: "1979-01-15",
  symptoms: "Headache, Fever",
  vital_signs: "BP 120/80, Temp 38.5°C",
  medications: "Aspirin",
  allergies: "Penicillin",
  medical_history: "Hypertension",
  family_history: "Father: Heart Disease",
  diagnosis: "Common Cold",
  treatment_plan: "Rest and fluids",
  follow_up_date: "2024-02-15",
  notes: "Patient reports feeling better",
}

// DATE columns have numeric affinity, so SQLite may hand back numbers.
const nullableText = z
  .union([z.string(), z.number()])
  .nullable()
  .transform((value) => (value === null ? null : String(value)))

const nullableAge = z
  .union([z.number(), z.string()])
  .nullable()
  .transform((value) => {
    if (value === null || typeof value === "number") return value
    const parsed = Number.parseInt(value, 10)
    return Number.isFinite(parsed) ? parsed : null
  })

const patientRowSchema = z.object({
  id: z.number().int(),
  first_name: nullableText,
  last_name: nullableText,
  age: nullableAge,
  gender: nullableText,
  date_of_birth: nullableText,
  symptoms: nullableText,
  vital_signs: nullableText,
  medications: nullableText,
  allergies: nullableText,
  medical_history: nullableText,
  family_history: nullableText,
  diagnosis: nullableText,
  treatment_plan: nullableText,
  follow_up_date: nullableText,
  notes: nullableText,
  created_at: z.string(),
  updated_at: z.string(),
})

const patientSummarySchema = patientRowSchema.pick({
  id: true,
  first_name: true,
  last_name: true,
  age: true,
  gender: true,
})

function isBlank(value: string | number): boolean {
  return typeof value === "string" && value.trim().length === 0
}

/**
 * Patient records persisted in the `patient_records` table.
 * Mergeable columns keep their comma-joined text format.
 */
export class PatientStore {
  constructor(private readonly db: SqliteDatabase) {}

  initialize(): void {
    this.db.exec(CREATE_PATIENT_TABLE)
  }

  countPatients(): number {
    const row = z.object({ count: z.number() }).parse(this.db.get("SELECT COUNT(*) AS count FROM patient_records"))
    return row.count
  }

  /** Inserts a demonstration patient into an empty table. Returns its id, or null when patients exist. */
  seedDemoPatient(): number | null {
    if (this.countPatients() > 0) {
      return null
    }
    const result = this.db.run(
      `INSERT INTO patient_records (
          first_name, last_name, age, gender, date_of_birth,
          symptoms, vital_signs, medications, allergies,
          medical_history, family_history, diagnosis,
          treatment_plan, follow_up_date, notes
        ) VALUES (
          @first_name, @last_name, @age, @gender, @date_of_birth,
          @symptoms, @vital_signs, @medications, @allergies,
          @medical_history, @family_history, @diagnosis,
          @treatment_plan, @follow_up_date, @notes
        )`,
      DEMO_PATIENT,
    )
    return result.lastInsertRowid
  }

  createPatient(intake: PatientIntake): PatientRecord {
    const result = this.db.run(
      `INSERT INTO patient_records (first_name, last_name, age, gender, date_of_birth)
       VALUES (@first_name, @last_name, @age, @gender, @date_of_birth)`,
      {
        first_name: intake.first_name,
        last_name: intake.last_name,
        age: intake.age ?? null,
        gender: intake.gender ?? null,
        date_of_birth: intake.date_of_birth ?? null,
      },
    )
    return this.requirePatient(result.lastInsertRowid)
  }

  getPatient(patientId: number): PatientRecord | null {
    const row = this.db.get("SELECT * FROM patient_records WHERE id = ?", [patientId])
    return row === undefined ? null : patientRowSchema.parse(row)
  }

  requirePatient(patientId: number): PatientRecord {
    const patient = this.getPatient(patientId)
    if (!patient) {
      throw recordNotFoundError(patientId)
    }
    return patient
  }

  listPatients(): PatientSummary[] {
    const rows = this.db.all("SELECT id, first_name, last_name, age, gender FROM patient_records ORDER BY id")
    return rows.map((row) => patientSummarySchema.parse(row))
  }

  /**
   * Writes merge engine output. Only mergeable columns are accepted; an empty
   * update performs no write and leaves `updated_at` alone.
   */
  updateFields(patientId: number, updates: FieldUpdates): boolean {
    const values: Record<string, string | number> = { id: patientId }
    const columns: string[] = []
    for (const column of Object.keys(updates).filter(isMergeableField)) {
      const value = updates[column]
      if (value === undefined) continue
      columns.push(column)
      values[column] = value
    }
    if (columns.length === 0) {
      return false
    }
    return this.runUpdate(patientId, columns, values)
  }

  /** Clinician manual entry. Blank values are dropped; an empty edit is a no-op. */
  updatePatientDetails(patientId: number, edits: PatientEdits): boolean {
    const values: Record<string, string | number> = { id: patientId }
    const columns: EditableField[] = []
    for (const column of EDITABLE_FIELDS) {
      const value = edits[column]
      if (value === undefined || value === null || isBlank(value)) continue
      columns.push(column)
      values[column] = value
    }
    if (columns.length === 0) {
      return false
    }
    return this.runUpdate(patientId, columns, values)
  }

  private runUpdate(patientId: number, columns: readonly string[], values: Record<string, string | number>): boolean {
    const assignments = columns.map((column) => `${column} = @${column}`).join(", ")
    const result = this.db.run(
      `UPDATE patient_records SET ${assignments}, updated_at = CURRENT_TIMESTAMP WHERE id = @id`,
      values,
    )
    if (result.changes === 0) {
      throw recordNotFoundError(patientId)
    }
    return true
  }
}
