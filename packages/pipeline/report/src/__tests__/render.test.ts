import assert from "node:assert/strict"
import { describe, it } from "node:test"
import type { PatientRecord } from "@record-merge"
import { renderChangeSummary, renderPatientReport } from "../index.js"

function record(overrides: Partial<PatientRecord> = {}): PatientRecord {
  return {
    id: 3,
    first_name: "Jane",
    last_name: "Roe",
    age: 61,
    gender: null,
    date_of_birth: "1964-05-02",
    symptoms: "Cough, Fever",
    vital_signs: null,
    medications: "Aspirin",
    allergies: "",
    medical_history: null,
    family_history: null,
    diagnosis: null,
    treatment_plan: null,
    follow_up_date: null,
    notes: "[2025-01-15 10:30:00]\nFeeling better",
    created_at: "2025-01-01 09:00:00",
    updated_at: "2025-01-15 10:30:05",
    ...overrides,
  }
}

describe("renderPatientReport", () => {
  it("renders demographics followed by every clinical section", () => {
    const report = renderPatientReport(record())
    const blocks = report.split("\n\n")

    assert.equal(
      blocks[0],
      [
        "Patient: Jane Roe (ID 3)",
        "Age: 61",
        "Gender: Not recorded",
        "Date of Birth: 1964-05-02",
        "Last Updated: 2025-01-15 10:30:05",
      ].join("\n"),
    )
    assert.equal(blocks[1], "Symptoms:\nCough, Fever")
    assert.equal(blocks[2], "Vital Signs:\nNot recorded")
    assert.equal(blocks[4], "Allergies:\nNot recorded")
    assert.equal(blocks[blocks.length - 1], "Notes:\n[2025-01-15 10:30:00]\nFeeling better")
  })

  it("labels a patient without a name", () => {
    const report = renderPatientReport(record({ first_name: null, last_name: " " }))

    assert.ok(report.startsWith("Patient: Unnamed patient (ID 3)\n"))
  })
})

describe("renderChangeSummary", () => {
  it("renders one line per entry", () => {
    const text = renderChangeSummary([
      { field: "symptoms", kind: "added", message: "added new items: Cough", addedItems: ["Cough"] },
      { field: "medications", kind: "initial", message: "set initial value" },
      { field: "notes", kind: "note_appended", message: "appended note entry" },
    ])

    assert.equal(
      text,
      ["- Symptoms: added new items: Cough", "- Medications: set initial value", "- Notes: appended note entry"].join(
        "\n",
      ),
    )
  })

  it("says so when nothing changed", () => {
    assert.equal(renderChangeSummary([]), "No changes")
  })
})
