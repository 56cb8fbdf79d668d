import assert from "node:assert/strict"
import { describe, it } from "node:test"
import { applyUpdates, hasUpdates, mergeRecord } from "../merge.js"
import { MERGEABLE_FIELDS, PROTECTED_FIELDS, type MergeTarget } from "../record.js"

const at = (iso: [number, number, number, number, number, number]) => () =>
  new Date(iso[0], iso[1] - 1, iso[2], iso[3], iso[4], iso[5])

describe("mergeRecord list fields", () => {
  it("treats items differing only in case as already present", () => {
    const result = mergeRecord({ symptoms: "Fever" }, { symptoms: "fever" })
    assert.deepEqual(result.updates, {})
    assert.deepEqual(result.summary, [{ field: "symptoms", kind: "unchanged", message: "no new items to add" }])
    assert.equal(hasUpdates(result), false)
  })

  it("stores the sorted union and reports the added items", () => {
    const result = mergeRecord({ symptoms: "Fever" }, { symptoms: "Fever, Cough" })
    assert.deepEqual(result.updates, { symptoms: "Cough, Fever" })
    assert.deepEqual(result.summary, [
      { field: "symptoms", kind: "added", message: "added new items: Cough", addedItems: ["Cough"] },
    ])
  })

  it("sets the proposed value verbatim when the current value is null", () => {
    const result = mergeRecord({ medications: null }, { medications: "Aspirin" })
    assert.deepEqual(result.updates, { medications: "Aspirin" })
    assert.deepEqual(result.summary, [{ field: "medications", kind: "initial", message: "set initial value" }])
  })

  it("treats empty string and the literal None as unset", () => {
    const result = mergeRecord(
      { allergies: "None", diagnosis: "" },
      { allergies: "Penicillin, latex", diagnosis: "Common cold" },
    )
    assert.deepEqual(result.updates, { allergies: "Penicillin, latex", diagnosis: "Common cold" })
    assert.deepEqual(
      result.summary.map((entry) => entry.kind),
      ["initial", "initial"],
    )
  })

  it("sorts by lowercase form regardless of input order", () => {
    const result = mergeRecord({ medications: "Zinc" }, { medications: "Iron, b12" })
    assert.equal(result.updates.medications, "b12, Iron, Zinc")
    assert.equal(result.summary[0]?.message, "added new items: b12, Iron")
  })

  it("sorts characters outside the BMP after the rest of the BMP", () => {
    const result = mergeRecord({ symptoms: "a" }, { symptoms: "\uFF41x, \u{1F600}y" })
    assert.equal(result.updates.symptoms, "a, \uFF41x, \u{1F600}y")
  })

  it("prefers proposed casing, then current casing", () => {
    const result = mergeRecord({ medications: "ASPIRIN, Lisinopril" }, { medications: "aspirin, Metformin" })
    assert.equal(result.updates.medications, "aspirin, Lisinopril, Metformin")
  })

  it("splits on commas only", () => {
    const result = mergeRecord({ medical_history: "Asthma" }, { medical_history: "Eczema; Hay fever" })
    assert.equal(result.updates.medical_history, "Asthma, Eczema; Hay fever")
    assert.deepEqual(result.summary[0]?.addedItems, ["Eczema; Hay fever"])
  })

  it("drops blank and none tokens from both sides", () => {
    const unchanged = mergeRecord({ medications: "Aspirin" }, { medications: "none, NONE, , Aspirin" })
    assert.deepEqual(unchanged.updates, {})

    const fromPlaceholders = mergeRecord({ symptoms: " , none" }, { symptoms: "Cough" })
    assert.deepEqual(fromPlaceholders.updates, { symptoms: "Cough" })
    assert.equal(fromPlaceholders.summary[0]?.kind, "added")
  })

  it("coerces numeric values to text", () => {
    const result = mergeRecord({ vital_signs: null }, { vital_signs: 120 })
    assert.deepEqual(result.updates, { vital_signs: "120" })
  })
})

describe("mergeRecord notes", () => {
  it("writes a timestamped entry when there are no notes yet", () => {
    const result = mergeRecord({ notes: "" }, { notes: "Feeling better" }, { now: at([2024, 2, 15, 9, 30, 5]) })
    assert.deepEqual(result.updates, { notes: "[2024-02-15 09:30:05]\nFeeling better" })
    assert.deepEqual(result.summary, [{ field: "notes", kind: "note_appended", message: "appended note entry" }])
  })

  it("appends after existing notes with a blank line", () => {
    const result = mergeRecord(
      { notes: "[2024-02-15 09:30:05]\nA" },
      { notes: "B" },
      { now: at([2024, 2, 16, 10, 0, 0]) },
    )
    assert.equal(result.updates.notes, "[2024-02-15 09:30:05]\nA\n\n[2024-02-16 10:00:00]\nB")
  })

  it("treats a null current value like an empty one", () => {
    const result = mergeRecord({ notes: null }, { notes: "Follow up by phone" }, { now: at([2025, 11, 3, 14, 5, 0]) })
    assert.equal(result.updates.notes, "[2025-11-03 14:05:00]\nFollow up by phone")
  })
})

describe("mergeRecord protection and no-ops", () => {
  it("never writes protected fields", () => {
    const result = mergeRecord(
      { symptoms: null },
      { id: 9, first_name: "Jane", last_name: "Roe", age: 51, gender: "Female", created_at: "2020-01-01" },
    )
    assert.deepEqual(result.updates, {})
    assert.deepEqual(result.summary, [])
    assert.deepEqual(
      result.ignored.map((entry) => [entry.field, entry.reason]),
      [
        ["id", "protected"],
        ["first_name", "protected"],
        ["last_name", "protected"],
        ["age", "protected"],
        ["gender", "protected"],
        ["created_at", "protected"],
      ],
    )
  })

  it("ignores every protected field alongside mergeable ones", () => {
    for (const field of PROTECTED_FIELDS) {
      const result = mergeRecord({ diagnosis: null }, { [field]: "overwrite", diagnosis: "Migraine" })
      assert.equal(field in result.updates, false, `${field} must not be written`)
      assert.deepEqual(result.updates, { diagnosis: "Migraine" })
    }
  })

  it("reports fields outside the vocabulary as unknown", () => {
    const result = mergeRecord({}, { patient_name: "John Smith" })
    assert.deepEqual(result.updates, {})
    assert.deepEqual(result.ignored, [{ field: "patient_name", reason: "unknown_field" }])
  })

  it("returns an empty result when every value is null or missing", () => {
    const proposed = Object.fromEntries(MERGEABLE_FIELDS.map((field) => [field, null]))
    const result = mergeRecord({ symptoms: "Fever", notes: "[2024-01-01 00:00:00]\nA" }, proposed)
    assert.deepEqual(result, { updates: {}, summary: [], ignored: [] })
    assert.deepEqual(mergeRecord({ symptoms: "Fever" }, {}), { updates: {}, summary: [], ignored: [] })
  })

  it("applies blank strings like any other value", () => {
    const result = mergeRecord({ symptoms: null, notes: "[2024-01-01 00:00:00]\nA" }, { symptoms: "  ", notes: "" }, {
      now: at([2024, 1, 2, 8, 0, 0]),
    })
    assert.deepEqual(result.updates, {
      symptoms: "  ",
      notes: "[2024-01-01 00:00:00]\nA\n\n[2024-01-02 08:00:00]\n",
    })
    assert.deepEqual(result.summary, [
      { field: "symptoms", kind: "initial", message: "set initial value" },
      { field: "notes", kind: "note_appended", message: "appended note entry" },
    ])
  })

  it("adds nothing to a set list field from a blank string", () => {
    const result = mergeRecord({ symptoms: "Cough" }, { symptoms: "" })
    assert.deepEqual(result.updates, {})
    assert.deepEqual(result.summary, [{ field: "symptoms", kind: "unchanged", message: "no new items to add" }])
  })

  it("keeps summary entries in proposed key order", () => {
    const result = mergeRecord(
      { diagnosis: "Migraine", symptoms: null },
      { diagnosis: "migraine", symptoms: "Nausea" },
    )
    assert.deepEqual(
      result.summary.map((entry) => entry.field),
      ["diagnosis", "symptoms"],
    )
  })
})

describe("mergeRecord idempotence", () => {
  it("produces no further updates when the same list update is applied twice", () => {
    const record: MergeTarget = { symptoms: "Headache, Fever", medications: null, allergies: "None" }
    const proposed = { symptoms: "fever, Cough", medications: "Aspirin, Ibuprofen", allergies: "Penicillin" }

    const first = mergeRecord(record, proposed)
    assert.deepEqual(first.updates, {
      symptoms: "Cough, fever, Headache",
      medications: "Aspirin, Ibuprofen",
      allergies: "Penicillin",
    })

    const second = mergeRecord(applyUpdates(record, first.updates), proposed)
    assert.deepEqual(second.updates, {})
    assert.deepEqual(
      second.summary.map((entry) => entry.kind),
      ["unchanged", "unchanged", "unchanged"],
    )
  })

  it("appends notes on every application, which is expected for an append-only log", () => {
    const proposed = { notes: "Patient reports improvement" }
    const first = mergeRecord({ notes: null }, proposed, { now: at([2024, 3, 1, 8, 0, 0]) })
    const second = mergeRecord(applyUpdates({ notes: null }, first.updates), proposed, {
      now: at([2024, 3, 1, 8, 5, 0]),
    })

    assert.equal(
      second.updates.notes,
      "[2024-03-01 08:00:00]\nPatient reports improvement\n\n[2024-03-01 08:05:00]\nPatient reports improvement",
    )
  })
})
