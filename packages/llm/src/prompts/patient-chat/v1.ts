/**
 * Patient Chat Prompt - Version 1
 */

import { FIELD_LABELS, MERGEABLE_FIELDS, type PatientRecord } from "@record-merge"

export const PROMPT_VERSION = "v1"

export const BASE_SYSTEM_PROMPT = `You are an AI medical assistant helping healthcare professionals.
You can answer questions about the patient's medical history, current condition and treatment plan.
Keep a professional, clinical tone and refer to the patient information provided whenever it is relevant.
If the record does not contain the answer, say so instead of guessing.`

const NOT_RECORDED = "Not recorded"

/**
 * Patient context block for the system prompt.
 * Direct identifiers (name, date of birth) are left out: the assistant only needs the clinical picture.
 */
export function buildPatientContext(record: PatientRecord): string {
  const lines = [
    `${FIELD_LABELS.age}: ${record.age ?? NOT_RECORDED}`,
    `${FIELD_LABELS.gender}: ${record.gender || NOT_RECORDED}`,
    ...MERGEABLE_FIELDS.map((field) => `${FIELD_LABELS[field]}: ${record[field] || NOT_RECORDED}`),
  ]
  return `CURRENT PATIENT INFORMATION:\n${lines.join("\n")}`
}

export function getSystemPrompt(record?: PatientRecord | null): string {
  return record ? `${BASE_SYSTEM_PROMPT}\n\n${buildPatientContext(record)}` : BASE_SYSTEM_PROMPT
}
