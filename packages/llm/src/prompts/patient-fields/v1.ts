/**
 * Patient Field Extraction Prompt - Version 1
 * Turns a visit transcript into column values for the patient record
 */

import { FIELD_LABELS, LIST_FIELDS, NOTES_FIELD } from "@record-merge"

export interface PatientFieldsPromptParams {
  transcript: string
}

export const PROMPT_VERSION = "v1"
export const MODEL_OPTIMIZED_FOR = "claude-sonnet-4-5-20250929"
export const TOOL_NAME = "PatientFields"

export const DEMOGRAPHIC_FIELDS = ["first_name", "last_name", "age", "gender", "date_of_birth"] as const

export const EXTRACTABLE_FIELDS = [...DEMOGRAPHIC_FIELDS, ...LIST_FIELDS, NOTES_FIELD] as const

export type ExtractableField = (typeof EXTRACTABLE_FIELDS)[number]

const FIELD_GUIDANCE: Record<ExtractableField, string> = {
  first_name: "Patient's first name if stated",
  last_name: "Patient's last name if stated",
  age: "Age in whole years",
  gender: "Gender as stated",
  date_of_birth: "Date of birth as YYYY-MM-DD",
  symptoms: "Current symptoms as a comma-separated list",
  vital_signs: "Measured vital signs as a comma-separated list, e.g. BP 140/90, HR 88",
  medications: "Current medications as a comma-separated list, with doses when stated",
  allergies: "Allergies as a comma-separated list",
  medical_history: "Past conditions, surgeries and chronic illnesses as a comma-separated list",
  family_history: "Relevant family history as a comma-separated list",
  diagnosis: "Diagnoses or working impressions as a comma-separated list",
  treatment_plan: "Treatments, prescriptions and instructions as a comma-separated list",
  follow_up_date: "Follow-up date as YYYY-MM-DD, converting relative dates",
  notes: "Other clinically relevant remarks as free text",
}

/**
 * JSON Schema for the extraction tool
 * Every field is required and nullable so the model states "unknown" explicitly
 */
export const PATIENT_FIELDS_SCHEMA = {
  type: "object",
  properties: Object.fromEntries(
    EXTRACTABLE_FIELDS.map((field) => [
      field,
      {
        type: field === "age" ? ["integer", "null"] : ["string", "null"],
        description: `${FIELD_LABELS[field]}: ${FIELD_GUIDANCE[field]}. null if not mentioned.`,
      },
    ]),
  ),
  required: [...EXTRACTABLE_FIELDS],
  additionalProperties: false,
}

export function getSystemPrompt(): string {
  const fieldList = EXTRACTABLE_FIELDS.map((field) => `- ${field}: ${FIELD_GUIDANCE[field]} (null if not mentioned)`).join("\n")

  return `You are a medical data extraction assistant. Your task is to extract medical information from a clinical conversation and return it as a JSON object.

FIELDS TO EXTRACT:
${fieldList}

GUIDELINES:
1. Extract both explicit and clearly implied information
2. Convert relative dates to actual dates
3. Include all mentioned symptoms
4. Include past conditions in medical history
5. Use null for missing information, never placeholders such as "None" or "Not mentioned"
6. List-like fields are plain strings with items separated by commas
7. Age is an integer
8. Do NOT infer diagnoses, medications or vitals that were not discussed

Return valid JSON only. No markdown, no code fences, no explanatory text.`
}

export function getUserPrompt(params: PatientFieldsPromptParams): string {
  const { transcript } = params

  return `Analyze this visit transcript and return only a JSON object with the extracted information:

TRANSCRIPT:
${transcript}`
}

export const PROMPT_METADATA = {
  version: PROMPT_VERSION,
  created_at: "2025-01-20",
  optimized_for: MODEL_OPTIMIZED_FOR,
  description: "Field extraction for merging into the patient record",
  changelog: ["Initial release with nullable fields and comma-separated list values"],
} as const
