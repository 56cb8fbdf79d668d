import {
  FIELD_LABELS,
  MERGEABLE_FIELDS,
  formatPatientName,
  type ChangeSummary,
  type PatientRecord,
} from "@record-merge"

const NOT_RECORDED = "Not recorded"

function valueOrPlaceholder(value: string | number | null): string {
  if (value === null) return NOT_RECORDED
  const text = String(value).trim()
  return text.length > 0 ? text : NOT_RECORDED
}

export function renderPatientReport(record: PatientRecord): string {
  const name = formatPatientName(record) || "Unnamed patient"

  const header = [
    `Patient: ${name} (ID ${record.id})`,
    `${FIELD_LABELS.age}: ${valueOrPlaceholder(record.age)}`,
    `${FIELD_LABELS.gender}: ${valueOrPlaceholder(record.gender)}`,
    `${FIELD_LABELS.date_of_birth}: ${valueOrPlaceholder(record.date_of_birth)}`,
    `${FIELD_LABELS.updated_at}: ${record.updated_at}`,
  ]

  const sections = MERGEABLE_FIELDS.map((field) =>
    [`${FIELD_LABELS[field]}:`, valueOrPlaceholder(record[field])].join("\n"),
  )

  return [header.join("\n"), ...sections].join("\n\n")
}

export function renderChangeSummary(summary: ChangeSummary): string {
  if (summary.length === 0) {
    return "No changes"
  }
  return summary.map((entry) => `- ${FIELD_LABELS[entry.field]}: ${entry.message}`).join("\n")
}
