export { mergeRecord, hasUpdates, applyUpdates } from "./merge"
export type {
  ChangeEntry,
  ChangeKind,
  ChangeSummary,
  IgnoredField,
  IgnoredReason,
  MergeOptions,
  MergeResult,
} from "./merge"
export { tokenizeItems, canonicalizeItem, unionItems, joinItems, ITEM_SEPARATOR } from "./items"
export type { ItemUnion } from "./items"
export { appendNoteEntry, formatNoteEntry, formatNoteTimestamp } from "./notes"
export {
  FIELD_LABELS,
  LIST_FIELDS,
  MERGEABLE_FIELDS,
  NOTES_FIELD,
  PROTECTED_FIELDS,
  formatPatientName,
  isListField,
  isMergeableField,
  isProtectedField,
} from "./record"
export type {
  ClinicalFields,
  FieldUpdates,
  ListField,
  MergeTarget,
  MergeableField,
  NotesField,
  PatientDemographics,
  PatientRecord,
  ProposedUpdate,
  ProposedValue,
  ProtectedField,
  RecordField,
} from "./record"
