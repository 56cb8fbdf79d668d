export { extractPatientFields, parseExtractedFields } from "./extractor"
export type { ExtractPatientFieldsOptions, LLMRunner } from "./extractor"
export { extractJson, parseJsonObject } from "./json"
export { extractedValueSchema } from "./schema"
export type { ExtractableField, ExtractedFields, ExtractedValue } from "./schema"
