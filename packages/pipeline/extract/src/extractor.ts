import { PipelineStageError } from "@pipeline-errors"
import { prompts, runLLMRequest, type LLMRequest } from "@llm"
import { debugLog, debugLogPHI } from "@storage/debug-logger"
import { parseJsonObject } from "./json"
import { extractedValueSchema, modelOutputSchema, type ExtractedFields } from "./schema"

export type LLMRunner = (request: LLMRequest) => Promise<string>

export interface ExtractPatientFieldsOptions {
  runRequest?: LLMRunner
  model?: string
  apiKey?: string
}

const EXTRACTION_TEMPERATURE = 0

/**
 * Validates raw model output against the field vocabulary.
 * Unknown keys are dropped; a value of the wrong shape fails the whole extraction.
 */
export function parseExtractedFields(rawOutput: string): ExtractedFields {
  const parsed = modelOutputSchema.safeParse(parseJsonObject(rawOutput))
  if (!parsed.success) {
    throw new PipelineStageError("extraction_error", "Model output is not a JSON object", true)
  }

  const fields: ExtractedFields = {}
  const invalid: string[] = []
  for (const field of prompts.patientFields.currentVersion.EXTRACTABLE_FIELDS) {
    if (!(field in parsed.data)) continue
    const value = extractedValueSchema.safeParse(parsed.data[field])
    if (value.success) {
      fields[field] = value.data
    } else {
      invalid.push(field)
    }
  }

  if (invalid.length > 0) {
    throw new PipelineStageError("extraction_error", `Model output has invalid values for: ${invalid.join(", ")}`, true, {
      fields: invalid,
    })
  }
  return fields
}

export async function extractPatientFields(
  transcript: string,
  options: ExtractPatientFieldsOptions = {},
): Promise<ExtractedFields> {
  if (!transcript || transcript.trim().length === 0) {
    debugLog("Transcript is empty - skipping field extraction")
    return {}
  }

  const version = prompts.patientFields.currentVersion
  const runRequest = options.runRequest ?? runLLMRequest

  debugLog(`Extracting patient fields (prompt ${version.PROMPT_VERSION}, ${transcript.length} characters)`)
  debugLogPHI("Transcript for extraction:", transcript)

  const rawOutput = await runRequest({
    system: version.getSystemPrompt(),
    prompt: version.getUserPrompt({ transcript }),
    model: options.model,
    apiKey: options.apiKey,
    temperature: EXTRACTION_TEMPERATURE,
    jsonSchema: {
      name: version.TOOL_NAME,
      description: "Return the patient information extracted from the transcript",
      schema: version.PATIENT_FIELDS_SCHEMA,
    },
  })

  const fields = parseExtractedFields(rawOutput)
  debugLog(`Extracted ${Object.values(fields).filter((value) => value !== null).length} non-empty fields`)
  debugLogPHI("Extracted fields:", fields)
  return fields
}
