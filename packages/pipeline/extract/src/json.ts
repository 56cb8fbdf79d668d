import { PipelineStageError } from "@pipeline-errors"

/**
 * Pulls the JSON object out of model text.
 * Accepts bare JSON, a ```json fence, or an object surrounded by prose.
 */
export function extractJson(text: string): string {
  const trimmed = text.trim()
  if (trimmed.startsWith("{") && trimmed.endsWith("}")) {
    return trimmed
  }

  const fenceMatch = trimmed.match(/```(?:json)?\s*([\s\S]*?)\s*```/i)
  const fenced = fenceMatch?.[1]?.trim()
  if (fenced?.startsWith("{")) {
    return fenced
  }

  const firstBrace = trimmed.indexOf("{")
  const lastBrace = trimmed.lastIndexOf("}")
  if (firstBrace >= 0 && lastBrace > firstBrace) {
    return trimmed.slice(firstBrace, lastBrace + 1)
  }

  throw new PipelineStageError("extraction_error", "Unable to extract JSON from model output", true)
}

export function parseJsonObject(text: string): unknown {
  try {
    return JSON.parse(extractJson(text))
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new PipelineStageError("extraction_error", `Model output is not valid JSON: ${error.message}`, true)
    }
    throw error
  }
}
