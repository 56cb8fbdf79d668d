import { toPipelineError, type PipelineError } from "@pipeline-errors"

export function toAudioIngestError(error: unknown): PipelineError {
  return toPipelineError(error, {
    code: "capture_error",
    message: "Failed to capture audio",
    recoverable: true,
  })
}
