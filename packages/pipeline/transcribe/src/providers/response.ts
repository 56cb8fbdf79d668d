import { z } from "zod"
import { PipelineStageError } from "@pipeline-errors"

const transcriptionResponseSchema = z.object({
  text: z.string().optional(),
})

export async function readTranscriptText(response: Response, provider: string): Promise<string> {
  const parsed = transcriptionResponseSchema.safeParse(await response.json())
  if (!parsed.success) {
    throw new PipelineStageError("transcription_error", "Transcription response did not match the expected shape", true, {
      provider,
    })
  }
  return parsed.data.text?.trim() ?? ""
}
