import { PipelineStageError } from "@pipeline-errors"
import { readTranscriptText } from "./response"

const DEFAULT_WHISPER_URL = "https://api.openai.com/v1/audio/transcriptions"
const DEFAULT_WHISPER_MODEL = "whisper-1"

export interface WhisperOpenAITranscriberOptions {
  apiKey?: string
  url?: string
  model?: string
  fetchFn?: typeof fetch
}

/**
 * Recordings are PHI: external endpoints must use HTTPS so audio is encrypted in transit.
 */
function validateHttpsUrl(url: string, serviceName: string): void {
  let parsed: URL
  try {
    parsed = new URL(url)
  } catch {
    throw new PipelineStageError("configuration_error", `Invalid ${serviceName} URL: ${url}`, false)
  }
  if (parsed.protocol !== "https:") {
    throw new PipelineStageError(
      "configuration_error",
      `SECURITY ERROR: ${serviceName} endpoint must use HTTPS. ` + `Received: ${parsed.protocol}//${parsed.host}`,
      false,
    )
  }
}

export async function transcribeWavBuffer(
  buffer: Buffer,
  filename: string,
  options: WhisperOpenAITranscriberOptions = {},
): Promise<string> {
  const whisperUrl = options.url || process.env.WHISPER_OPENAI_URL || DEFAULT_WHISPER_URL
  const whisperModel = options.model || process.env.WHISPER_OPENAI_MODEL || DEFAULT_WHISPER_MODEL
  const fetchFn = options.fetchFn ?? globalThis.fetch.bind(globalThis)

  // Validate HTTPS before sending any PHI
  validateHttpsUrl(whisperUrl, "Whisper API")

  const key = options.apiKey || process.env.OPENAI_API_KEY
  if (!key) {
    throw new PipelineStageError(
      "configuration_error",
      "Missing OPENAI_API_KEY. Set it in your .env file or switch TRANSCRIPTION_PROVIDER to whisper_local.",
      false,
    )
  }
  const formData = new FormData()
  const blob = new Blob([new Uint8Array(buffer)], { type: "audio/wav" })
  formData.append("file", blob, filename)
  formData.append("model", whisperModel)

  const response = await fetchFn(whisperUrl, {
    method: "POST",
    headers: {
      Authorization: `Bearer ${key}`,
    },
    body: formData,
  })

  if (!response.ok) {
    const errorText = await response.text()
    throw new PipelineStageError("api_error", `Transcription failed: ${response.status} ${errorText}`, true, {
      status: response.status,
      provider: "whisper_openai",
    })
  }

  return readTranscriptText(response, "whisper_openai")
}
