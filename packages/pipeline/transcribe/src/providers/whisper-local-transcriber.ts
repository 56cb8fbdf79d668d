import { PipelineStageError } from "@pipeline-errors"
import { debugWarn } from "@storage/debug-logger"
import { readTranscriptText } from "./response"

const DEFAULT_WHISPER_LOCAL_URL = "http://127.0.0.1:8002/v1/audio/transcriptions"
const DEFAULT_WHISPER_LOCAL_MODEL = "tiny.en"
const DEFAULT_WHISPER_LANGUAGE = "auto"
const DEFAULT_TIMEOUT_MS = 15_000
const DEFAULT_MAX_RETRIES = 2

export interface WhisperLocalTranscriberOptions {
  baseUrl?: string
  model?: string
  language?: string
  timeoutMs?: number
  maxRetries?: number
  fetchFn?: typeof fetch
  waitFn?: (ms: number) => Promise<void>
}

function wait(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

/**
 * For localhost connections, HTTPS is not required since data never leaves the machine.
 * Only validate HTTPS for remote endpoints.
 */
function validateLocalOrHttpsUrl(url: string, serviceName: string): void {
  try {
    const parsed = new URL(url)
    const isLocalhost = parsed.hostname === "localhost" || parsed.hostname === "127.0.0.1" || parsed.hostname === "::1"
    const trustedHosts = (process.env.WHISPER_LOCAL_TRUSTED_HOSTS || "")
      .split(",")
      .map((host) => host.trim().toLowerCase())
      .filter(Boolean)
    const isTrustedHost = trustedHosts.includes(parsed.hostname.toLowerCase())

    if (!isLocalhost && !isTrustedHost && parsed.protocol !== "https:") {
      throw new PipelineStageError(
        "configuration_error",
        `SECURITY ERROR: ${serviceName} endpoint must use HTTPS, localhost, or a host listed in WHISPER_LOCAL_TRUSTED_HOSTS. ` +
          `Received: ${parsed.protocol}//${parsed.host}`,
        false,
      )
    }
  } catch (error) {
    if (error instanceof TypeError) {
      throw new PipelineStageError("configuration_error", `Invalid ${serviceName} URL: ${url}`, false)
    }
    throw error
  }
}

function resolvePositiveInteger(value: string | undefined, fallback: number): number {
  if (!value) return fallback
  const parsed = Number.parseInt(value, 10)
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback
}

async function fetchWithTimeout(fetchFn: typeof fetch, timeoutMs: number, url: string, init: RequestInit): Promise<Response> {
  const controller = new AbortController()
  const timeout = setTimeout(() => controller.abort(), timeoutMs)
  try {
    return await fetchFn(url, { ...init, signal: controller.signal })
  } finally {
    clearTimeout(timeout)
  }
}

function shouldRetryStatus(status: number): boolean {
  return status === 408 || status === 425 || status === 429 || status >= 500
}

export async function transcribeWavBuffer(
  buffer: Buffer,
  filename: string,
  options?: WhisperLocalTranscriberOptions,
): Promise<string> {
  const url = options?.baseUrl || process.env.WHISPER_LOCAL_URL || DEFAULT_WHISPER_LOCAL_URL
  const model = options?.model || process.env.WHISPER_LOCAL_MODEL || DEFAULT_WHISPER_LOCAL_MODEL
  const language = model.endsWith(".en") ? "en" : options?.language || process.env.WHISPER_LANGUAGE || DEFAULT_WHISPER_LANGUAGE
  const timeoutMs = options?.timeoutMs ?? resolvePositiveInteger(process.env.WHISPER_LOCAL_TIMEOUT_MS, DEFAULT_TIMEOUT_MS)
  const maxRetries = options?.maxRetries ?? resolvePositiveInteger(process.env.WHISPER_LOCAL_MAX_RETRIES, DEFAULT_MAX_RETRIES)
  const fetchFn = options?.fetchFn ?? globalThis.fetch.bind(globalThis)
  const waitFn = options?.waitFn ?? wait

  if (model.endsWith(".en") && process.env.WHISPER_LANGUAGE && process.env.WHISPER_LANGUAGE !== "en" && process.env.WHISPER_LANGUAGE !== "auto") {
    debugWarn(`WHISPER_LANGUAGE setting ignored since model '${model}' can only transcribe language 'en'.`)
  }

  validateLocalOrHttpsUrl(url, "Whisper local API")

  const formData = new FormData()
  const blob = new Blob([new Uint8Array(buffer)], { type: "audio/wav" })
  formData.append("file", blob, filename)
  formData.append("model", model)
  if (language !== "auto") {
    formData.append("language", language)
  }
  formData.append("response_format", "json")

  const totalAttempts = maxRetries + 1
  for (let attempt = 1; attempt <= totalAttempts; attempt += 1) {
    try {
      const response = await fetchWithTimeout(fetchFn, timeoutMs, url, {
        method: "POST",
        body: formData,
      })

      if (!response.ok) {
        const errorText = await response.text()
        const retryable = shouldRetryStatus(response.status) && attempt < totalAttempts
        if (retryable) {
          await waitFn(250 * attempt)
          continue
        }

        if (response.status === 503) {
          throw new PipelineStageError(
            "api_error",
            `Whisper local server at ${url} is not ready. Wait for the model to load and record again.`,
            true,
            { status: response.status, provider: "whisper_local" },
          )
        }

        throw new PipelineStageError(
          "api_error",
          `Whisper local transcription failed (${response.status}): ${errorText}`,
          true,
          { status: response.status, provider: "whisper_local" },
        )
      }

      return await readTranscriptText(response, "whisper_local")
    } catch (error) {
      const isAbort = error instanceof Error && error.name === "AbortError"
      const isNetworkFetch = error instanceof TypeError && error.message.toLowerCase().includes("fetch")
      const shouldRetry = (isAbort || isNetworkFetch) && attempt < totalAttempts
      if (shouldRetry) {
        await waitFn(250 * attempt)
        continue
      }

      if (isAbort) {
        throw new PipelineStageError(
          "transcription_error",
          `Whisper local transcription timed out after ${timeoutMs}ms (attempt ${attempt}/${totalAttempts}).`,
          true,
          { provider: "whisper_local", timeoutMs },
        )
      }

      if (isNetworkFetch) {
        throw new PipelineStageError(
          "transcription_error",
          `Cannot connect to Whisper local server at ${url}.\n` +
            "Start a Whisper server exposing /v1/audio/transcriptions, or set WHISPER_LOCAL_URL.",
          true,
          { provider: "whisper_local" },
        )
      }

      throw error
    }
  }

  throw new PipelineStageError("transcription_error", "Whisper local transcription failed after retries", true, {
    provider: "whisper_local",
  })
}
