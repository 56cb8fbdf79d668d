import { DEFAULT_SILENCE_DURATION_MS, DEFAULT_SILENCE_THRESHOLD } from "@audio"
import { PipelineStageError } from "@pipeline-errors"
import { resolveDatabasePath } from "@storage/database"
import { resolveTranscriptionProvider, type ResolvedTranscriptionProvider } from "@transcription"

export const DEFAULT_OUTPUT_DIR = "output"

export interface VisitConfig {
  databasePath: string
  outputDir: string
  captureCommand?: string
  silenceDurationMs: number
  silenceThreshold: number
  transcription: ResolvedTranscriptionProvider
}

function readPositiveNumber(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = env[key]?.trim()
  if (!raw) return fallback
  const parsed = Number(raw)
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new PipelineStageError("configuration_error", `${key} must be a positive number, got "${raw}"`, false, { key })
  }
  return parsed
}

export function resolveVisitConfig(env: NodeJS.ProcessEnv = process.env): VisitConfig {
  return {
    databasePath: resolveDatabasePath(env),
    outputDir: env.VISIT_OUTPUT_DIR?.trim() || DEFAULT_OUTPUT_DIR,
    captureCommand: env.AUDIO_CAPTURE_COMMAND?.trim() || undefined,
    silenceDurationMs: readPositiveNumber(env, "AUDIO_SILENCE_MS", DEFAULT_SILENCE_DURATION_MS),
    silenceThreshold: readPositiveNumber(env, "AUDIO_SILENCE_THRESHOLD", DEFAULT_SILENCE_THRESHOLD),
    transcription: resolveTranscriptionProvider(env),
  }
}
