export type PipelineErrorCode =
  | "record_not_found"
  | "validation_error"
  | "configuration_error"
  | "capture_error"
  | "api_error"
  | "transcription_error"
  | "extraction_error"
  | "storage_error"
  | "session_in_progress"
  | "no_active_session"

export interface PipelineError {
  code: PipelineErrorCode
  message: string
  recoverable: boolean
  details?: Record<string, unknown>
}

export interface PipelineErrorFallback {
  code: PipelineErrorCode
  message: string
  recoverable: boolean
  details?: Record<string, unknown>
}

const KNOWN_CODES: ReadonlySet<string> = new Set<PipelineErrorCode>([
  "record_not_found",
  "validation_error",
  "configuration_error",
  "capture_error",
  "api_error",
  "transcription_error",
  "extraction_error",
  "storage_error",
  "session_in_progress",
  "no_active_session",
])

function isPipelineErrorCode(value: unknown): value is PipelineErrorCode {
  return typeof value === "string" && KNOWN_CODES.has(value)
}

export class PipelineStageError extends Error implements PipelineError {
  code: PipelineErrorCode
  recoverable: boolean
  details?: Record<string, unknown>

  constructor(code: PipelineErrorCode, message: string, recoverable: boolean, details?: Record<string, unknown>) {
    super(message)
    this.name = "PipelineStageError"
    this.code = code
    this.recoverable = recoverable
    this.details = details
  }
}

export function createPipelineError(
  code: PipelineErrorCode,
  message: string,
  recoverable: boolean,
  details?: Record<string, unknown>,
): PipelineError {
  return { code, message, recoverable, details }
}

export function isPipelineError(error: unknown): error is PipelineError {
  if (!error || typeof error !== "object") return false
  return (
    "code" in error &&
    isPipelineErrorCode(error.code) &&
    "message" in error &&
    typeof error.message === "string" &&
    "recoverable" in error &&
    typeof error.recoverable === "boolean"
  )
}

export function recordNotFoundError(patientId: number): PipelineStageError {
  return new PipelineStageError("record_not_found", `No patient found with ID ${patientId}`, false, { patientId })
}

export function toPipelineError(error: unknown, fallback: PipelineErrorFallback): PipelineError {
  if (error instanceof PipelineStageError || isPipelineError(error)) {
    return createPipelineError(error.code, error.message, error.recoverable, error.details)
  }

  if (error instanceof Error) {
    return createPipelineError(
      fallback.code,
      error.message || fallback.message,
      fallback.recoverable,
      fallback.details,
    )
  }

  return createPipelineError(
    fallback.code,
    typeof error === "string" ? error : fallback.message,
    fallback.recoverable,
    fallback.details,
  )
}

export function toPipelineStageError(error: unknown, fallback: PipelineErrorFallback): PipelineStageError {
  if (error instanceof PipelineStageError) {
    return error
  }
  const normalized = toPipelineError(error, fallback)
  return new PipelineStageError(normalized.code, normalized.message, normalized.recoverable, normalized.details)
}
