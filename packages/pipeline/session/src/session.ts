import {
  captureUtterance,
  toAudioIngestError,
  type AudioSource,
  type CaptureOptions,
  type CaptureStopReason,
  type CapturedUtterance,
} from "@audio"
import type { ExtractedFields } from "@extraction"
import { isPipelineError, PipelineStageError } from "@pipeline-errors"
import {
  hasUpdates,
  mergeRecord,
  type FieldUpdates,
  type MergeResult,
  type PatientRecord,
} from "@record-merge"
import { renderChangeSummary, renderPatientReport } from "@report-rendering"
import { debugLog, debugLogPHI } from "@storage/debug-logger"
import type { AuditSink } from "@storage/types"
import { encodeWav, SPEECH_PCM_FORMAT } from "@transcription"
import { formatArtifactStamp, type ArtifactWriter, type SessionArtifactPaths } from "./artifacts"

/** The slice of the record store a session needs. */
export interface PatientRepository {
  requirePatient(patientId: number): PatientRecord
  updateFields(patientId: number, updates: FieldUpdates): boolean
}

export interface VisitSessionDeps {
  patients: PatientRepository
  /** Opens the microphone; the signal fires when recording should end. */
  openSource: (signal: AbortSignal) => AudioSource
  transcribe: (wav: Buffer, filename: string) => Promise<string>
  extract: (transcript: string) => Promise<ExtractedFields>
  audit: AuditSink
  artifacts?: ArtifactWriter
  capture?: Omit<CaptureOptions, "signal" | "sampleRate">
  now?: () => Date
}

export interface VisitSessionSignals {
  /** Ends recording; the captured audio is still processed. */
  stopSignal?: AbortSignal
  /** Cancels the session; nothing is merged once it fires. */
  abortSignal?: AbortSignal
}

export type VisitSessionStatus = "completed" | "no_speech" | "aborted"

export interface VisitSessionResult {
  patientId: number
  status: VisitSessionStatus
  stopReason: CaptureStopReason | null
  durationMs: number
  transcript: string
  proposed: ExtractedFields
  merge: MergeResult | null
  persisted: boolean
  artifacts: SessionArtifactPaths | null
  record: PatientRecord
  report: string
}

function linkSignals(signals: readonly (AbortSignal | undefined)[]): AbortSignal {
  const controller = new AbortController()
  for (const signal of signals) {
    if (!signal) continue
    if (signal.aborted) {
      controller.abort()
      break
    }
    signal.addEventListener("abort", () => controller.abort(), { once: true })
  }
  return controller.signal
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

/**
 * One recording session for one patient:
 * capture, transcribe, extract, merge into the stored record, then report.
 *
 * Stage failures are audited and re-thrown. An abort before the merge leaves
 * the record untouched.
 */
export async function runVisitSession(
  patientId: number,
  deps: VisitSessionDeps,
  signals: VisitSessionSignals = {},
): Promise<VisitSessionResult> {
  const { patients, audit } = deps
  const { stopSignal, abortSignal } = signals
  const now = deps.now ?? (() => new Date())
  const resourceId = String(patientId)

  const initialRecord = patients.requirePatient(patientId)
  const startedAt = now()
  audit.write({ event_type: "session.started", resource_id: resourceId, success: true })

  const finish = (
    status: VisitSessionStatus,
    fields: Omit<VisitSessionResult, "patientId" | "status" | "report" | "record">,
    record: PatientRecord,
  ): VisitSessionResult => {
    audit.write({
      event_type: status === "aborted" ? "session.cancelled" : "session.completed",
      resource_id: resourceId,
      success: true,
      metadata: {
        status,
        stop_reason: fields.stopReason,
        duration_ms: fields.durationMs,
        persisted: fields.persisted,
        elapsed_ms: now().getTime() - startedAt.getTime(),
      },
    })
    return { patientId, status, ...fields, record, report: renderPatientReport(record) }
  }

  const empty = {
    transcript: "",
    proposed: {},
    merge: null,
    persisted: false,
    artifacts: null,
  }

  try {
    const captureSignal = linkSignals([stopSignal, abortSignal])
    let utterance: CapturedUtterance
    try {
      utterance = await captureUtterance(deps.openSource(captureSignal), {
        ...deps.capture,
        sampleRate: SPEECH_PCM_FORMAT.sampleRate,
        signal: captureSignal,
      })
    } catch (error) {
      const captureError = toAudioIngestError(error)
      throw new PipelineStageError(captureError.code, captureError.message, captureError.recoverable, captureError.details)
    }
    const captured = { stopReason: utterance.stopReason, durationMs: utterance.durationMs }
    debugLog(`Captured ${utterance.durationMs}ms of audio (${utterance.stopReason})`)

    if (abortSignal?.aborted) {
      return finish("aborted", { ...empty, ...captured }, initialRecord)
    }
    if (!utterance.speechDetected) {
      return finish("no_speech", { ...empty, ...captured }, initialRecord)
    }

    const stamp = formatArtifactStamp(startedAt)
    const recording = encodeWav(utterance.pcm, SPEECH_PCM_FORMAT)

    let transcript: string
    try {
      transcript = await deps.transcribe(recording, `recording_${stamp}.wav`)
    } catch (error) {
      audit.write({
        event_type: "transcription.failed",
        resource_id: resourceId,
        success: false,
        error_message: errorMessage(error),
      })
      throw error
    }
    audit.write({
      event_type: "transcription.completed",
      resource_id: resourceId,
      success: true,
      metadata: {
        duration_ms: utterance.durationMs,
        file_size_bytes: recording.length,
        transcript_length: transcript.length,
      },
    })
    debugLogPHI("Transcript:", transcript)

    if (abortSignal?.aborted) {
      return finish("aborted", { ...empty, ...captured, transcript }, initialRecord)
    }
    if (transcript.trim().length === 0) {
      return finish("no_speech", { ...empty, ...captured }, initialRecord)
    }

    let proposed: ExtractedFields
    try {
      proposed = await deps.extract(transcript)
    } catch (error) {
      audit.write({
        event_type: "extraction.failed",
        resource_id: resourceId,
        success: false,
        error_message: errorMessage(error),
      })
      throw error
    }
    audit.write({
      event_type: "extraction.completed",
      resource_id: resourceId,
      success: true,
      metadata: {
        fields: Object.entries(proposed)
          .filter(([, value]) => value !== null && value !== undefined)
          .map(([field]) => field),
      },
    })

    if (abortSignal?.aborted) {
      return finish("aborted", { ...empty, ...captured, transcript, proposed }, initialRecord)
    }

    // Merge against the stored row, which may have been edited while recording
    const merge = mergeRecord(patients.requirePatient(patientId), proposed, { now })
    const persisted = hasUpdates(merge) && patients.updateFields(patientId, merge.updates)
    audit.write({
      event_type: persisted ? "record.merged" : "record.unchanged",
      resource_id: resourceId,
      success: true,
      metadata: {
        updated_fields: Object.keys(merge.updates),
        ignored_fields: merge.ignored.map((entry) => entry.field),
      },
    })
    debugLog(`Merged ${Object.keys(merge.updates).length} fields for patient ${patientId}`)
    debugLogPHI("Change summary:\n" + renderChangeSummary(merge.summary))

    const artifacts = deps.artifacts
      ? await deps.artifacts.write({
          stamp,
          transcript,
          analysis: { patient_id: patientId, extracted: proposed, changes: merge.summary },
          recording,
        })
      : null

    return finish(
      "completed",
      { ...captured, transcript, proposed, merge, persisted, artifacts },
      patients.requirePatient(patientId),
    )
  } catch (error) {
    audit.write({
      event_type: "session.failed",
      resource_id: resourceId,
      success: false,
      error_message: errorMessage(error),
      metadata: { code: isPipelineError(error) ? error.code : "unknown" },
    })
    throw error
  }
}
