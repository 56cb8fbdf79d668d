import { PipelineStageError, toPipelineError, type PipelineError } from "@pipeline-errors"
import { runVisitSession, type VisitSessionDeps, type VisitSessionResult, type VisitSessionSignals } from "./session"

export type SessionRunner = (
  patientId: number,
  deps: VisitSessionDeps,
  signals: VisitSessionSignals,
) => Promise<VisitSessionResult>

export type SessionState = "idle" | "recording" | "stopping" | "completed" | "no_speech" | "aborted" | "failed"

export interface SessionStatus {
  state: SessionState
  patientId: number | null
  result?: VisitSessionResult
  error?: PipelineError
}

type SessionOutcome = { ok: true; result: VisitSessionResult } | { ok: false; error: unknown }

interface TrackedSession {
  patientId: number
  stop: AbortController
  abort: AbortController
  settled: boolean
  outcome: Promise<SessionOutcome>
  status: SessionStatus
}

/**
 * Runs at most one visit session at a time and exposes its lifecycle:
 * `stop()` ends recording and lets the session finish, `abort()` cancels it.
 */
export class SessionController {
  private current: TrackedSession | null = null

  constructor(
    private readonly deps: VisitSessionDeps,
    private readonly runner: SessionRunner = runVisitSession,
  ) {}

  start(patientId: number): void {
    if (this.current && !this.current.settled) {
      throw new PipelineStageError(
        "session_in_progress",
        `A session is already running for patient ${this.current.patientId}`,
        true,
        { patientId: this.current.patientId },
      )
    }

    const stop = new AbortController()
    const abort = new AbortController()
    const tracked: Omit<TrackedSession, "outcome"> = {
      patientId,
      stop,
      abort,
      settled: false,
      status: { state: "recording", patientId },
    }

    // Never rejects; wait() re-throws a stored failure
    const outcome = this.runner(patientId, this.deps, { stopSignal: stop.signal, abortSignal: abort.signal }).then(
      (result): SessionOutcome => {
        tracked.settled = true
        tracked.status = { state: result.status, patientId, result }
        return { ok: true, result }
      },
      (error: unknown): SessionOutcome => {
        tracked.settled = true
        tracked.status = {
          state: "failed",
          patientId,
          error: toPipelineError(error, { code: "storage_error", message: "Visit session failed", recoverable: true }),
        }
        return { ok: false, error }
      },
    )
    this.current = Object.assign(tracked, { outcome })
  }

  /** Ends recording; transcription and merge still run. */
  stop(): void {
    const session = this.requireRunning()
    if (session.status.state === "recording") {
      session.status = { ...session.status, state: "stopping" }
    }
    session.stop.abort()
  }

  /** Cancels the running session without merging anything. */
  abort(): void {
    this.requireRunning().abort.abort()
  }

  status(): SessionStatus {
    return this.current ? { ...this.current.status } : { state: "idle", patientId: null }
  }

  isRunning(): boolean {
    return this.current !== null && !this.current.settled
  }

  /** Resolves with the latest session's result, or re-throws its failure. */
  async wait(): Promise<VisitSessionResult> {
    if (!this.current) {
      throw new PipelineStageError("no_active_session", "No session has been started", true)
    }
    const outcome = await this.current.outcome
    if (!outcome.ok) {
      throw outcome.error
    }
    return outcome.result
  }

  private requireRunning(): TrackedSession {
    if (!this.current || this.current.settled) {
      throw new PipelineStageError("no_active_session", "No recording in progress", true)
    }
    return this.current
  }
}
