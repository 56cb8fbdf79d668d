import assert from "node:assert/strict"
import { describe, it } from "node:test"
import { PipelineStageError } from "@pipeline-errors"
import type { PatientRecord } from "@record-merge"
import {
  SessionController,
  type SessionRunner,
  type VisitSessionDeps,
  type VisitSessionResult,
  type VisitSessionSignals,
} from "../index.js"

const record: PatientRecord = {
  id: 1,
  first_name: "Test",
  last_name: "Patient",
  age: 30,
  gender: null,
  date_of_birth: null,
  symptoms: null,
  vital_signs: null,
  medications: null,
  allergies: null,
  medical_history: null,
  family_history: null,
  diagnosis: null,
  treatment_plan: null,
  follow_up_date: null,
  notes: null,
  created_at: "2025-01-01 09:00:00",
  updated_at: "2025-01-01 09:00:00",
}

const deps: VisitSessionDeps = {
  patients: {
    requirePatient: () => record,
    updateFields: () => false,
  },
  audit: { write: () => undefined },
  openSource: async function* () {
    // empty
  },
  transcribe: async () => "",
  extract: async () => ({}),
}

function resultFor(patientId: number, status: VisitSessionResult["status"]): VisitSessionResult {
  return {
    patientId,
    status,
    stopReason: "stopped",
    durationMs: 0,
    transcript: "",
    proposed: {},
    merge: null,
    persisted: false,
    artifacts: null,
    record,
    report: "",
  }
}

/** Runner that settles only when the session is stopped or aborted. */
function signalDrivenRunner(seen: VisitSessionSignals[]): SessionRunner {
  return (patientId, _deps, signals) => {
    seen.push(signals)
    return new Promise((resolve) => {
      signals.stopSignal?.addEventListener("abort", () => resolve(resultFor(patientId, "completed")))
      signals.abortSignal?.addEventListener("abort", () => resolve(resultFor(patientId, "aborted")))
    })
  }
}

function hasCode(code: string) {
  return (error: unknown) => error instanceof PipelineStageError && error.code === code
}

describe("SessionController", () => {
  it("is idle before any session", () => {
    const controller = new SessionController(deps)

    assert.deepEqual(controller.status(), { state: "idle", patientId: null })
    assert.equal(controller.isRunning(), false)
  })

  it("stop ends recording and wait resolves with the result", async () => {
    const seen: VisitSessionSignals[] = []
    const controller = new SessionController(deps, signalDrivenRunner(seen))

    controller.start(4)
    assert.equal(controller.status().state, "recording")
    controller.stop()
    assert.equal(controller.status().state, "stopping")
    assert.equal(seen[0]?.stopSignal?.aborted, true)
    assert.equal(seen[0]?.abortSignal?.aborted, false)

    const result = await controller.wait()
    assert.equal(result.patientId, 4)
    assert.equal(controller.status().state, "completed")
    assert.equal(controller.isRunning(), false)
  })

  it("abort cancels the session", async () => {
    const controller = new SessionController(deps, signalDrivenRunner([]))

    controller.start(2)
    controller.abort()

    assert.equal((await controller.wait()).status, "aborted")
    assert.equal(controller.status().state, "aborted")
  })

  it("allows one session at a time", async () => {
    const controller = new SessionController(deps, signalDrivenRunner([]))

    controller.start(1)
    assert.throws(() => controller.start(2), hasCode("session_in_progress"))

    controller.stop()
    await controller.wait()
    controller.start(2)
    assert.equal(controller.status().patientId, 2)
    controller.abort()
    await controller.wait()
  })

  it("rejects stop, abort and wait without a session", async () => {
    const controller = new SessionController(deps)

    assert.throws(() => controller.stop(), hasCode("no_active_session"))
    assert.throws(() => controller.abort(), hasCode("no_active_session"))
    await assert.rejects(() => controller.wait(), hasCode("no_active_session"))
  })

  it("records failures on the status and re-throws them from wait", async () => {
    const failure = new PipelineStageError("transcription_error", "Cannot connect to Whisper local server", true)
    const controller = new SessionController(deps, async () => {
      throw failure
    })

    controller.start(1)

    await assert.rejects(() => controller.wait(), (error: unknown) => error === failure)
    const status = controller.status()
    assert.equal(status.state, "failed")
    assert.equal(status.error?.code, "transcription_error")
    assert.equal(status.error?.message, "Cannot connect to Whisper local server")
    assert.throws(() => controller.stop(), hasCode("no_active_session"))
  })
})
