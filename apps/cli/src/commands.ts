import { createInterface } from "node:readline/promises"
import { spawnMicrophoneSource } from "@audio"
import { extractPatientFields } from "@extraction"
import { PatientChatSession } from "@llm"
import { PipelineStageError } from "@pipeline-errors"
import { formatPatientName } from "@record-merge"
import { renderChangeSummary, renderPatientReport } from "@report-rendering"
import { AuditLog, PatientStore, openDatabase, type SqliteDatabase } from "@storage"
import { transcribeWithResolvedProvider } from "@transcription"
import {
  FileArtifactWriter,
  SessionController,
  type VisitConfig,
  type VisitSessionDeps,
  type VisitSessionResult,
} from "@visit-session"
import { parseAge, parseAuditEventType, parseEdits, parseLimit, parsePatientId, type CommandLine } from "./args"

export interface AppContext {
  config: VisitConfig
  db: SqliteDatabase
  store: PatientStore
  audit: AuditLog
  out: (line: string) => void
  createChatSession: () => PatientChatSession
  createSessionDeps: () => VisitSessionDeps
}

export type Command = (ctx: AppContext, line: CommandLine) => Promise<void>

const DEFAULT_AUDIT_LIMIT = 20

export const USAGE = `Usage: visit-assistant <command> [options]

Commands:
  init                                  Create the database and seed a demo patient
  intake --first-name=A --last-name=B   Register a patient (--age, --gender, --dob optional)
  list                                  List patients
  show <id>                             Print a patient report
  record <id>                           Record a visit; stops after silence or Ctrl+C
  edit <id> --<field>=<value>...        Manually update record fields
  chat <id> [message]                   Ask about a patient (interactive without a message)
  audit [--limit=N] [--event=type]      Show recent audit entries`

export async function createAppContext(
  config: VisitConfig,
  out: (line: string) => void = console.log,
): Promise<AppContext> {
  const db = await openDatabase(config.databasePath)
  const store = new PatientStore(db)
  const audit = new AuditLog(db)
  store.initialize()
  audit.initialize()

  return {
    config,
    db,
    store,
    audit,
    out,
    createChatSession: () => new PatientChatSession(),
    createSessionDeps: () => ({
      patients: store,
      audit,
      artifacts: new FileArtifactWriter(config.outputDir),
      capture: { silenceDurationMs: config.silenceDurationMs, silenceThreshold: config.silenceThreshold },
      openSource: (signal) => spawnMicrophoneSource({ command: config.captureCommand, signal }),
      transcribe: (wav, filename) => transcribeWithResolvedProvider(wav, filename, config.transcription),
      extract: (transcript) => extractPatientFields(transcript),
    }),
  }
}

function requireText(values: CommandLine["values"], key: string): string {
  const value = values[key]
  if (typeof value !== "string" || value.trim().length === 0) {
    throw new PipelineStageError("validation_error", `--${key} is required`, true)
  }
  return value.trim()
}

function optionalText(values: CommandLine["values"], key: string): string | null {
  const value = values[key]
  return typeof value === "string" && value.trim().length > 0 ? value.trim() : null
}

const init: Command = async (ctx) => {
  const seeded = ctx.store.seedDemoPatient()
  ctx.out(`Database ready at ${ctx.config.databasePath}`)
  ctx.out(seeded === null ? "Patients already present; demo patient not added" : `Added demo patient ${seeded}`)
}

const intake: Command = async (ctx, { values }) => {
  const age = optionalText(values, "age")
  const patient = ctx.store.createPatient({
    first_name: requireText(values, "first-name"),
    last_name: requireText(values, "last-name"),
    age: age === null ? null : parseAge(age),
    gender: optionalText(values, "gender"),
    date_of_birth: optionalText(values, "dob"),
  })
  ctx.audit.write({ event_type: "patient.created", resource_id: String(patient.id), success: true })
  ctx.out(`Created patient ${patient.id}: ${formatPatientName(patient)}`)
}

const list: Command = async (ctx) => {
  const patients = ctx.store.listPatients()
  if (patients.length === 0) {
    ctx.out("No patients found. Run `init` or `intake` first.")
    return
  }
  for (const patient of patients) {
    const name = formatPatientName(patient) || "Unnamed patient"
    ctx.out(`${patient.id}\t${name}\t${patient.age ?? "-"}\t${patient.gender ?? "-"}`)
  }
}

const show: Command = async (ctx, { positionals }) => {
  const patient = ctx.store.requirePatient(parsePatientId(positionals[0]))
  ctx.out(renderPatientReport(patient))
}

function printSessionResult(ctx: AppContext, result: VisitSessionResult): void {
  switch (result.status) {
    case "aborted":
      ctx.out("Session cancelled; the record was not changed.")
      return
    case "no_speech":
      ctx.out("No speech detected; the record was not changed.")
      return
    case "completed":
      ctx.out("Transcription:")
      ctx.out(result.transcript)
      ctx.out("")
      ctx.out("Changes:")
      ctx.out(renderChangeSummary(result.merge?.summary ?? []))
      if (result.artifacts) {
        ctx.out("")
        ctx.out(`Transcription saved to: ${result.artifacts.transcript}`)
        ctx.out(`Analysis saved to: ${result.artifacts.analysis}`)
      }
      ctx.out("")
      ctx.out(result.report)
  }
}

const record: Command = async (ctx, { positionals }) => {
  const patientId = parsePatientId(positionals[0])
  const patient = ctx.store.requirePatient(patientId)
  const controller = new SessionController(ctx.createSessionDeps())

  // First Ctrl+C ends recording, a second one cancels the session
  const onInterrupt = () => {
    if (controller.status().state === "recording") {
      ctx.out("\nStopping recording...")
      controller.stop()
    } else if (controller.isRunning()) {
      ctx.out("\nCancelling session...")
      controller.abort()
    }
  }
  process.on("SIGINT", onInterrupt)

  try {
    controller.start(patientId)
    ctx.out(`Recording visit for ${formatPatientName(patient) || `patient ${patientId}`}.`)
    ctx.out(`Speak now; recording stops after ${ctx.config.silenceDurationMs / 1000}s of silence or on Ctrl+C.`)
    printSessionResult(ctx, await controller.wait())
  } finally {
    process.off("SIGINT", onInterrupt)
  }
}

const edit: Command = async (ctx, { positionals, values }) => {
  const patientId = parsePatientId(positionals[0])
  const edits = parseEdits(values)
  const changed = ctx.store.updatePatientDetails(patientId, edits)
  if (!changed) {
    ctx.store.requirePatient(patientId)
    ctx.out("No changes")
    return
  }
  ctx.audit.write({
    event_type: "record.edited",
    resource_id: String(patientId),
    success: true,
    metadata: { fields: Object.keys(edits) },
  })
  ctx.out(renderPatientReport(ctx.store.requirePatient(patientId)))
}

async function interactiveChat(ctx: AppContext, patientId: number, session: PatientChatSession): Promise<void> {
  const rl = createInterface({ input: process.stdin, output: process.stdout })
  ctx.out('Ask about the patient. Type "clear" to reset the conversation or "exit" to quit.')
  try {
    for (;;) {
      const message = (await rl.question("> ")).trim()
      if (message === "exit" || message === "quit") return
      if (message === "clear") {
        session.clear()
        ctx.out("Conversation cleared.")
        continue
      }
      if (!message) continue
      // Fresh record every turn
      ctx.out(await session.send(message, ctx.store.requirePatient(patientId)))
    }
  } finally {
    rl.close()
  }
}

const chat: Command = async (ctx, { positionals }) => {
  const patientId = parsePatientId(positionals[0])
  const patient = ctx.store.requirePatient(patientId)
  const session = ctx.createChatSession()
  const message = positionals.slice(1).join(" ").trim()

  if (message) {
    ctx.out(await session.send(message, patient))
    return
  }
  await interactiveChat(ctx, patientId, session)
}

const audit: Command = async (ctx, { values }) => {
  const entries = ctx.audit.list({
    limit: parseLimit(values.limit, DEFAULT_AUDIT_LIMIT),
    event_type: parseAuditEventType(values.event),
  })
  if (entries.length === 0) {
    ctx.out("No audit entries")
    return
  }
  for (const entry of entries) {
    const outcome = entry.success ? "ok" : `failed: ${entry.error_message ?? "unknown error"}`
    ctx.out(`${entry.created_at}\t${entry.event_type}\t${entry.resource_id ?? "-"}\t${outcome}`)
  }
}

export const COMMANDS: Readonly<Record<string, Command>> = {
  init,
  intake,
  list,
  show,
  record,
  edit,
  chat,
  audit,
}
