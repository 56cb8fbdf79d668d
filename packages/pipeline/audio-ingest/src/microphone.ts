import { spawn } from "node:child_process"
import { PipelineStageError } from "@pipeline-errors"
import { DEFAULT_SAMPLE_RATE, type AudioSource } from "./capture"

export interface MicrophoneOptions {
  /** Full recorder command line; must write raw S16_LE mono PCM to stdout */
  command?: string
  sampleRate?: number
  /** Kills the recorder when aborted */
  signal?: AbortSignal
}

export interface CaptureCommand {
  command: string
  args: string[]
}

const STDERR_TAIL_BYTES = 2048

export function resolveCaptureCommand(options: Pick<MicrophoneOptions, "command" | "sampleRate"> = {}): CaptureCommand {
  const configured = options.command?.trim() || process.env.AUDIO_CAPTURE_COMMAND?.trim()
  if (configured) {
    const [command, ...args] = configured.split(/\s+/)
    if (command) {
      return { command, args }
    }
  }

  const sampleRate = options.sampleRate ?? DEFAULT_SAMPLE_RATE
  return {
    command: "arecord",
    args: ["-q", "-f", "S16_LE", "-r", String(sampleRate), "-c", "1", "-t", "raw"],
  }
}

/**
 * Streams PCM from an external recorder process.
 * The process is killed when the signal aborts or the consumer stops iterating.
 */
export async function* spawnMicrophoneSource(options: MicrophoneOptions = {}): AudioSource {
  const { command, args } = resolveCaptureCommand(options)
  const { signal } = options

  const child = spawn(command, args, { stdio: ["ignore", "pipe", "pipe"] })
  const failure: { error?: Error } = {}
  let stderrTail = ""

  const exited = new Promise<number | null>((resolve) => {
    child.once("error", (error) => {
      failure.error = error
      resolve(null)
    })
    child.once("close", (code) => resolve(code))
  })
  child.stderr.on("data", (data: Buffer) => {
    stderrTail = (stderrTail + data.toString("utf8")).slice(-STDERR_TAIL_BYTES)
  })

  const stopRecorder = () => {
    if (child.exitCode === null && !child.killed) {
      child.kill("SIGTERM")
    }
  }
  signal?.addEventListener("abort", stopRecorder, { once: true })

  try {
    for await (const chunk of child.stdout) {
      if (Buffer.isBuffer(chunk)) {
        yield chunk
      }
    }

    const exitCode = await exited
    if (failure.error) {
      throw new PipelineStageError("capture_error", `Failed to start recorder "${command}": ${failure.error.message}`, true, {
        command,
      })
    }
    if (exitCode !== null && exitCode !== 0 && !signal?.aborted) {
      throw new PipelineStageError("capture_error", `Recorder "${command}" exited with code ${exitCode}`, true, {
        command,
        exitCode,
        stderr: stderrTail.trim(),
      })
    }
  } finally {
    signal?.removeEventListener("abort", stopRecorder)
    stopRecorder()
  }
}
