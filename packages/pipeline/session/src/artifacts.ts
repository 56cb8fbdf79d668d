import { mkdir, writeFile } from "node:fs/promises"
import { join } from "node:path"

export interface SessionArtifacts {
  /** Local timestamp shared by every file of one session, `YYYYMMDD_HHMMSS` */
  stamp: string
  transcript: string
  analysis: unknown
  recording?: Buffer
}

export interface SessionArtifactPaths {
  transcript: string
  analysis: string
  recording?: string
}

export interface ArtifactWriter {
  write(artifacts: SessionArtifacts): Promise<SessionArtifactPaths>
}

function pad(value: number): string {
  return String(value).padStart(2, "0")
}

export function formatArtifactStamp(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  return `${day}_${time}`
}

/** Writes session transcripts, analyses and recordings under one output directory. */
export class FileArtifactWriter implements ArtifactWriter {
  constructor(private readonly outputDir: string) {}

  async write(artifacts: SessionArtifacts): Promise<SessionArtifactPaths> {
    await mkdir(this.outputDir, { recursive: true })

    const paths: SessionArtifactPaths = {
      transcript: join(this.outputDir, `transcription_${artifacts.stamp}.txt`),
      analysis: join(this.outputDir, `analysis_${artifacts.stamp}.json`),
    }
    await writeFile(paths.transcript, artifacts.transcript, "utf8")
    await writeFile(paths.analysis, `${JSON.stringify(artifacts.analysis, null, 2)}\n`, "utf8")

    if (artifacts.recording) {
      paths.recording = join(this.outputDir, `recording_${artifacts.stamp}.wav`)
      await writeFile(paths.recording, artifacts.recording)
    }
    return paths
  }
}
