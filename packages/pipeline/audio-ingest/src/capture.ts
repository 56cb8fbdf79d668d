/** 16-bit little-endian mono PCM chunks, as produced by the recorder process. */
export type AudioSource = AsyncIterable<Buffer>

export type CaptureStopReason = "silence" | "stopped" | "ended" | "max_duration"

export interface CaptureOptions {
  sampleRate?: number
  /** RMS level (int16 scale) below which a chunk counts as silent */
  silenceThreshold?: number
  /** Trailing silence that ends the utterance, in audio time */
  silenceDurationMs?: number
  maxDurationMs?: number
  signal?: AbortSignal
}

export interface CapturedUtterance {
  pcm: Buffer
  durationMs: number
  stopReason: CaptureStopReason
  speechDetected: boolean
}

export const DEFAULT_SAMPLE_RATE = 16000
export const DEFAULT_SILENCE_THRESHOLD = 500
export const DEFAULT_SILENCE_DURATION_MS = 7000

const BYTES_PER_SAMPLE = 2

export function computeRms(samples: Buffer): number {
  const count = Math.floor(samples.length / BYTES_PER_SAMPLE)
  if (count === 0) return 0

  let sumOfSquares = 0
  for (let i = 0; i < count; i++) {
    const sample = samples.readInt16LE(i * BYTES_PER_SAMPLE)
    sumOfSquares += sample * sample
  }
  return Math.sqrt(sumOfSquares / count)
}

function samplesToMs(sampleCount: number, sampleRate: number): number {
  return (sampleCount / sampleRate) * 1000
}

/**
 * Reads PCM until trailing silence, the stop signal, or the end of the source.
 * The signal is checked between reads; leaving the loop returns the iterator so
 * the source can release its device.
 */
export async function captureUtterance(source: AudioSource, options: CaptureOptions = {}): Promise<CapturedUtterance> {
  const sampleRate = options.sampleRate ?? DEFAULT_SAMPLE_RATE
  const threshold = options.silenceThreshold ?? DEFAULT_SILENCE_THRESHOLD
  const silenceLimitMs = options.silenceDurationMs ?? DEFAULT_SILENCE_DURATION_MS
  const { maxDurationMs, signal } = options

  const chunks: Buffer[] = []
  let carry: Buffer = Buffer.alloc(0)
  let totalSamples = 0
  let silentSamples = 0
  let speechDetected = false
  let stopReason: CaptureStopReason = "ended"

  if (signal?.aborted) {
    return { pcm: Buffer.alloc(0), durationMs: 0, stopReason: "stopped", speechDetected }
  }

  for await (const chunk of source) {
    // An odd trailing byte waits for the next chunk to complete its sample
    const data = carry.length > 0 ? Buffer.concat([carry, chunk]) : chunk
    const usable = data.length - (data.length % BYTES_PER_SAMPLE)
    carry = data.subarray(usable)

    if (usable > 0) {
      const frame = data.subarray(0, usable)
      const frameSamples = usable / BYTES_PER_SAMPLE
      chunks.push(frame)
      totalSamples += frameSamples

      if (computeRms(frame) < threshold) {
        silentSamples += frameSamples
      } else {
        silentSamples = 0
        speechDetected = true
      }
    }

    if (signal?.aborted) {
      stopReason = "stopped"
      break
    }
    if (samplesToMs(silentSamples, sampleRate) >= silenceLimitMs) {
      stopReason = "silence"
      break
    }
    if (maxDurationMs !== undefined && samplesToMs(totalSamples, sampleRate) >= maxDurationMs) {
      stopReason = "max_duration"
      break
    }
  }

  // Killing the recorder on stop ends the source before the next check
  if (stopReason === "ended" && signal?.aborted) {
    stopReason = "stopped"
  }

  return {
    pcm: Buffer.concat(chunks),
    durationMs: Math.round(samplesToMs(totalSamples, sampleRate)),
    stopReason,
    speechDetected,
  }
}
