import { PipelineStageError } from "@pipeline-errors"

export interface PcmFormat {
  sampleRate: number
  numChannels: number
  bitDepth: number
}

export interface WavInfo extends PcmFormat {
  dataOffset: number
  dataSize: number
  durationMs: number
}

export const SPEECH_PCM_FORMAT: PcmFormat = { sampleRate: 16000, numChannels: 1, bitDepth: 16 }

const RIFF_HEADER_SIZE = 12
const CANONICAL_HEADER_SIZE = 44
const PCM_FORMAT_TAG = 1

function invalidWav(message: string): PipelineStageError {
  return new PipelineStageError("validation_error", message, true)
}

function readTag(view: DataView, offset: number): string {
  return String.fromCharCode(
    view.getUint8(offset),
    view.getUint8(offset + 1),
    view.getUint8(offset + 2),
    view.getUint8(offset + 3),
  )
}

/** Wraps raw PCM in a canonical 44-byte RIFF/WAVE header. */
export function encodeWav(pcm: Buffer, format: PcmFormat = SPEECH_PCM_FORMAT): Buffer {
  const { sampleRate, numChannels, bitDepth } = format
  const blockAlign = numChannels * (bitDepth / 8)
  const header = Buffer.alloc(CANONICAL_HEADER_SIZE)

  header.write("RIFF", 0, "ascii")
  header.writeUInt32LE(CANONICAL_HEADER_SIZE - 8 + pcm.length, 4)
  header.write("WAVE", 8, "ascii")
  header.write("fmt ", 12, "ascii")
  header.writeUInt32LE(16, 16)
  header.writeUInt16LE(PCM_FORMAT_TAG, 20)
  header.writeUInt16LE(numChannels, 22)
  header.writeUInt32LE(sampleRate, 24)
  header.writeUInt32LE(sampleRate * blockAlign, 28)
  header.writeUInt16LE(blockAlign, 32)
  header.writeUInt16LE(bitDepth, 34)
  header.write("data", 36, "ascii")
  header.writeUInt32LE(pcm.length, 40)

  return Buffer.concat([header, pcm])
}

/**
 * Reads the format of a PCM WAV file by walking its chunks.
 * Throws a validation_error for anything that is not uncompressed PCM.
 */
export function parseWavHeader(input: ArrayBufferLike | Uint8Array): WavInfo {
  const view =
    input instanceof Uint8Array ? new DataView(input.buffer, input.byteOffset, input.byteLength) : new DataView(input)

  if (view.byteLength < RIFF_HEADER_SIZE || readTag(view, 0) !== "RIFF" || readTag(view, 8) !== "WAVE") {
    throw invalidWav("Invalid WAV file: missing RIFF/WAVE header")
  }

  let format: PcmFormat | null = null
  let offset = RIFF_HEADER_SIZE

  while (offset + 8 <= view.byteLength) {
    const chunkId = readTag(view, offset)
    const chunkSize = view.getUint32(offset + 4, true)
    const body = offset + 8

    if (chunkId === "fmt ") {
      if (chunkSize < 16 || body + 16 > view.byteLength) {
        throw invalidWav("Invalid WAV file: truncated fmt chunk")
      }
      if (view.getUint16(body, true) !== PCM_FORMAT_TAG) {
        throw invalidWav("Unsupported WAV encoding: only PCM is accepted")
      }
      format = {
        numChannels: view.getUint16(body + 2, true),
        sampleRate: view.getUint32(body + 4, true),
        bitDepth: view.getUint16(body + 14, true),
      }
    } else if (chunkId === "data") {
      if (!format) {
        throw invalidWav("Invalid WAV file: data chunk before fmt chunk")
      }
      const dataSize = Math.min(chunkSize, view.byteLength - body)
      const bytesPerSecond = format.sampleRate * format.numChannels * (format.bitDepth / 8)
      return {
        ...format,
        dataOffset: body,
        dataSize,
        durationMs: bytesPerSecond > 0 ? Math.round((dataSize / bytesPerSecond) * 1000) : 0,
      }
    }

    // Chunks are padded to even sizes
    offset = body + chunkSize + (chunkSize % 2)
  }

  throw invalidWav("Invalid WAV file: missing data chunk")
}
