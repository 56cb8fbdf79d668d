export {
  captureUtterance,
  computeRms,
  DEFAULT_SAMPLE_RATE,
  DEFAULT_SILENCE_DURATION_MS,
  DEFAULT_SILENCE_THRESHOLD,
} from "./capture"
export type { AudioSource, CaptureOptions, CaptureStopReason, CapturedUtterance } from "./capture"
export { resolveCaptureCommand, spawnMicrophoneSource } from "./microphone"
export type { CaptureCommand, MicrophoneOptions } from "./microphone"
export { toAudioIngestError } from "./errors"
