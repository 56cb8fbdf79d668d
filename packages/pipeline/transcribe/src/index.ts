export { encodeWav, parseWavHeader, SPEECH_PCM_FORMAT } from "./core/wav"
export type { PcmFormat, WavInfo } from "./core/wav"

// Transcription providers
export { transcribeWavBuffer as transcribeWithWhisper } from "./providers/whisper-transcriber"
export type { WhisperOpenAITranscriberOptions } from "./providers/whisper-transcriber"
export { transcribeWavBuffer as transcribeWithWhisperLocal } from "./providers/whisper-local-transcriber"
export type { WhisperLocalTranscriberOptions } from "./providers/whisper-local-transcriber"
export { resolveTranscriptionProvider, transcribeWithResolvedProvider } from "./providers/provider-resolver"
export type { ResolvedTranscriptionProvider, TranscriptionProvider } from "./providers/provider-resolver"
