export {
  createTranscriptionService,
  appendTranscription,
  formatTranscriptionFailure,
  TRANSCRIPTION_UNAVAILABLE_MESSAGE,
} from "./transcription-service"
export type {
  AppendedTranscription,
  TranscriptionResult,
  TranscriptionService,
  TranscriptionServiceOptions,
} from "./transcription-service"
export { transcribeAudioBuffer, cleanTranscript } from "./providers/whisper-local-transcriber"
export type { WhisperLocalTranscriberOptions } from "./providers/whisper-local-transcriber"
