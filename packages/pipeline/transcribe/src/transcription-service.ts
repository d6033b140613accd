import { readFile } from "node:fs/promises"
import { basename } from "node:path"
import { debugError, debugLog } from "@logging/debug-logger"
import {
  resolveWhisperUrl,
  transcribeAudioBuffer,
  validateLocalOrHttpsUrl,
  type WhisperLocalTranscriberOptions,
} from "./providers/whisper-local-transcriber"

export type TranscriptionResult = { status: "success"; text: string } | { status: "failure"; message: string }

export interface TranscriptionService {
  initialize(): Promise<void>
  shutdown(): Promise<void>
  /** Never rejects: failures come back as an apology string. */
  transcribe(audioPath: string): Promise<string>
  /** Like transcribe, with the apology kept apart from transcript text. */
  transcribeResult(audioPath: string): Promise<TranscriptionResult>
}

export interface AppendedTranscription {
  text: string
  /** Apology from a failed transcription; the text is then left as it was. */
  error: string | null
}

export interface TranscriptionServiceOptions extends WhisperLocalTranscriberOptions {
  readFileFn?: (path: string) => Promise<Buffer>
}

export const TRANSCRIPTION_UNAVAILABLE_MESSAGE = "Sorry, the transcription service is not available."

export function formatTranscriptionFailure(message: string): string {
  return `Sorry, an error occurred during transcription: ${message}`
}

class LocalTranscriptionService implements TranscriptionService {
  private ready = false
  private readonly readFileFn: (path: string) => Promise<Buffer>

  constructor(private readonly options: TranscriptionServiceOptions) {
    this.readFileFn = options.readFileFn ?? readFile
  }

  async initialize(): Promise<void> {
    validateLocalOrHttpsUrl(resolveWhisperUrl(this.options), "Transcription API")
    this.ready = true
  }

  async shutdown(): Promise<void> {
    this.ready = false
  }

  async transcribe(audioPath: string): Promise<string> {
    const result = await this.transcribeResult(audioPath)
    return result.status === "success" ? result.text : result.message
  }

  async transcribeResult(audioPath: string): Promise<TranscriptionResult> {
    if (!this.ready) {
      return { status: "failure", message: TRANSCRIPTION_UNAVAILABLE_MESSAGE }
    }
    if (!audioPath) {
      return { status: "success", text: "" }
    }

    try {
      debugLog("⏳ Transcribing audio...")
      const audio = await this.readFileFn(audioPath)
      const text = await transcribeAudioBuffer(audio, basename(audioPath), this.options)
      debugLog(`✅ Transcription complete (${text.length} chars)`)
      return { status: "success", text }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      debugError("❌ Transcription failed:", message)
      return { status: "failure", message: formatTranscriptionFailure(message) }
    }
  }
}

export function createTranscriptionService(options: TranscriptionServiceOptions = {}): TranscriptionService {
  return new LocalTranscriptionService(options)
}

/**
 * Appends a recording's transcript to text the user already typed. A failed
 * transcription never lands in the text.
 */
export async function appendTranscription(
  existingText: string,
  audioPath: string | null,
  service: TranscriptionService,
): Promise<AppendedTranscription> {
  if (audioPath === null) {
    return { text: existingText, error: null }
  }
  const result = await service.transcribeResult(audioPath)
  if (result.status === "failure") {
    return { text: existingText, error: result.message }
  }
  return { text: `${existingText}${result.text}`.trim(), error: null }
}
