import { extname } from "node:path"

const DEFAULT_WHISPER_LOCAL_URL = "http://127.0.0.1:8002/v1/audio/transcriptions"
const DEFAULT_WHISPER_LOCAL_MODEL = "medasr"
const DEFAULT_TIMEOUT_MS = 120_000
const DEFAULT_MAX_RETRIES = 2

const AUDIO_MIME_TYPES: Record<string, string> = {
  ".wav": "audio/wav",
  ".mp3": "audio/mpeg",
  ".m4a": "audio/mp4",
  ".mp4": "audio/mp4",
  ".ogg": "audio/ogg",
  ".webm": "audio/webm",
  ".flac": "audio/flac",
}

// Tokens some CTC speech models leave in their output.
const MODEL_ARTIFACTS = /<epsilon>|<\/s>/g

export interface WhisperLocalTranscriberOptions {
  baseUrl?: string
  model?: string
  timeoutMs?: number
  maxRetries?: number
  fetchFn?: typeof fetch
  waitFn?: (ms: number) => Promise<void>
}

function wait(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

/**
 * For localhost connections, HTTPS is not required since audio never leaves the machine.
 */
export function validateLocalOrHttpsUrl(url: string, serviceName: string): void {
  let parsed: URL
  try {
    parsed = new URL(url)
  } catch {
    throw new Error(`Invalid ${serviceName} URL: ${url}`)
  }
  const isLocalhost = parsed.hostname === "localhost" || parsed.hostname === "127.0.0.1" || parsed.hostname === "[::1]"
  if (!isLocalhost && parsed.protocol !== "https:") {
    throw new Error(
      `SECURITY ERROR: ${serviceName} endpoint must use HTTPS or localhost. Received: ${parsed.protocol}//${parsed.host}`,
    )
  }
}

export function resolvePositiveInteger(value: string | undefined, fallback: number): number {
  if (!value) return fallback
  const parsed = Number.parseInt(value, 10)
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback
}

export function cleanTranscript(text: string): string {
  return text.replace(MODEL_ARTIFACTS, "").trim()
}

async function fetchWithTimeout(fetchFn: typeof fetch, timeoutMs: number, url: string, init: RequestInit): Promise<Response> {
  const controller = new AbortController()
  const timeout = setTimeout(() => controller.abort(), timeoutMs)
  try {
    return await fetchFn(url, { ...init, signal: controller.signal })
  } finally {
    clearTimeout(timeout)
  }
}

function shouldRetryStatus(status: number): boolean {
  return status === 408 || status === 425 || status === 429 || status >= 500
}

export function resolveWhisperUrl(options?: WhisperLocalTranscriberOptions): string {
  return options?.baseUrl || process.env.WHISPER_LOCAL_URL || DEFAULT_WHISPER_LOCAL_URL
}

export async function transcribeAudioBuffer(
  buffer: Buffer,
  filename: string,
  options?: WhisperLocalTranscriberOptions,
): Promise<string> {
  const url = resolveWhisperUrl(options)
  const model = options?.model || process.env.WHISPER_LOCAL_MODEL || DEFAULT_WHISPER_LOCAL_MODEL
  const timeoutMs = options?.timeoutMs ?? resolvePositiveInteger(process.env.WHISPER_LOCAL_TIMEOUT_MS, DEFAULT_TIMEOUT_MS)
  const maxRetries = options?.maxRetries ?? resolvePositiveInteger(process.env.WHISPER_LOCAL_MAX_RETRIES, DEFAULT_MAX_RETRIES)
  const fetchFn = options?.fetchFn ?? globalThis.fetch.bind(globalThis)
  const waitFn = options?.waitFn ?? wait

  validateLocalOrHttpsUrl(url, "Transcription API")

  const mimeType = AUDIO_MIME_TYPES[extname(filename).toLowerCase()] ?? "application/octet-stream"
  const formData = new FormData()
  formData.append("file", new Blob([new Uint8Array(buffer)], { type: mimeType }), filename)
  formData.append("model", model)
  formData.append("response_format", "json")

  const totalAttempts = maxRetries + 1
  for (let attempt = 1; attempt <= totalAttempts; attempt += 1) {
    try {
      const response = await fetchWithTimeout(fetchFn, timeoutMs, url, {
        method: "POST",
        body: formData,
      })

      if (!response.ok) {
        const errorText = await response.text()
        if (shouldRetryStatus(response.status) && attempt < totalAttempts) {
          await waitFn(250 * attempt)
          continue
        }
        throw new Error(`Transcription failed (${response.status}): ${errorText}`)
      }

      const result = (await response.json()) as { text?: string }
      return cleanTranscript(result.text ?? "")
    } catch (error) {
      const isAbort = error instanceof DOMException && error.name === "AbortError"
      const isNetworkFetch = error instanceof TypeError && error.message.toLowerCase().includes("fetch")
      if ((isAbort || isNetworkFetch) && attempt < totalAttempts) {
        await waitFn(250 * attempt)
        continue
      }

      if (isAbort) {
        throw new Error(`Transcription timed out after ${timeoutMs}ms (attempt ${attempt}/${totalAttempts}).`)
      }

      if (isNetworkFetch) {
        throw new Error(`Cannot connect to transcription server at ${url}.`)
      }

      throw error
    }
  }

  throw new Error("Transcription failed after retries")
}
