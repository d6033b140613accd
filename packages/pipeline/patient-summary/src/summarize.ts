import { debugError, debugLog, debugLogPHI } from "@logging/debug-logger"
import { TaskStateError, toPipelineError } from "@pipeline-errors"
import { pollTask, startTask } from "@task-runner"
import { renderSummaryFromText } from "./render"
import type { SessionStore } from "./session"
import type { GenerationService, SummaryResult } from "./types"

export interface SummaryDependencies {
  generator: GenerationService
  store: SessionStore
  contextId?: string
  pollIntervalMs?: number
  onPoll?: (tick: number) => void
}

export function formatGenerationFailure(message: string): string {
  return `Sorry, an error occurred while generating your summary: ${message}. Please change your information and try again.`
}

/**
 * Runs on the background task: one model call, then extraction and formatting.
 */
export async function generateSummaryText(
  generator: GenerationService,
  text: string,
  imagePath: string | null,
): Promise<string> {
  const rawOutput = await generator.generate("initial", text, imagePath)
  return renderSummaryFromText(rawOutput)
}

/**
 * Summarizes medical text off the foreground flow. A successful generation
 * starts a new session for the context; a failed one leaves the store alone
 * and returns an apology as the summary.
 */
export async function summarizeMedicalText(
  text: string,
  imagePath: string | null,
  deps: SummaryDependencies,
): Promise<SummaryResult> {
  const { generator, store, contextId, pollIntervalMs, onPoll } = deps
  debugLog(`📝 Summarizing ${text.length} chars${imagePath ? " with image" : ""}`)

  const handle = startTask(generateSummaryText, generator, text, imagePath)

  let summary: string
  try {
    summary = await pollTask(handle, { intervalMs: pollIntervalMs, onPoll })
  } catch (error) {
    if (error instanceof TaskStateError) {
      throw error
    }
    const failure = toPipelineError(error, {
      code: "generation_error",
      message: "Unknown generation error",
      recoverable: true,
    })
    debugError("❌ Summary generation failed:", failure.message)
    return { summary: formatGenerationFailure(failure.message), session: null, error: failure }
  }

  const session = store.create({ originalText: text, summary, imagePath }, contextId)
  debugLog(`✅ Session ${session.id} created`)
  debugLogPHI("Summary:", summary)
  return { summary, session, error: null }
}
