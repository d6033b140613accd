import { debugError, debugLog, debugLogPHI } from "@logging/debug-logger"
import { TaskStateError, toPipelineError } from "@pipeline-errors"
import { pollTask, startTask } from "@task-runner"
import { stripWrappingTag } from "./clean"
import { buildFollowUpPrompt } from "./prompts"
import { toChatMessages, type SessionStore } from "./session"
import type { ConversationSession, FollowUpResult, GenerationService, QATurn } from "./types"

export interface FollowUpDependencies {
  generator: GenerationService
  store: SessionStore
  pollIntervalMs?: number
  onPoll?: (tick: number) => void
}

export function formatFollowUpFailure(message: string): string {
  return `Sorry, I couldn't answer that question: ${message}`
}

/**
 * Runs on the background task. Produces the new turn without touching the
 * session; the caller appends it through the store.
 */
export async function requestFollowUpTurn(
  generator: GenerationService,
  session: ConversationSession,
  question: string,
): Promise<QATurn> {
  const prompt = buildFollowUpPrompt(session, question)
  const rawAnswer = await generator.generate("conversational", prompt, session.imagePath)
  return { question, answer: stripWrappingTag(rawAnswer) }
}

export async function askFollowUp(
  question: string,
  sessionId: string,
  deps: FollowUpDependencies,
): Promise<FollowUpResult> {
  const { generator, store, pollIntervalMs, onPoll } = deps
  const session = store.get(sessionId)

  if (!question || question.trim().length === 0) {
    return { answer: "", messages: toChatMessages(session.history), session, error: null }
  }

  debugLog(`💬 Follow-up on session ${sessionId} (turn ${session.history.length + 1})`)
  debugLogPHI("Question:", question)

  const handle = startTask(requestFollowUpTurn, generator, session, question)

  let turn: QATurn
  try {
    turn = await pollTask(handle, { intervalMs: pollIntervalMs, onPoll })
  } catch (error) {
    if (error instanceof TaskStateError) {
      throw error
    }
    const failure = toPipelineError(error, {
      code: "generation_error",
      message: "Unknown generation error",
      recoverable: true,
    })
    debugError("❌ Follow-up generation failed:", failure.message)
    // Failed turns are not recorded; history stays as it was.
    return {
      answer: formatFollowUpFailure(failure.message),
      messages: toChatMessages(session.history),
      session,
      error: failure,
    }
  }

  const updated = store.appendTurn(sessionId, turn)
  debugLogPHI("Answer:", turn.answer)
  return { answer: turn.answer, messages: toChatMessages(updated.history), session: updated, error: null }
}
