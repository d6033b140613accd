import { randomUUID } from "node:crypto"
import { PipelineStageError } from "@pipeline-errors"
import type { ChatMessage, ConversationSession, QATurn } from "./types"

export const DEFAULT_CONTEXT_ID = "default"

export interface NewSessionInput {
  originalText: string
  summary: string
  imagePath?: string | null
}

export interface SessionStoreOptions {
  idFactory?: () => string
  now?: () => Date
}

function freezeSession(session: ConversationSession): ConversationSession {
  return Object.freeze({ ...session, history: Object.freeze([...session.history]) })
}

/**
 * Holds conversation sessions. Each user context owns at most one session;
 * creating a new one for the context drops the previous one. Sessions are
 * frozen, and history only grows through appendTurn.
 */
export class SessionStore {
  private readonly sessions = new Map<string, ConversationSession>()
  private readonly activeByContext = new Map<string, string>()
  private readonly idFactory: () => string
  private readonly now: () => Date

  constructor(options: SessionStoreOptions = {}) {
    this.idFactory = options.idFactory ?? randomUUID
    this.now = options.now ?? (() => new Date())
  }

  create(input: NewSessionInput, contextId: string = DEFAULT_CONTEXT_ID): ConversationSession {
    const previousId = this.activeByContext.get(contextId)
    if (previousId) {
      this.sessions.delete(previousId)
    }

    const session = freezeSession({
      id: this.idFactory(),
      originalText: input.originalText,
      summary: input.summary,
      imagePath: input.imagePath ?? null,
      createdAt: this.now().toISOString(),
      history: [],
    })
    this.sessions.set(session.id, session)
    this.activeByContext.set(contextId, session.id)
    return session
  }

  get(sessionId: string): ConversationSession {
    const session = this.sessions.get(sessionId)
    if (!session) {
      throw new PipelineStageError("session_not_found", `Session ${sessionId} does not exist`, false, { sessionId })
    }
    return session
  }

  getActive(contextId: string = DEFAULT_CONTEXT_ID): ConversationSession | null {
    const sessionId = this.activeByContext.get(contextId)
    return sessionId ? (this.sessions.get(sessionId) ?? null) : null
  }

  appendTurn(sessionId: string, turn: QATurn): ConversationSession {
    const current = this.get(sessionId)
    const next = freezeSession({
      ...current,
      history: [...current.history, Object.freeze({ question: turn.question, answer: turn.answer })],
    })
    this.sessions.set(sessionId, next)
    return next
  }

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId)
  }
}

export function toChatMessages(history: readonly QATurn[]): ChatMessage[] {
  return history.flatMap((turn): ChatMessage[] => [
    { role: "user", content: turn.question },
    { role: "assistant", content: turn.answer },
  ])
}
