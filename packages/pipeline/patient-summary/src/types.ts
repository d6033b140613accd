import type { PipelineError } from "@pipeline-errors"

export interface Medication {
  name?: string
  dosage?: string
  administration?: string
  description?: string
}

export interface TermDefinition {
  term?: string
  definition?: string
}

export interface StructuredSummary {
  keyTakeaways?: string[]
  medications?: Medication[]
  medicalTerms?: TermDefinition[]
  questionsForProvider?: string[]
}

export interface QATurn {
  readonly question: string
  readonly answer: string
}

export interface ConversationSession {
  readonly id: string
  readonly originalText: string
  readonly summary: string
  readonly imagePath: string | null
  readonly createdAt: string
  readonly history: readonly QATurn[]
}

export type ChatRole = "user" | "assistant"

export interface ChatMessage {
  role: ChatRole
  content: string
}

export type PromptKind = "initial" | "conversational"

export interface GenerationService {
  initialize(): Promise<void>
  shutdown(): Promise<void>
  /** Rejects with a PipelineStageError("generation_error") when the model call fails. */
  generate(kind: PromptKind, text: string, imagePath: string | null): Promise<string>
}

export type ModelMode = "TEXT" | "VLM"

export type GenerationProvider = "medgemma" | "anthropic"

export interface SummaryResult {
  summary: string
  session: ConversationSession | null
  error: PipelineError | null
}

export interface FollowUpResult {
  answer: string
  messages: ChatMessage[]
  session: ConversationSession
  error: PipelineError | null
}
