export { summarizeMedicalText, generateSummaryText, formatGenerationFailure } from "./summarize"
export { askFollowUp, requestFollowUpTurn, formatFollowUpFailure } from "./follow-up"
export { extractJsonBlock, extractStructuredSummary } from "./extract"
export { formatSummary, renderSummaryFromText, renderSessionNotes, escapeHtml } from "./render"
export { stripWrappingTag } from "./clean"
export { buildFollowUpPrompt, DEFAULT_SYSTEM_PROMPTS } from "./prompts"
export { SessionStore, toChatMessages, DEFAULT_CONTEXT_ID } from "./session"
export { createGenerationService, loadSystemPrompts, NO_TEXT_MESSAGE } from "./generation"
export { resolveSummaryConfig } from "./config"
export type { SummaryConfig } from "./config"
export type { ModelRunner, ModelCall, GenerationServiceOptions } from "./generation"
export type {
  StructuredSummary,
  Medication,
  TermDefinition,
  QATurn,
  ConversationSession,
  ChatMessage,
  PromptKind,
  GenerationService,
  SummaryResult,
  FollowUpResult,
} from "./types"
