import type { ConversationSession, PromptKind } from "./types"

const JSON_SCHEMA = `{
  "key_takeaways": [],
  "medications": [
    { "name": "", "dosage": "", "administration": "", "description": "" }
  ],
  "medical_terms": [
    { "term": "", "definition": "" }
  ],
  "questions_for_provider": []
}`

export const SUMMARY_SYSTEM_PROMPT = `You explain medical documents to patients in plain, friendly language.
Use ONLY facts stated in the provided text or image.
Do NOT invent diagnoses, medications or doses.
Leave a list empty when the text has nothing for it.
Return VALID JSON only, inside a single \`\`\`json fenced block.
The JSON must match this schema exactly:\n${JSON_SCHEMA}`

export const CONVERSATIONAL_SYSTEM_PROMPT = `You answer a patient's follow-up questions about a medical document that was already summarized for them.
Ground every answer in the medical text, the summary and the earlier conversation.
If the answer is not in that material, say so and suggest asking their healthcare provider.
Answer in plain text. No JSON. No XML tags.`

export const DEFAULT_SYSTEM_PROMPTS: Readonly<Record<PromptKind, string>> = {
  initial: SUMMARY_SYSTEM_PROMPT,
  conversational: CONVERSATIONAL_SYSTEM_PROMPT,
}

export const ANSWER_DIRECTIVE = "Provide your answer directly."

export function formatHistory(session: Pick<ConversationSession, "history">): string {
  return session.history.map((turn) => `User: ${turn.question}\nAI: ${turn.answer}`).join("\n")
}

export function buildFollowUpPrompt(session: ConversationSession, question: string): string {
  return [
    "<medical_text>",
    session.originalText,
    "</medical_text>",
    "",
    "<summary_of_text>",
    session.summary,
    "</summary_of_text>",
    "",
    "<conversation_history>",
    formatHistory(session),
    "</conversation_history>",
    "",
    "<user_question>",
    question,
    "</user_question>",
    "",
    ANSWER_DIRECTIVE,
  ].join("\n")
}
