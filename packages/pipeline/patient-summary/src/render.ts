import { extractStructuredSummary } from "./extract"
import type { ChatMessage, Medication, StructuredSummary, TermDefinition } from "./types"

export const SUMMARY_HEADER = "<h2>Medical Summary</h2>"
export const SUMMARY_DISCLAIMER =
  "<blockquote><b>⚠️ Disclaimer:</b> This summary is not medical advice. Always consult a healthcare professional.</blockquote>"

const SECTION_SPACER = "<p><br></p>"
const INDENT_STYLE = "margin-left: 20px;"

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#x27;",
}

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char)
}

function escapedOrDefault(value: string | undefined, fallback = ""): string {
  const trimmed = value?.trim() ?? ""
  return trimmed ? escapeHtml(trimmed) : fallback
}

/**
 * Escapes, drops empty entries and removes exact duplicates (compared after
 * escaping), keeping first-seen order.
 */
export function sanitizeList(items: readonly string[] | undefined): string[] {
  const seen = new Set<string>()
  const result: string[] = []
  for (const item of items ?? []) {
    const escaped = escapedOrDefault(item)
    if (escaped && !seen.has(escaped)) {
      seen.add(escaped)
      result.push(escaped)
    }
  }
  return result
}

function renderMedication(medication: Medication): string[] {
  const name = escapedOrDefault(medication.name, "Unknown")
  const dosage = escapedOrDefault(medication.dosage)
  const administration = escapedOrDefault(medication.administration)
  const description = escapedOrDefault(medication.description)

  const lines = [`<p><b>• ${name}</b></p>`]
  if (dosage) lines.push(`<p style="${INDENT_STYLE}">- Dosage: ${dosage}</p>`)
  if (administration) lines.push(`<p style="${INDENT_STYLE}">- How to take: ${administration}</p>`)
  if (description) lines.push(`<p style="${INDENT_STYLE}"><i>${description}</i></p>`)
  return lines
}

function renderTerm(term: TermDefinition): string {
  return `<p><b>${escapedOrDefault(term.term, "Unknown")}</b>: ${escapedOrDefault(term.definition, "N/A")}</p>`
}

/**
 * Renders a structured summary as HTML the notes editor understands. Sections
 * always appear in the same order and are left out entirely when empty.
 */
export function formatSummary(summary: StructuredSummary): string {
  const parts = [SUMMARY_HEADER, SUMMARY_DISCLAIMER]

  const takeaways = sanitizeList(summary.keyTakeaways)
  if (takeaways.length > 0) {
    parts.push("<h3>📌 Key Takeaways</h3><ul>", ...takeaways.map((item) => `<li>${item}</li>`), "</ul>")
  }

  const medications = summary.medications ?? []
  if (medications.length > 0) {
    parts.push("<h3>💊 Medications</h3>", ...medications.flatMap(renderMedication), SECTION_SPACER)
  }

  const terms = summary.medicalTerms ?? []
  if (terms.length > 0) {
    parts.push("<h3>📖 Terms Explained</h3>", ...terms.map(renderTerm), SECTION_SPACER)
  }

  const questions = sanitizeList(summary.questionsForProvider)
  if (questions.length > 0) {
    parts.push("<h3>❓ Questions for Provider</h3><ol>", ...questions.map((item) => `<li>${item}</li>`), "</ol>", SECTION_SPACER)
  }

  return parts.join("")
}

/**
 * Falls back to the raw model text when no structured block can be found, so
 * the reader always sees the model output.
 */
export function renderSummaryFromText(rawText: string): string {
  const summary = extractStructuredSummary(rawText)
  return summary ? formatSummary(summary) : rawText
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1)
}

export function renderSessionNotes(summary: string, messages: readonly ChatMessage[]): string {
  let html = `<h2>Summary</h2><p>${summary || "No summary available."}</p>`
  if (messages.length === 0) {
    return html
  }

  html += "<h2>Follow-up Conversation</h2>"
  for (const message of messages) {
    html += `<p><strong>${capitalize(message.role)}:</strong> ${escapeHtml(message.content)}</p>`
  }
  return html
}
