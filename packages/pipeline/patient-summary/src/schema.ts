import { z } from "zod"
import type { StructuredSummary } from "./types"

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

function toText(value: unknown): string {
  if (typeof value === "string") return value.trim()
  if (typeof value === "object" && value !== null) return JSON.stringify(value)
  return String(value).trim()
}

const optionalText = z.unknown().transform((value) => (value === null || value === undefined ? undefined : toText(value)))

// Models emit a bare string where a list belongs often enough that it is worth wrapping.
const textList = z.unknown().transform((value): string[] => {
  if (value === null || value === undefined) return []
  const items = Array.isArray(value) ? value : [value]
  return items.filter((item) => item !== null && item !== undefined).map(toText)
})

const objectList = z.unknown().transform((value): Record<string, unknown>[] => {
  if (isPlainObject(value)) return [value]
  if (!Array.isArray(value)) return []
  return value.filter(isPlainObject)
})

export const medicationSchema = z.object({
  name: optionalText,
  dosage: optionalText,
  administration: optionalText,
  description: optionalText,
})

export const termDefinitionSchema = z.object({
  term: optionalText,
  definition: optionalText,
})

export const summaryOutputSchema = z.object({
  key_takeaways: textList,
  medications: objectList.pipe(z.array(medicationSchema)),
  medical_terms: objectList.pipe(z.array(termDefinitionSchema)),
  questions_for_provider: textList,
})

export type SummaryModelOutput = z.infer<typeof summaryOutputSchema>

/**
 * Maps whatever the model produced onto a StructuredSummary. Never throws;
 * values that are not objects produce an empty record.
 */
export function toStructuredSummary(value: unknown): StructuredSummary {
  if (!isPlainObject(value)) {
    return {}
  }
  const parsed = summaryOutputSchema.safeParse(value)
  if (!parsed.success) {
    return {}
  }
  return {
    keyTakeaways: parsed.data.key_takeaways,
    medications: parsed.data.medications,
    medicalTerms: parsed.data.medical_terms,
    questionsForProvider: parsed.data.questions_for_provider,
  }
}
