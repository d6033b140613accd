import JSON5 from "json5"
import { toStructuredSummary } from "./schema"
import type { StructuredSummary } from "./types"

export interface ExtractedBlock {
  text: string
  value: unknown
}

// A body stops at the nearest closing fence.
const JSON_FENCE_PATTERN = /```json\s*([\s\S]*?)```/gi

function tryParse(candidate: string): ExtractedBlock | null {
  try {
    return { text: candidate, value: JSON5.parse(candidate) }
  } catch {
    return null
  }
}

function lastParseable(candidates: string[]): ExtractedBlock | null {
  for (let index = candidates.length - 1; index >= 0; index -= 1) {
    const parsed = tryParse(candidates[index])
    if (parsed) {
      return parsed
    }
  }
  return null
}

export function findFencedCandidates(text: string): string[] {
  return Array.from(text.matchAll(JSON_FENCE_PATTERN), (match) => match[1].trim()).filter((body) =>
    body.startsWith("{"),
  )
}

/**
 * Every complete top-level `{...}` span, left to right. Nested braces stay
 * inside their enclosing candidate; a stray `}` at depth 0 is ignored.
 */
export function findBalancedCandidates(text: string): string[] {
  const candidates: string[] = []
  let depth = 0
  let start = -1

  for (let index = 0; index < text.length; index += 1) {
    const char = text[index]
    if (char === "{") {
      if (depth === 0) {
        start = index
      }
      depth += 1
    } else if (char === "}" && depth > 0) {
      depth -= 1
      if (depth === 0) {
        candidates.push(text.slice(start, index + 1))
        start = -1
      }
    }
  }

  return candidates
}

/**
 * Locates the structured block in raw model output. Fenced ```json blocks are
 * preferred over bare objects; within each strategy the last candidate that
 * parses wins. Returns null when nothing parses.
 */
export function extractJsonBlock(rawText: string): ExtractedBlock | null {
  const text = rawText.trim()
  if (!text) {
    return null
  }
  return lastParseable(findFencedCandidates(text)) ?? lastParseable(findBalancedCandidates(text))
}

export function extractStructuredSummary(rawText: string): StructuredSummary | null {
  const block = extractJsonBlock(rawText)
  return block ? toStructuredSummary(block.value) : null
}
