import type { GenerationService, PromptKind } from "../types.js"

export interface GenerateCall {
  kind: PromptKind
  text: string
  imagePath: string | null
}

export interface FakeGenerator extends GenerationService {
  calls: GenerateCall[]
}

export function createFakeGenerator(respond: (call: GenerateCall) => string | Promise<string>): FakeGenerator {
  const calls: GenerateCall[] = []
  return {
    calls,
    async initialize() {},
    async shutdown() {},
    async generate(kind, text, imagePath) {
      const call = { kind, text, imagePath }
      calls.push(call)
      return respond(call)
    },
  }
}

export function sequentialIds(prefix = "session"): () => string {
  let next = 0
  return () => {
    next += 1
    return `${prefix}-${next}`
  }
}

export const FIXED_NOW = () => new Date("2026-01-15T09:30:00.000Z")
