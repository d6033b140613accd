import { z } from "zod"
import { DEFAULT_POLL_INTERVAL_MS } from "@task-runner"
import type { GenerationProvider, ModelMode } from "./types"

export interface SummaryConfig {
  provider: GenerationProvider
  modelMode: ModelMode
  pollIntervalMs: number
  summaryPromptPath?: string
  conversationalPromptPath?: string
  medgemma: {
    baseUrl?: string
    model?: string
    apiKey?: string
    maxTokens: number
  }
  anthropic: {
    apiKey?: string
    model?: string
  }
}

const DEFAULT_MEDGEMMA_MAX_TOKENS = 1536

const PROVIDER_ALIASES: Record<string, GenerationProvider> = {
  medgemma: "medgemma",
  local: "medgemma",
  anthropic: "anthropic",
  claude: "anthropic",
}

const providerSchema = z
  .string()
  .transform((value) => PROVIDER_ALIASES[value.trim().toLowerCase()])
  .pipe(z.enum(["medgemma", "anthropic"]))
  .catch("medgemma")

const modelModeSchema = z
  .string()
  .transform((value) => value.trim().toUpperCase())
  .pipe(z.enum(["TEXT", "VLM"]))
  .catch("TEXT")

function positiveInteger(fallback: number) {
  return z.coerce.number().int().positive().catch(fallback)
}

function optionalValue(value: string | undefined): string | undefined {
  const trimmed = value?.trim()
  return trimmed ? trimmed : undefined
}

export function resolveSummaryConfig(env: NodeJS.ProcessEnv = process.env): SummaryConfig {
  return {
    provider: providerSchema.parse(env.GENERATION_PROVIDER ?? ""),
    modelMode: modelModeSchema.parse(env.MODEL_MODE ?? ""),
    pollIntervalMs: positiveInteger(DEFAULT_POLL_INTERVAL_MS).parse(env.TASK_POLL_INTERVAL_MS),
    summaryPromptPath: optionalValue(env.SUMMARY_PROMPT_PATH),
    conversationalPromptPath: optionalValue(env.CONVERSATIONAL_PROMPT_PATH),
    medgemma: {
      baseUrl: optionalValue(env.MEDGEMMA_BASE_URL),
      model: optionalValue(env.MEDGEMMA_MODEL),
      apiKey: optionalValue(env.MEDGEMMA_API_KEY),
      maxTokens: positiveInteger(DEFAULT_MEDGEMMA_MAX_TOKENS).parse(env.MEDGEMMA_MAX_TOKENS),
    },
    anthropic: {
      apiKey: optionalValue(env.ANTHROPIC_API_KEY),
      model: optionalValue(env.ANTHROPIC_MODEL),
    },
  }
}
