import { readFile } from "node:fs/promises"
import { extname } from "node:path"
import { runLLMRequest, type AnthropicImageMediaType } from "@llm"
import { runMedGemmaRequest } from "@llm-medgemma"
import { debugError, debugLog, debugLogPHI, debugWarn } from "@logging/debug-logger"
import { PipelineStageError, toPipelineStageError } from "@pipeline-errors"
import type { SummaryConfig } from "./config"
import { DEFAULT_SYSTEM_PROMPTS } from "./prompts"
import type { GenerationService, PromptKind } from "./types"

export const NO_TEXT_MESSAGE = "No text was provided to analyze"

export interface EncodedImage {
  mediaType: AnthropicImageMediaType
  base64: string
}

export interface ModelCall {
  system: string
  prompt: string
  image: EncodedImage | null
}

export type ModelRunner = (call: ModelCall) => Promise<string>

export interface GenerationServiceOptions {
  /** Replaces the provider picked from config. Used by tests and alternative backends. */
  runModel?: ModelRunner
  readFileFn?: (path: string) => Promise<Buffer>
  readTextFn?: (path: string) => Promise<string>
}

const IMAGE_MEDIA_TYPES: Record<string, AnthropicImageMediaType> = {
  ".png": "image/png",
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".gif": "image/gif",
  ".webp": "image/webp",
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT"
}

export async function encodeImage(
  imagePath: string,
  readFileFn: (path: string) => Promise<Buffer> = readFile,
): Promise<EncodedImage> {
  let data: Buffer
  try {
    data = await readFileFn(imagePath)
  } catch (error) {
    if (isMissingFile(error)) {
      throw new Error(`Image file not found at '${imagePath}'`)
    }
    throw error
  }
  return {
    mediaType: IMAGE_MEDIA_TYPES[extname(imagePath).toLowerCase()] ?? "image/jpeg",
    base64: data.toString("base64"),
  }
}

export function createModelRunner(config: SummaryConfig): ModelRunner {
  if (config.provider === "anthropic") {
    return ({ system, prompt, image }) =>
      runLLMRequest({
        system,
        prompt,
        images: image ? [{ mediaType: image.mediaType, data: image.base64 }] : [],
        model: config.anthropic.model,
        apiKey: config.anthropic.apiKey,
      })
  }

  return ({ system, prompt, image }) =>
    runMedGemmaRequest({
      system,
      prompt,
      images: image ? [`data:${image.mediaType};base64,${image.base64}`] : [],
      model: config.medgemma.model,
      baseUrl: config.medgemma.baseUrl,
      apiKey: config.medgemma.apiKey,
      maxTokens: config.medgemma.maxTokens,
    })
}

async function loadPrompt(
  kind: PromptKind,
  path: string | undefined,
  readTextFn: (path: string) => Promise<string>,
): Promise<string> {
  if (!path) {
    return DEFAULT_SYSTEM_PROMPTS[kind]
  }
  try {
    const text = (await readTextFn(path)).trim()
    if (text) {
      return text
    }
    debugWarn(`⚠️  Prompt file '${path}' is empty. Using built-in ${kind} prompt.`)
  } catch (error) {
    debugWarn(`⚠️  Prompt file '${path}' could not be read. Using built-in ${kind} prompt.`, error)
  }
  return DEFAULT_SYSTEM_PROMPTS[kind]
}

export async function loadSystemPrompts(
  config: Pick<SummaryConfig, "summaryPromptPath" | "conversationalPromptPath">,
  readTextFn: (path: string) => Promise<string> = (path) => readFile(path, "utf8"),
): Promise<Record<PromptKind, string>> {
  return {
    initial: await loadPrompt("initial", config.summaryPromptPath, readTextFn),
    conversational: await loadPrompt("conversational", config.conversationalPromptPath, readTextFn),
  }
}

class ModelGenerationService implements GenerationService {
  private prompts: Record<PromptKind, string> | null = null
  private readonly runModel: ModelRunner
  private readonly readFileFn: (path: string) => Promise<Buffer>
  private readonly readTextFn: ((path: string) => Promise<string>) | undefined

  constructor(
    private readonly config: SummaryConfig,
    options: GenerationServiceOptions,
  ) {
    this.runModel = options.runModel ?? createModelRunner(config)
    this.readFileFn = options.readFileFn ?? readFile
    this.readTextFn = options.readTextFn
  }

  async initialize(): Promise<void> {
    if (this.prompts) {
      return
    }
    this.prompts = await loadSystemPrompts(this.config, this.readTextFn)
    debugLog(`✅ Generation service ready (provider: ${this.config.provider}, mode: ${this.config.modelMode})`)
  }

  async shutdown(): Promise<void> {
    this.prompts = null
  }

  async generate(kind: PromptKind, text: string, imagePath: string | null): Promise<string> {
    if (!this.prompts) {
      throw new PipelineStageError(
        "generation_not_initialized",
        "Generation service is not initialized. Call initialize() first.",
        false,
      )
    }

    if (!text || text.trim().length === 0) {
      return NO_TEXT_MESSAGE
    }

    debugLog(`⏳ Generating (${kind}): ${text.length} chars${imagePath ? ", with image" : ""}`)
    debugLogPHI("Generation input:", text)

    try {
      const useImage = this.config.modelMode === "VLM" && Boolean(imagePath)
      const image = useImage && imagePath ? await encodeImage(imagePath, this.readFileFn) : null
      const startedAtMs = Date.now()
      const result = await this.runModel({ system: this.prompts[kind], prompt: text, image })
      debugLog(`✅ Generation complete in ${Date.now() - startedAtMs}ms (${result.length} chars)`)
      debugLogPHI("Generation output:", result)
      return result
    } catch (error) {
      debugError("❌ Generation failed:", error instanceof Error ? error.message : error)
      throw toPipelineStageError(error, {
        code: "generation_error",
        message: "An error occurred during text model inference",
        recoverable: true,
        details: { kind },
      })
    }
  }
}

export function createGenerationService(config: SummaryConfig, options: GenerationServiceOptions = {}): GenerationService {
  return new ModelGenerationService(config, options)
}
