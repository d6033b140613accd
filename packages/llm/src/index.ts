import Anthropic from "@anthropic-ai/sdk"

export type AnthropicImageMediaType = "image/jpeg" | "image/png" | "image/gif" | "image/webp"

export interface LLMImage {
  mediaType: AnthropicImageMediaType
  /** Base64 without the data URL prefix. */
  data: string
}

export interface LLMRequest {
  system: string
  prompt: string
  images?: LLMImage[]
  model?: string
  apiKey?: string
  maxTokens?: number
}

const DEFAULT_MODEL = "claude-sonnet-4-5-20250929"
const DEFAULT_MAX_TOKENS = 2048

function buildUserContent(prompt: string, images: LLMImage[]): Anthropic.MessageParam["content"] {
  if (images.length === 0) {
    return prompt
  }
  const imageBlocks = images.map(
    (image): Anthropic.ImageBlockParam => ({
      type: "image",
      source: { type: "base64", media_type: image.mediaType, data: image.data },
    }),
  )
  const textBlock: Anthropic.TextBlockParam = { type: "text", text: prompt }
  return [...imageBlocks, textBlock]
}

export async function runLLMRequest({
  system,
  prompt,
  images = [],
  model,
  apiKey = process.env.ANTHROPIC_API_KEY,
  maxTokens = DEFAULT_MAX_TOKENS,
}: LLMRequest): Promise<string> {
  if (!apiKey) {
    throw new Error(
      "ANTHROPIC_API_KEY environment variable is required. " +
        "Please set it in your .env file or environment.",
    )
  }

  const client = new Anthropic({ apiKey })

  const requestParams: Anthropic.MessageCreateParamsNonStreaming = {
    model: model ?? DEFAULT_MODEL,
    max_tokens: maxTokens,
    system,
    messages: [
      {
        role: "user",
        content: buildUserContent(prompt, images),
      },
    ],
  }

  const message = await client.messages.create(requestParams)

  const textContent = message.content.find((block) => block.type === "text")
  if (!textContent || textContent.type !== "text") {
    throw new Error("No text content in Anthropic response")
  }

  return textContent.text
}
