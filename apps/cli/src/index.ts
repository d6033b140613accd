import "dotenv/config"
import { createInterface, type Interface } from "node:readline/promises"
import { stdin, stdout } from "node:process"
import {
  SessionStore,
  askFollowUp,
  createGenerationService,
  renderSessionNotes,
  resolveSummaryConfig,
  summarizeMedicalText,
  toChatMessages,
  type ConversationSession,
  type GenerationService,
  type SummaryConfig,
} from "@patient-summary"
import { createTranscriptionService, type TranscriptionService } from "@transcription"
import { debugError } from "@logging/debug-logger"
import { parseCommand, progressFrame } from "./commands"
import { readMedicalText, resolveQuestion } from "./input"

interface CliContext {
  rl: Interface
  config: SummaryConfig
  generator: GenerationService
  transcriber: TranscriptionService
  store: SessionStore
}

function showProgress(tick: number): void {
  stdout.write(`\r${progressFrame(tick)}`)
}

function clearProgress(): void {
  stdout.write("\r\x1b[2K")
}

async function startSession(ctx: CliContext): Promise<ConversationSession | null> {
  const text = await readMedicalText(ctx.rl, ctx.transcriber, console.log)
  const imageAnswer = await ctx.rl.question("Image path (optional): ")
  const imagePath = imageAnswer.trim() || null

  const result = await summarizeMedicalText(text, imagePath, {
    generator: ctx.generator,
    store: ctx.store,
    pollIntervalMs: ctx.config.pollIntervalMs,
    onPoll: showProgress,
  })
  clearProgress()
  console.log(`\n${result.summary}\n`)
  return result.session
}

async function conversationLoop(ctx: CliContext, initial: ConversationSession): Promise<"new" | "quit"> {
  let session = initial
  console.log("Ask follow-up questions. Commands: :notes, :audio <path>, :new, :quit")

  for (;;) {
    const command = parseCommand(await ctx.rl.question("> "))
    switch (command.type) {
      case "quit":
      case "new":
        return command.type
      case "notes":
        console.log(renderSessionNotes(session.summary, toChatMessages(session.history)))
        break
      case "audio":
      case "ask": {
        const input = await resolveQuestion(command, ctx.transcriber)
        if (input.status === "skip") {
          console.log(input.notice)
          break
        }
        if (input.transcribed) {
          console.log(`(transcribed) ${input.question}`)
        }
        const result = await askFollowUp(input.question, session.id, {
          generator: ctx.generator,
          store: ctx.store,
          pollIntervalMs: ctx.config.pollIntervalMs,
          onPoll: showProgress,
        })
        clearProgress()
        session = result.session
        if (result.answer) {
          console.log(`\n${result.answer}\n`)
        }
        break
      }
    }
  }
}

async function main(): Promise<void> {
  const config = resolveSummaryConfig()
  const ctx: CliContext = {
    rl: createInterface({ input: stdin, output: stdout }),
    config,
    generator: createGenerationService(config),
    transcriber: createTranscriptionService(),
    store: new SessionStore(),
  }

  await ctx.generator.initialize()
  await ctx.transcriber.initialize()

  try {
    for (;;) {
      const session = await startSession(ctx)
      if (!session) continue
      if ((await conversationLoop(ctx, session)) === "quit") break
    }
  } finally {
    ctx.rl.close()
    await ctx.transcriber.shutdown()
    await ctx.generator.shutdown()
  }
}

main().catch((error: unknown) => {
  debugError("❌ Fatal error:", error)
  process.exitCode = 1
})
