import { appendTranscription, type TranscriptionService } from "@transcription"
import { isEndOfInput, parseCommand, type CliCommand } from "./commands"

export interface LineReader {
  question(query: string): Promise<string>
}

export type Print = (line: string) => void

export type QuestionInput =
  | { status: "ask"; question: string; transcribed: boolean }
  | { status: "skip"; notice: string }

export const NO_SPEECH_MESSAGE = "No speech was recognized in that recording."

/**
 * Reads medical text until a lone "." line. An `:audio <path>` line appends the
 * recording's transcript to the text read so far.
 */
export async function readMedicalText(reader: LineReader, transcriber: TranscriptionService, print: Print): Promise<string> {
  print("Paste medical text. Finish with a line containing only '.'; use :audio <path> to dictate.")
  let text = ""
  for (;;) {
    const line = await reader.question("")
    if (isEndOfInput(line)) {
      return text
    }

    const command = parseCommand(line)
    if (command.type !== "audio") {
      text = text ? `${text}\n${line}` : line
      continue
    }

    const appended = await appendTranscription(text ? `${text}\n` : "", command.path, transcriber)
    if (appended.error) {
      print(appended.error)
    } else {
      text = appended.text
      print("(transcript added)")
    }
  }
}

/**
 * Turns a follow-up command into the question to send. A recording that fails
 * to transcribe, or holds no speech, is never sent to the model.
 */
export async function resolveQuestion(
  command: Extract<CliCommand, { type: "ask" | "audio" }>,
  transcriber: TranscriptionService,
): Promise<QuestionInput> {
  if (command.type === "ask") {
    return { status: "ask", question: command.question, transcribed: false }
  }

  const result = await transcriber.transcribeResult(command.path)
  if (result.status === "failure") {
    return { status: "skip", notice: result.message }
  }
  if (!result.text.trim()) {
    return { status: "skip", notice: NO_SPEECH_MESSAGE }
  }
  return { status: "ask", question: result.text, transcribed: true }
}
